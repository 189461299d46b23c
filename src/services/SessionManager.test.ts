/**
 * Tests for the shared session and its serialized re-authentication
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { SessionManager } from './SessionManager';
import { AuditService } from './AuditService';
import type { AuthenticationResult, IProviderConnector, RequestOptions } from '../connectors/ProviderConnector';
import type { ConnectorStatus } from '../models/ConnectorStatus';
import type { ProviderPortfolio, ProviderPosition } from '../models/Portfolio';
import type { Credentials, CredentialsProvider } from '../models/Session';
import { PortfolioError } from '../utils/ErrorHandler';

class FakeConnector implements IProviderConnector {
  public calls: Credentials[] = [];
  public signals: Array<AbortSignal | undefined> = [];
  /** While set, logins wait for it or for their signal to abort */
  public hold: Promise<AuthenticationResult> | null = null;
  private results: Array<AuthenticationResult | Error> = [];

  queue(...results: Array<AuthenticationResult | Error>): void {
    this.results.push(...results);
  }

  async authenticate(email: string, password: string, options: RequestOptions = {}): Promise<AuthenticationResult> {
    this.calls.push({ email, password });
    this.signals.push(options.signal);
    const hold = this.hold;
    if (hold) {
      return new Promise((resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        hold.then(resolve, reject);
      });
    }
    await Promise.resolve();
    const next = this.results.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? { token: `token-${this.calls.length}` };
  }

  async listPortfolios(): Promise<ProviderPortfolio[]> {
    return [];
  }

  async getPositions(): Promise<ProviderPosition[]> {
    return [];
  }

  getStatus(): ConnectorStatus {
    return {
      connectorId: 'fake',
      name: 'Fake',
      status: 'healthy',
      lastRequestAt: null,
      latency: 0,
      errorRate: 0,
      capabilities: []
    };
  }
}

class StaticCredentials implements CredentialsProvider {
  constructor(private readonly credentials: Credentials | null) {}

  async getCredentials(): Promise<Credentials> {
    if (!this.credentials) {
      throw new Error('not configured');
    }
    return this.credentials;
  }
}

const rejected = (): PortfolioError =>
  new PortfolioError('InvalidCredentials', 'Login failed: Wrong password', {
    operation: 'authenticate',
    component: 'Test',
    timestamp: new Date()
  });

// macrotask turn; lets every pending promise callback run
const flush = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

describe('SessionManager', () => {
  let connector: FakeConnector;
  let auditService: AuditService;
  let now: Date;
  let sessionManager: SessionManager;

  beforeEach(() => {
    connector = new FakeConnector();
    auditService = new AuditService({ logLevel: 'debug' });
    now = new Date('2026-01-05T09:00:00Z');
    sessionManager = new SessionManager(
      connector,
      new StaticCredentials({ email: 'user@example.com', password: 'test-secret' }),
      auditService,
      { clock: () => now }
    );
  });

  it('logs in on first use and reuses the token afterwards', async () => {
    expect(sessionManager.getState()).toBe('unauthenticated');

    expect(await sessionManager.getValidToken()).toBe('token-1');
    expect(await sessionManager.getValidToken()).toBe('token-1');

    expect(connector.calls).toEqual([{ email: 'user@example.com', password: 'test-secret' }]);
    expect(sessionManager.getSession()).toEqual({
      token: 'token-1',
      issuedAt: now,
      expiresAt: null,
      state: 'valid'
    });
  });

  it('shares one login between concurrent callers', async () => {
    const tokens = await Promise.all(Array.from({ length: 5 }, () => sessionManager.getValidToken()));

    expect(tokens).toEqual(['token-1', 'token-1', 'token-1', 'token-1', 'token-1']);
    expect(sessionManager.getAuthenticationCount()).toBe(1);
  });

  /**
   * Feature: portfolio-sync, Property 6: simultaneous token failures cause a single login
   */
  it('Property 6: any number of callers invalidating the same token trigger one login', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 20 }), async callers => {
        const session = new SessionManager(
          new FakeConnector(),
          new StaticCredentials({ email: 'user@example.com', password: 'test-secret' }),
          new AuditService()
        );
        const stale = await session.getValidToken();

        const renewed = await Promise.all(
          Array.from({ length: callers }, async () => {
            session.invalidate(stale);
            return session.getValidToken();
          })
        );

        expect(new Set(renewed)).toEqual(new Set(['token-2']));
        expect(session.getAuthenticationCount()).toBe(2);
      }),
      { numRuns: 50 }
    );
  });

  it('ignores invalidation with a token that is no longer current', async () => {
    await sessionManager.getValidToken();

    sessionManager.invalidate('token-0');
    expect(sessionManager.getState()).toBe('valid');

    sessionManager.invalidate('token-1');
    expect(sessionManager.getState()).toBe('expired');
    expect(await sessionManager.getValidToken()).toBe('token-2');
  });

  it('renews the token once its lifetime has passed', async () => {
    const expiring = new SessionManager(
      connector,
      new StaticCredentials({ email: 'user@example.com', password: 'test-secret' }),
      auditService,
      { clock: () => now, tokenTtlMs: 60000 }
    );

    expect(await expiring.getValidToken()).toBe('token-1');
    expect(expiring.getSession().expiresAt).toEqual(new Date('2026-01-05T09:01:00Z'));

    now = new Date('2026-01-05T09:00:59Z');
    expect(await expiring.getValidToken()).toBe('token-1');

    now = new Date('2026-01-05T09:01:00Z');
    expect(await expiring.getValidToken()).toBe('token-2');
    expect(auditService.getEventsByType('SESSION_EXPIRED')).toHaveLength(1);
  });

  it('prefers the lifetime reported by the provider', async () => {
    connector.queue({ token: 'short-lived', expiresInMs: 1000 });

    await sessionManager.getValidToken();

    expect(sessionManager.getSession().expiresAt).toEqual(new Date('2026-01-05T09:00:01Z'));
  });

  it('stops logging in after the credentials were rejected', async () => {
    connector.queue(rejected());

    await expect(sessionManager.getValidToken()).rejects.toMatchObject({ kind: 'InvalidCredentials' });
    expect(sessionManager.getState()).toBe('invalid');

    await expect(sessionManager.getValidToken()).rejects.toMatchObject({ kind: 'InvalidCredentials' });
    expect(connector.calls).toHaveLength(1);
    expect(auditService.getEventsByType('SESSION_CREDENTIALS_REJECTED')).toHaveLength(1);
  });

  it('retries the login on the next call after a network failure', async () => {
    connector.queue(new TypeError('fetch failed'));

    await expect(sessionManager.getValidToken()).rejects.toMatchObject({ kind: 'NetworkError', message: 'fetch failed' });
    expect(sessionManager.getState()).toBe('unauthenticated');

    expect(await sessionManager.getValidToken()).toBe('token-2');
  });

  it('keeps explicit credentials for later re-authentication', async () => {
    connector.queue(rejected());
    await expect(sessionManager.getValidToken()).rejects.toMatchObject({ kind: 'InvalidCredentials' });

    const session = await sessionManager.authenticate('new@example.com', 'new-secret');
    expect(session.state).toBe('valid');
    expect(session.token).toBe('token-2');

    sessionManager.invalidate();
    await sessionManager.getValidToken();

    expect(connector.calls.slice(1)).toEqual([
      { email: 'new@example.com', password: 'new-secret' },
      { email: 'new@example.com', password: 'new-secret' }
    ]);
  });

  it('reports missing credentials as invalid credentials', async () => {
    const unconfigured = new SessionManager(connector, new StaticCredentials(null), auditService);

    await expect(unconfigured.getValidToken()).rejects.toMatchObject({
      kind: 'InvalidCredentials',
      message: 'No credentials available: not configured'
    });
    expect(connector.calls).toHaveLength(0);
  });

  it('forgets the token on logout', async () => {
    await sessionManager.getValidToken();
    sessionManager.logout();

    expect(sessionManager.getSession()).toEqual({ token: null, issuedAt: null, expiresAt: null, state: 'unauthenticated' });
  });

  describe('cancellation', () => {
    it('passes a signal to the login call', async () => {
      await sessionManager.getValidToken();

      expect(connector.signals).toHaveLength(1);
      expect(connector.signals[0]).toBeInstanceOf(AbortSignal);
      expect(connector.signals[0]?.aborted).toBe(false);
    });

    it('aborts the login once every waiting caller has cancelled', async () => {
      connector.hold = new Promise<AuthenticationResult>(() => undefined);
      const first = new AbortController();
      const second = new AbortController();

      const firstToken = sessionManager.getValidToken(first.signal);
      const secondToken = sessionManager.getValidToken(second.signal);
      await flush();

      first.abort();
      await expect(firstToken).rejects.toMatchObject({
        kind: 'Cancelled',
        message: 'Waiting for the login was cancelled'
      });
      expect(connector.signals[0]?.aborted).toBe(false);

      second.abort();
      await expect(secondToken).rejects.toMatchObject({ kind: 'Cancelled' });
      expect(connector.signals[0]?.aborted).toBe(true);
      expect(auditService.getEventsByType('SESSION_LOGIN_ABORTED')).toHaveLength(1);

      await flush();
      connector.hold = null;
      expect(sessionManager.getState()).toBe('unauthenticated');
      expect(await sessionManager.getValidToken()).toBe('token-2');
    });

    it('keeps the login running while a caller without a signal waits', async () => {
      let release: (result: AuthenticationResult) => void = () => undefined;
      connector.hold = new Promise<AuthenticationResult>(resolve => {
        release = resolve;
      });
      const controller = new AbortController();

      const plain = sessionManager.getValidToken();
      const cancellable = sessionManager.getValidToken(controller.signal);
      await flush();

      controller.abort();
      await expect(cancellable).rejects.toMatchObject({ kind: 'Cancelled' });
      expect(connector.signals[0]?.aborted).toBe(false);

      release({ token: 'held-token' });
      expect(await plain).toBe('held-token');
      expect(sessionManager.getAuthenticationCount()).toBe(1);
    });

    it('cancels at once when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(sessionManager.getValidToken(controller.signal)).rejects.toMatchObject({ kind: 'Cancelled' });
      await flush();

      expect(connector.signals[0]?.aborted).toBe(true);
    });
  });
});
