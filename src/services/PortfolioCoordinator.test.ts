/**
 * Tests for the coordinator wiring schedulers, snapshots, observers and notifications
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PortfolioCoordinator, entitySlug } from './PortfolioCoordinator';
import type { PortfolioObserver } from './PortfolioCoordinator';
import { PortfolioFetcher } from './PortfolioFetcher';
import { SessionManager } from './SessionManager';
import { AuditService } from './AuditService';
import type { AuthenticationResult, IProviderConnector, RequestOptions } from '../connectors/ProviderConnector';
import type { ConnectorStatus } from '../models/ConnectorStatus';
import { DEFAULT_SCHEDULE_OPTIONS } from '../models/Portfolio';
import type { PortfolioConfig, ProviderPortfolio, ProviderPosition } from '../models/Portfolio';
import { PortfolioError } from '../utils/ErrorHandler';
import type { PortfolioErrorKind } from '../utils/ErrorHandler';

const providerError = (kind: PortfolioErrorKind, message: string): PortfolioError =>
  new PortfolioError(kind, message, {
    operation: 'test',
    component: 'Test',
    timestamp: new Date()
  });

class FakeConnector implements IProviderConnector {
  public logins = 0;
  public rejectLogins = false;
  /** Logins never answer; they only end when aborted */
  public stallLogins = false;
  public loginSignals: Array<AbortSignal | undefined> = [];
  public positions: Map<string, ProviderPosition[]> = new Map();
  public portfolios: ProviderPortfolio[] = [];
  private failures: Error[] = [];

  fail(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  async authenticate(_email: string, _password: string, options: RequestOptions = {}): Promise<AuthenticationResult> {
    this.logins++;
    this.loginSignals.push(options.signal);
    if (this.stallLogins) {
      return new Promise((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
      });
    }
    if (this.rejectLogins) {
      throw providerError('InvalidCredentials', 'Login failed: Wrong password');
    }
    return { token: `token-${this.logins}` };
  }

  async listPortfolios(): Promise<ProviderPortfolio[]> {
    return this.portfolios;
  }

  async getPositions(_token: string, portfolioId: string): Promise<ProviderPosition[]> {
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return this.positions.get(portfolioId) ?? [];
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

const config = (portfolioId: string, displayName: string): PortfolioConfig => ({
  portfolioId,
  displayName,
  scheduleOptions: { ...DEFAULT_SCHEDULE_OPTIONS }
});

const flush = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

describe('PortfolioCoordinator', () => {
  let connector: FakeConnector;
  let auditService: AuditService;
  let coordinator: PortfolioCoordinator;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    vi.setSystemTime(new Date('2026-01-05T09:00:00Z'));

    connector = new FakeConnector();
    connector.positions.set('111', [{ marketValue: 1000, openPL: 50, dailyPL: -5 }]);
    connector.positions.set('222', [{ marketValue: 400, openPL: 4, dailyPL: 2 }]);

    auditService = new AuditService();
    const sessionManager = new SessionManager(
      connector,
      { getCredentials: async () => ({ email: 'user@example.com', password: 'test-secret' }) },
      auditService
    );
    const fetcher = new PortfolioFetcher(connector, sessionManager, auditService);
    coordinator = new PortfolioCoordinator(sessionManager, fetcher, auditService);
  });

  afterEach(() => {
    coordinator.shutdown();
    vi.useRealTimers();
  });

  describe('registration', () => {
    it('fetches a new portfolio right away and publishes the snapshot', async () => {
      const updates: Array<[string, number]> = [];
      coordinator.addObserver({
        onSnapshotUpdated: (portfolioId, snapshot) => updates.push([portfolioId, snapshot.investedCapital])
      });

      coordinator.addPortfolio(config('111', 'Main'));
      await flush();

      expect(updates).toEqual([['111', 1000]]);
      expect(coordinator.getSnapshot('111')).toMatchObject({
        investedCapital: 1000,
        openPL: 50,
        openPLPercent: 5,
        dailyPL: -5,
        dailyPLPercent: -0.5,
        currency: 'EUR'
      });
      expect(coordinator.getPortfolioStatus('111')?.schedule).toMatchObject({
        status: 'waiting',
        nextWakeAt: new Date('2026-01-05T09:15:00Z')
      });
    });

    it('can defer the first fetch to the schedule', () => {
      coordinator.addPortfolio(config('111', 'Main'), { refreshNow: false });

      expect(coordinator.getSnapshot('111')).toBeNull();
      expect(connector.logins).toBe(0);
    });

    it('refuses a portfolio that is already registered', () => {
      coordinator.addPortfolio(config('111', 'Main'), { refreshNow: false });

      expect(() => coordinator.addPortfolio(config('111', 'Other'))).toThrow(
        expect.objectContaining({ kind: 'DuplicatePortfolio' })
      );
      expect(coordinator.listPortfolios()).toHaveLength(1);
    });

    it('rejects operations on unknown portfolios', async () => {
      expect(() => coordinator.removePortfolio('999')).toThrow(expect.objectContaining({ kind: 'UnknownPortfolio' }));
      expect(() => coordinator.reconfigurePortfolio(config('999', 'Nope'))).toThrow(
        expect.objectContaining({ kind: 'UnknownPortfolio' })
      );
      await expect(coordinator.manualRefresh('999')).rejects.toMatchObject({
        kind: 'UnknownPortfolio',
        message: 'Portfolio 999 is not registered'
      });
      expect(coordinator.getSnapshot('999')).toBeNull();
      expect(coordinator.getPortfolioStatus('999')).toBeNull();
    });

    it('forgets a removed portfolio', async () => {
      coordinator.addPortfolio(config('111', 'Main'));
      await flush();

      coordinator.removePortfolio('111');

      expect(coordinator.getSnapshot('111')).toBeNull();
      expect(coordinator.listPortfolios()).toEqual([]);
    });
  });

  describe('refresh', () => {
    it('shares one session between portfolios', async () => {
      coordinator.addPortfolio(config('111', 'Main'));
      coordinator.addPortfolio(config('222', 'Pension'));
      await flush();

      expect(connector.logins).toBe(1);
      expect(coordinator.getSnapshot('222')?.investedCapital).toBe(400);
    });

    it('returns the snapshot of a manual refresh', async () => {
      coordinator.addPortfolio(config('111', 'Main'), { refreshNow: false });

      const snapshot = await coordinator.manualRefresh('111');

      expect(snapshot.investedCapital).toBe(1000);
      expect(coordinator.getSnapshot('111')).toBe(snapshot);
      expect(auditService.getEventsByType('MANUAL_REFRESH_REQUESTED')).toHaveLength(1);
    });

    it('keeps the last snapshot and hands it to observers on failure', async () => {
      const onError = vi.fn<Parameters<NonNullable<PortfolioObserver['onError']>>, void>();
      coordinator.addObserver({ onError });
      coordinator.addPortfolio(config('111', 'Main'));
      await flush();
      const first = coordinator.getSnapshot('111');

      connector.fail(new TypeError('fetch failed'));
      await expect(coordinator.manualRefresh('111')).rejects.toMatchObject({ kind: 'NetworkError' });

      expect(coordinator.getSnapshot('111')).toBe(first);
      expect(onError).toHaveBeenCalledTimes(1);
      const [portfolioId, error, stale] = onError.mock.calls[0];
      expect(portfolioId).toBe('111');
      expect(error.kind).toBe('NetworkError');
      expect(stale).toBe(first);
      expect(coordinator.getPortfolioStatus('111')?.lastErrorAt).toEqual(new Date('2026-01-05T09:00:00Z'));
    });

    it('keeps notifying the remaining observers when one throws', async () => {
      const seen: string[] = [];
      coordinator.addObserver({
        onSnapshotUpdated: () => {
          throw new Error('observer broke');
        }
      });
      coordinator.addObserver({ onSnapshotUpdated: portfolioId => seen.push(portfolioId) });

      await coordinator.manualRefresh(addDeferred('111', 'Main'));

      expect(seen).toEqual(['111']);
      const [failure] = auditService.getEventsByType('OBSERVER_FAILED');
      expect(failure.details).toEqual({ callback: 'onSnapshotUpdated', message: 'observer broke' });
    });

    it('stops calling an observer after it unsubscribes', async () => {
      const seen: string[] = [];
      const unsubscribe = coordinator.addObserver({ onSnapshotUpdated: portfolioId => seen.push(portfolioId) });
      const portfolioId = addDeferred('111', 'Main');

      await coordinator.manualRefresh(portfolioId);
      unsubscribe();
      await coordinator.manualRefresh(portfolioId);

      expect(seen).toEqual(['111']);
    });
  });

  describe('notifications', () => {
    it('raises a notification at once for a missing portfolio and pauses it', async () => {
      connector.fail(providerError('PortfolioNotFound', 'Portfolio 111 not found'));

      coordinator.addPortfolio(config('111', "John's Main"));
      await flush();

      const notifications = coordinator.getNotificationService().list();
      expect(notifications).toHaveLength(1);
      expect(notifications[0]).toMatchObject({
        id: 'investing_johns_main_error',
        kind: 'PortfolioNotFound',
        title: "Portfolio Sync - John's Main",
        message: "Portfolio 'John's Main' (111) was not found. It may have been deleted; please reconfigure it."
      });
      expect(coordinator.getPortfolioStatus('111')?.schedule.status).toBe('paused');
    });

    it('waits for repeated transient failures before notifying', async () => {
      const portfolioId = addDeferred('111', 'Main');
      const notifications = coordinator.getNotificationService();
      connector.fail(new TypeError('fetch failed'), new TypeError('fetch failed'), new TypeError('fetch failed'));

      await expect(coordinator.manualRefresh(portfolioId)).rejects.toMatchObject({ kind: 'NetworkError' });
      await expect(coordinator.manualRefresh(portfolioId)).rejects.toMatchObject({ kind: 'NetworkError' });
      expect(notifications.hasOpenNotification(portfolioId)).toBe(false);

      await expect(coordinator.manualRefresh(portfolioId)).rejects.toMatchObject({ kind: 'NetworkError' });
      expect(notifications.get('investing_main_error')?.message).toBe(
        "Updating 'Main' failed 3 times in a row: fetch failed"
      );

      await coordinator.manualRefresh(portfolioId);
      expect(notifications.hasOpenNotification(portfolioId)).toBe(false);
    });

    it('resumes portfolios paused on rejected credentials once new ones are given', async () => {
      connector.rejectLogins = true;
      coordinator.addPortfolio(config('111', 'Main'));
      coordinator.addPortfolio(config('222', 'Pension'));
      await flush();

      expect(coordinator.getPortfolioStatus('111')?.schedule.status).toBe('paused');
      expect(coordinator.getNotificationService().get('investing_main_error')?.message).toBe(
        "Authentication failed for 'Main'. Please update your credentials. (Login failed: Wrong password)"
      );

      connector.rejectLogins = false;
      const session = await coordinator.updateCredentials('new@example.com', 'new-secret');
      await flush();

      expect(session.state).toBe('valid');
      expect(coordinator.getSnapshot('111')?.investedCapital).toBe(1000);
      expect(coordinator.getSnapshot('222')?.investedCapital).toBe(400);
      expect(coordinator.getPortfolioStatus('111')?.schedule.status).toBe('waiting');
      expect(coordinator.getNotificationService().list()).toEqual([]);

      const [updated] = auditService.getEventsByType('CREDENTIALS_UPDATED');
      expect(updated.details).toEqual({ resumedPortfolios: 2 });
    });
  });

  describe('reconfigure and shutdown', () => {
    it('restarts the schedule with the new options and keeps the snapshot', async () => {
      coordinator.addPortfolio(config('111', 'Main'));
      await flush();
      const snapshot = coordinator.getSnapshot('111');

      coordinator.reconfigurePortfolio(
        { ...config('111', 'Main'), scheduleOptions: { ...DEFAULT_SCHEDULE_OPTIONS, intervalMinutes: 30 } },
        { refreshNow: false }
      );

      const status = coordinator.getPortfolioStatus('111');
      expect(status?.snapshot).toBe(snapshot);
      expect(status?.config.scheduleOptions.intervalMinutes).toBe(30);
      expect(status?.schedule).toMatchObject({ status: 'waiting', nextWakeAt: new Date('2026-01-05T09:30:00Z') });
    });

    it('stops every schedule on shutdown', () => {
      coordinator.addPortfolio(config('111', 'Main'), { refreshNow: false });
      coordinator.addPortfolio(config('222', 'Pension'), { refreshNow: false });

      coordinator.shutdown();

      expect(coordinator.listPortfolios().map(p => p.schedule.status)).toEqual(['stopped', 'stopped']);
    });

    it('aborts a login still running at shutdown', async () => {
      connector.stallLogins = true;
      coordinator.addPortfolio(config('111', 'Main'));
      await flush();
      expect(connector.loginSignals[0]?.aborted).toBe(false);

      coordinator.shutdown();
      await flush();

      expect(connector.loginSignals[0]?.aborted).toBe(true);
      expect(coordinator.getPortfolioStatus('111')?.schedule).toMatchObject({ status: 'stopped', consecutiveFailures: 0 });
      expect(coordinator.getNotificationService().list()).toEqual([]);
    });
  });

  it('lists only the position portfolios held at the provider', async () => {
    connector.portfolios = [
      { id: '111', name: 'Main', type: 'position' },
      { id: '9', name: 'Ideas', type: 'watchlist' }
    ];

    expect(await coordinator.listAvailablePortfolios()).toEqual([{ id: '111', name: 'Main', type: 'position' }]);
  });

  it('builds the entity slug from the display name', () => {
    expect(entitySlug(config('111', 'Cartera Acción'))).toBe('investing_cartera_accion');
  });

  function addDeferred(portfolioId: string, displayName: string): string {
    coordinator.addPortfolio(config(portfolioId, displayName), { refreshNow: false });
    return portfolioId;
  }
});
