/**
 * Session Manager owns the authenticated identity against the provider.
 * All portfolios share one instance; re-authentication is serialized so that
 * simultaneous token failures produce a single login call.
 */

import type { IProviderConnector } from '../connectors/ProviderConnector';
import type { Credentials, CredentialsProvider, Session, SessionState } from '../models/Session';
import { ErrorHandler, PortfolioError } from '../utils/ErrorHandler';
import type { AuditService } from './AuditService';

export interface SessionManagerOptions {
  /** Known token lifetime; leave unset when the provider does not report one */
  tokenTtlMs?: number;
  clock?: () => Date;
  errorHandler?: ErrorHandler;
}

interface PendingAuthentication {
  promise: Promise<string>;
  controller: AbortController;
  /** Callers with a signal still waiting on this login */
  waiters: number;
  /** A caller without a signal is waiting, so the login is never aborted */
  pinned: boolean;
}

export class SessionManager {
  private readonly connector: IProviderConnector;
  private readonly credentialsProvider: CredentialsProvider;
  private readonly auditService: AuditService;
  private readonly errorHandler: ErrorHandler;
  private readonly tokenTtlMs?: number;
  private readonly clock: () => Date;

  private token: string | null = null;
  private issuedAt: Date | null = null;
  private expiresAt: Date | null = null;
  private state: SessionState = 'unauthenticated';
  private pendingAuthentication: PendingAuthentication | null = null;
  private explicitCredentials: Credentials | null = null;
  private authenticationCount: number = 0;

  constructor(
    connector: IProviderConnector,
    credentialsProvider: CredentialsProvider,
    auditService: AuditService,
    options: SessionManagerOptions = {}
  ) {
    this.connector = connector;
    this.credentialsProvider = credentialsProvider;
    this.auditService = auditService;
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.tokenTtlMs = options.tokenTtlMs;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Returns a usable token, re-authenticating first when the session is not valid.
   * Aborting `signal` stops this caller waiting; the login itself is aborted once
   * every caller sharing it has gone.
   */
  async getValidToken(signal?: AbortSignal): Promise<string> {
    if (this.state === 'valid' && this.token !== null && !this.isPastExpiry()) {
      return this.token;
    }

    if (this.state === 'invalid') {
      throw this.createError('InvalidCredentials', 'getValidToken', 'Stored credentials were rejected; re-authentication required');
    }

    if (this.state === 'valid') {
      this.auditService.info('SESSION_EXPIRED', { reason: 'expiry reached' });
      this.state = 'expired';
    }

    return this.reauthenticate(signal);
  }

  /**
   * Logs in with explicit credentials. On success they replace the provider's
   * credentials for every later re-authentication.
   */
  async authenticate(email: string, password: string): Promise<Session> {
    if (this.pendingAuthentication !== null) {
      // explicit credentials must not be answered by a login made with the old ones
      await Promise.allSettled([this.pendingAuthentication.promise]);
    }
    await this.serialize(loginSignal => this.performLogin(email, password, loginSignal));
    this.explicitCredentials = { email, password };
    return this.getSession();
  }

  /**
   * Forces the session to expire. A stale token that is no longer current is ignored,
   * because another caller has already renewed it.
   */
  invalidate(staleToken?: string): void {
    if (staleToken !== undefined && staleToken !== this.token) {
      return;
    }
    if (this.pendingAuthentication !== null) {
      return;
    }

    this.auditService.info('SESSION_INVALIDATED', { previousState: this.state });
    this.state = 'expired';
  }

  /**
   * Drops the session entirely
   */
  logout(): void {
    this.token = null;
    this.issuedAt = null;
    this.expiresAt = null;
    this.state = 'unauthenticated';
    this.auditService.info('SESSION_LOGGED_OUT');
  }

  getSession(): Session {
    return {
      token: this.token,
      issuedAt: this.issuedAt,
      expiresAt: this.expiresAt,
      state: this.state
    };
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Number of login calls made so far
   */
  getAuthenticationCount(): number {
    return this.authenticationCount;
  }

  private isPastExpiry(): boolean {
    return this.expiresAt !== null && this.clock().getTime() >= this.expiresAt.getTime();
  }

  private reauthenticate(signal?: AbortSignal): Promise<string> {
    return this.serialize(async loginSignal => {
      let credentials: Credentials;
      try {
        credentials = this.explicitCredentials ?? (await this.credentialsProvider.getCredentials());
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.auditService.error('SESSION_CREDENTIALS_UNAVAILABLE', { message });
        throw this.createError('InvalidCredentials', 'getValidToken', `No credentials available: ${message}`);
      }
      return this.performLogin(credentials.email, credentials.password, loginSignal);
    }, signal);
  }

  /**
   * Runs one authentication at a time; concurrent callers share the in-flight result
   */
  private serialize(login: (signal: AbortSignal) => Promise<string>, signal?: AbortSignal): Promise<string> {
    let pending = this.pendingAuthentication;
    if (pending === null) {
      const controller = new AbortController();
      const promise = login(controller.signal).finally(() => {
        this.pendingAuthentication = null;
      });
      pending = { promise, controller, waiters: 0, pinned: false };
      this.pendingAuthentication = pending;
    }
    return this.join(pending, signal);
  }

  private join(pending: PendingAuthentication, signal?: AbortSignal): Promise<string> {
    if (signal === undefined) {
      pending.pinned = true;
      return pending.promise;
    }

    pending.waiters++;
    return new Promise<string>((resolve, reject) => {
      const onAbort = (): void => {
        pending.waiters--;
        if (pending.waiters === 0 && !pending.pinned) {
          this.auditService.info('SESSION_LOGIN_ABORTED');
          pending.controller.abort();
        }
        reject(this.createError('Cancelled', 'getValidToken', 'Waiting for the login was cancelled'));
      };

      void pending.promise.then(
        token => {
          signal.removeEventListener('abort', onAbort);
          resolve(token);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );

      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  private async performLogin(email: string, password: string, signal: AbortSignal): Promise<string> {
    this.authenticationCount++;

    try {
      const result = await this.connector.authenticate(email, password, { signal });
      const issuedAt = this.clock();
      const ttl = result.expiresInMs ?? this.tokenTtlMs;

      this.token = result.token;
      this.issuedAt = issuedAt;
      this.expiresAt = ttl !== undefined ? new Date(issuedAt.getTime() + ttl) : null;
      this.state = 'valid';

      this.auditService.info('SESSION_AUTHENTICATED', {
        expiresAt: this.expiresAt?.toISOString() ?? 'unknown'
      });
      return result.token;
    } catch (error) {
      const wrapped = this.errorHandler.toPortfolioError(error, {
        operation: 'authenticate',
        component: 'SessionManager'
      });

      if (wrapped.kind === 'InvalidCredentials') {
        this.token = null;
        this.expiresAt = null;
        this.state = 'invalid';
        this.auditService.error('SESSION_CREDENTIALS_REJECTED', { message: wrapped.message });
      } else {
        this.auditService.warn('SESSION_AUTHENTICATION_FAILED', { kind: wrapped.kind, message: wrapped.message });
      }
      throw wrapped;
    }
  }

  private createError(kind: 'InvalidCredentials' | 'Cancelled', operation: string, message: string): PortfolioError {
    return new PortfolioError(kind, message, {
      operation,
      component: 'SessionManager',
      timestamp: new Date()
    });
  }
}
