/**
 * Portfolio Coordinator
 * Public surface of the update core: owns the per-portfolio schedulers and their
 * latest snapshots, and fans results out to observers and notifications.
 */

import type {
  PortfolioConfig,
  PortfolioSnapshot,
  PortfolioStatus,
  ProviderPortfolio,
  ScheduleState,
  WeekendPolicy
} from '../models/Portfolio';
import type { Session } from '../models/Session';
import { ErrorHandler, PortfolioError } from '../utils/ErrorHandler';
import type { ErrorContext, PortfolioErrorKind } from '../utils/ErrorHandler';
import { normalizePortfolioName } from '../utils/identifiers';
import type { AuditService } from './AuditService';
import { NotificationService } from './NotificationService';
import type { PortfolioFetcher } from './PortfolioFetcher';
import { RefreshScheduler } from './RefreshScheduler';
import type { StartOptions } from './RefreshScheduler';
import type { SessionManager } from './SessionManager';

export const NOTIFICATION_TITLE = 'Portfolio Sync';
export const ENTITY_PREFIX = 'investing';

export interface PortfolioObserver {
  onSnapshotUpdated?(portfolioId: string, snapshot: PortfolioSnapshot): void;
  onError?(portfolioId: string, error: PortfolioError, staleSnapshot: PortfolioSnapshot | null): void;
}

export interface PortfolioCoordinatorOptions {
  timeZone?: string;
  weekendPolicy?: WeekendPolicy;
  /** Consecutive transient failures before a notification is raised */
  transientNotifyThreshold?: number;
  notificationService?: NotificationService;
  clock?: () => Date;
  errorHandler?: ErrorHandler;
}

interface PortfolioEntry {
  config: PortfolioConfig;
  scheduler: RefreshScheduler;
  snapshot: PortfolioSnapshot | null;
  lastErrorAt: Date | null;
}

export class PortfolioCoordinator {
  private portfolios: Map<string, PortfolioEntry> = new Map();
  private observers: PortfolioObserver[] = [];
  private readonly sessionManager: SessionManager;
  private readonly fetcher: PortfolioFetcher;
  private readonly auditService: AuditService;
  private readonly notificationService: NotificationService;
  private readonly errorHandler: ErrorHandler;
  private readonly timeZone: string;
  private readonly weekendPolicy: WeekendPolicy;
  private readonly transientNotifyThreshold: number;
  private readonly clock: () => Date;

  constructor(
    sessionManager: SessionManager,
    fetcher: PortfolioFetcher,
    auditService: AuditService,
    options: PortfolioCoordinatorOptions = {}
  ) {
    this.sessionManager = sessionManager;
    this.fetcher = fetcher;
    this.auditService = auditService;
    this.clock = options.clock ?? (() => new Date());
    this.notificationService = options.notificationService ?? new NotificationService(auditService, this.clock);
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.timeZone = options.timeZone ?? 'UTC';
    this.weekendPolicy = options.weekendPolicy ?? 'checkpoints';
    this.transientNotifyThreshold = options.transientNotifyThreshold ?? 3;
  }

  /**
   * Registers a portfolio and starts its schedule. The first fetch runs immediately
   * unless `refreshNow` is false.
   */
  addPortfolio(config: PortfolioConfig, options: StartOptions = { refreshNow: true }): void {
    if (this.portfolios.has(config.portfolioId)) {
      throw this.createError('DuplicatePortfolio', 'addPortfolio', config.portfolioId,
        `Portfolio ${config.portfolioId} is already registered`);
    }

    const entry: PortfolioEntry = {
      config: copyConfig(config),
      scheduler: this.createScheduler(config),
      snapshot: null,
      lastErrorAt: null
    };
    this.portfolios.set(config.portfolioId, entry);

    this.auditService.info('PORTFOLIO_ADDED', { displayName: config.displayName }, config.portfolioId);
    entry.scheduler.start(options);
  }

  /**
   * Cancels the portfolio's schedule and releases its snapshot
   */
  removePortfolio(portfolioId: string): void {
    const entry = this.requireEntry(portfolioId, 'removePortfolio');

    entry.scheduler.stop();
    this.portfolios.delete(portfolioId);
    this.notificationService.dismissForPortfolio(portfolioId);
    this.auditService.info('PORTFOLIO_REMOVED', {}, portfolioId);
  }

  /**
   * Replaces the configuration and restarts the schedule; the last snapshot stays visible
   */
  reconfigurePortfolio(config: PortfolioConfig, options: StartOptions = { refreshNow: true }): void {
    const entry = this.requireEntry(config.portfolioId, 'reconfigurePortfolio');

    entry.scheduler.stop();
    entry.config = copyConfig(config);
    entry.scheduler = this.createScheduler(config);
    this.notificationService.dismissForPortfolio(config.portfolioId);

    this.auditService.info('PORTFOLIO_RECONFIGURED', {
      displayName: config.displayName,
      scheduleOptions: { ...config.scheduleOptions }
    }, config.portfolioId);
    entry.scheduler.start(options);
  }

  /**
   * Fetches immediately; joins a fetch that is already running
   */
  async manualRefresh(portfolioId: string): Promise<PortfolioSnapshot> {
    const entry = this.requireEntry(portfolioId, 'manualRefresh');
    this.auditService.info('MANUAL_REFRESH_REQUESTED', {}, portfolioId);
    return entry.scheduler.refresh();
  }

  getSnapshot(portfolioId: string): PortfolioSnapshot | null {
    return this.portfolios.get(portfolioId)?.snapshot ?? null;
  }

  getPortfolioStatus(portfolioId: string): PortfolioStatus | null {
    const entry = this.portfolios.get(portfolioId);
    return entry ? toStatus(entry) : null;
  }

  listPortfolios(): PortfolioStatus[] {
    return Array.from(this.portfolios.values()).map(toStatus);
  }

  /**
   * Position portfolios the account holds at the provider, for picking what to add
   */
  async listAvailablePortfolios(signal?: AbortSignal): Promise<ProviderPortfolio[]> {
    const portfolios = await this.fetcher.listPortfolios(signal);
    this.auditService.debug('PROVIDER_PORTFOLIOS_LISTED', { count: portfolios.length });
    return portfolios;
  }

  /**
   * Logs in with new credentials and resumes schedules paused on rejected credentials
   */
  async updateCredentials(email: string, password: string): Promise<Session> {
    const session = await this.sessionManager.authenticate(email, password);

    let resumed = 0;
    for (const [portfolioId, entry] of this.portfolios) {
      const state = entry.scheduler.getState();
      if (state.status === 'paused' && state.lastError?.kind === 'InvalidCredentials') {
        this.notificationService.dismissForPortfolio(portfolioId);
        entry.scheduler.resume({ refreshNow: true });
        resumed++;
      }
    }

    this.auditService.info('CREDENTIALS_UPDATED', { resumedPortfolios: resumed });
    return session;
  }

  /**
   * Registers an observer; returns a function that unregisters it
   */
  addObserver(observer: PortfolioObserver): () => void {
    this.observers.push(observer);
    return () => {
      this.observers = this.observers.filter(o => o !== observer);
    };
  }

  getNotificationService(): NotificationService {
    return this.notificationService;
  }

  /**
   * Stops every schedule and aborts in-flight fetches
   */
  shutdown(): void {
    for (const entry of this.portfolios.values()) {
      entry.scheduler.stop();
    }
    this.auditService.info('COORDINATOR_SHUTDOWN', { portfolios: this.portfolios.size });
  }

  private createScheduler(config: PortfolioConfig): RefreshScheduler {
    const portfolioId = config.portfolioId;

    return new RefreshScheduler({
      portfolioId,
      scheduleOptions: config.scheduleOptions,
      fetchSnapshot: signal => this.fetcher.fetchWithSession(portfolioId, signal),
      auditService: this.auditService,
      timeZone: this.timeZone,
      weekendPolicy: this.weekendPolicy,
      clock: this.clock,
      errorHandler: this.errorHandler,
      onSuccess: snapshot => this.handleSnapshot(portfolioId, snapshot),
      onFailure: (error, state) => this.handleFailure(portfolioId, error, state)
    });
  }

  private handleSnapshot(portfolioId: string, snapshot: PortfolioSnapshot): void {
    const entry = this.portfolios.get(portfolioId);
    if (!entry) {
      return;
    }

    entry.snapshot = snapshot;
    this.notificationService.dismissForPortfolio(portfolioId);
    this.notifyObservers(portfolioId, 'onSnapshotUpdated', observer =>
      observer.onSnapshotUpdated?.(portfolioId, snapshot));
  }

  private handleFailure(portfolioId: string, error: PortfolioError, state: ScheduleState): void {
    const entry = this.portfolios.get(portfolioId);
    if (!entry) {
      return;
    }

    entry.lastErrorAt = this.clock();

    if (error.requiresUserAction || state.consecutiveFailures >= this.transientNotifyThreshold) {
      this.notificationService.create({
        portfolioId,
        slug: entitySlug(entry.config),
        kind: error.kind,
        title: `${NOTIFICATION_TITLE} - ${entry.config.displayName}`,
        message: notificationMessage(entry.config, error, state.consecutiveFailures)
      });
    }

    const staleSnapshot = entry.snapshot;
    this.notifyObservers(portfolioId, 'onError', observer =>
      observer.onError?.(portfolioId, error, staleSnapshot));
  }

  private notifyObservers(portfolioId: string, callback: string, invoke: (observer: PortfolioObserver) => void): void {
    for (const observer of [...this.observers]) {
      try {
        invoke(observer);
      } catch (error) {
        this.auditService.error('OBSERVER_FAILED', {
          callback,
          message: error instanceof Error ? error.message : String(error)
        }, portfolioId);
      }
    }
  }

  private requireEntry(portfolioId: string, operation: string): PortfolioEntry {
    const entry = this.portfolios.get(portfolioId);
    if (!entry) {
      throw this.createError('UnknownPortfolio', operation, portfolioId, `Portfolio ${portfolioId} is not registered`);
    }
    return entry;
  }

  private createError(
    kind: PortfolioErrorKind,
    operation: string,
    portfolioId: string,
    message: string
  ): PortfolioError {
    const context: Omit<ErrorContext, 'timestamp'> = {
      operation,
      component: 'PortfolioCoordinator',
      portfolioId
    };
    return this.errorHandler.toPortfolioError(
      new PortfolioError(kind, message, { ...context, timestamp: this.clock() }),
      context
    );
  }
}

/**
 * Entity slug shared by the readings and the notification id
 */
export function entitySlug(config: PortfolioConfig): string {
  return `${ENTITY_PREFIX}_${normalizePortfolioName(config.displayName)}`;
}

function notificationMessage(config: PortfolioConfig, error: PortfolioError, failures: number): string {
  switch (error.kind) {
    case 'InvalidCredentials':
      return `Authentication failed for '${config.displayName}'. Please update your credentials. (${error.message})`;
    case 'PortfolioNotFound':
      return `Portfolio '${config.displayName}' (${config.portfolioId}) was not found. It may have been deleted; please reconfigure it.`;
    default:
      return `Updating '${config.displayName}' failed ${failures} times in a row: ${error.message}`;
  }
}

function copyConfig(config: PortfolioConfig): PortfolioConfig {
  return { ...config, scheduleOptions: { ...config.scheduleOptions } };
}

function toStatus(entry: PortfolioEntry): PortfolioStatus {
  return {
    config: copyConfig(entry.config),
    snapshot: entry.snapshot,
    schedule: entry.scheduler.getState(),
    lastErrorAt: entry.lastErrorAt
  };
}
