/**
 * Refresh Scheduler
 * Drives one portfolio through idle → waiting → fetching → (waiting | cooldown | paused),
 * with at most one fetch in flight at a time.
 */

import type {
  PortfolioSnapshot,
  ScheduleOptions,
  ScheduleState,
  WeekendPolicy
} from '../models/Portfolio';
import { ErrorHandler, PortfolioError } from '../utils/ErrorHandler';
import { computeNextWake } from '../utils/marketSchedule';
import type { AuditService } from './AuditService';

export type SnapshotSource = (signal: AbortSignal) => Promise<PortfolioSnapshot>;

export type RefreshTrigger = 'initial' | 'scheduled' | 'manual';

export interface RefreshSchedulerOptions {
  portfolioId: string;
  scheduleOptions: ScheduleOptions;
  fetchSnapshot: SnapshotSource;
  auditService: AuditService;
  timeZone?: string;
  weekendPolicy?: WeekendPolicy;
  /** Called once per successful fetch, before the next wake is armed */
  onSuccess?: (snapshot: PortfolioSnapshot, state: ScheduleState) => void;
  /** Called once per failed fetch, while the scheduler is in cooldown */
  onFailure?: (error: PortfolioError, state: ScheduleState) => void;
  clock?: () => Date;
  errorHandler?: ErrorHandler;
}

export interface StartOptions {
  /** Fetch immediately instead of waiting for the first checkpoint */
  refreshNow?: boolean;
}

type Attempt =
  | { ok: true; snapshot: PortfolioSnapshot }
  | { ok: false; error: PortfolioError };

export class RefreshScheduler {
  private readonly portfolioId: string;
  private readonly scheduleOptions: ScheduleOptions;
  private readonly fetchSnapshot: SnapshotSource;
  private readonly auditService: AuditService;
  private readonly errorHandler: ErrorHandler;
  private readonly timeZone: string;
  private readonly weekendPolicy: WeekendPolicy;
  private readonly onSuccess?: (snapshot: PortfolioSnapshot, state: ScheduleState) => void;
  private readonly onFailure?: (error: PortfolioError, state: ScheduleState) => void;
  private readonly clock: () => Date;

  private state: ScheduleState = {
    status: 'idle',
    nextWakeAt: null,
    lastAttemptAt: null,
    lastSuccessAt: null,
    inFlight: false,
    consecutiveFailures: 0,
    lastError: null
  };
  private wakeTimer?: NodeJS.Timeout;
  private inFlight: Promise<Attempt> | null = null;
  private abortController: AbortController | null = null;

  constructor(options: RefreshSchedulerOptions) {
    this.portfolioId = options.portfolioId;
    this.scheduleOptions = { ...options.scheduleOptions };
    this.fetchSnapshot = options.fetchSnapshot;
    this.auditService = options.auditService;
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.timeZone = options.timeZone ?? 'UTC';
    this.weekendPolicy = options.weekendPolicy ?? 'checkpoints';
    this.onSuccess = options.onSuccess;
    this.onFailure = options.onFailure;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Leaves idle and arms the first wake
   */
  start(options: StartOptions = {}): void {
    if (this.state.status !== 'idle') {
      return;
    }

    this.state.status = 'waiting';
    this.auditService.info('SCHEDULER_STARTED', { refreshNow: options.refreshNow ?? false }, this.portfolioId);

    if (options.refreshNow) {
      void this.launch('initial');
    } else {
      this.armNextWake();
    }
  }

  /**
   * Fetches now. While a fetch is in flight the caller joins it and sees the same outcome.
   */
  async refresh(): Promise<PortfolioSnapshot> {
    if (this.state.status === 'stopped') {
      throw this.cancelled(`Scheduler for portfolio ${this.portfolioId} is stopped`);
    }

    const outcome = await (this.inFlight ?? this.launch('manual'));
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.snapshot;
  }

  /**
   * Re-arms a paused scheduler
   */
  resume(options: StartOptions = {}): void {
    if (this.state.status !== 'paused') {
      return;
    }

    this.state.status = 'waiting';
    this.auditService.info('SCHEDULER_RESUMED', { refreshNow: options.refreshNow ?? false }, this.portfolioId);

    if (options.refreshNow) {
      void this.launch('manual');
    } else {
      this.armNextWake();
    }
  }

  /**
   * Cancels the wake timer and aborts the in-flight fetch; its result is discarded
   */
  stop(): void {
    if (this.state.status === 'stopped') {
      return;
    }

    this.clearWakeTimer();
    this.abortController?.abort();
    this.abortController = null;
    this.state.status = 'stopped';
    this.state.inFlight = false;
    this.state.nextWakeAt = null;
    this.auditService.info('SCHEDULER_STOPPED', {}, this.portfolioId);
  }

  getState(): ScheduleState {
    return { ...this.state };
  }

  isStopped(): boolean {
    return this.state.status === 'stopped';
  }

  /**
   * Starts a fetch and records its outcome. The returned promise never rejects.
   */
  private launch(trigger: RefreshTrigger): Promise<Attempt> {
    this.clearWakeTimer();

    const controller = new AbortController();
    this.abortController = controller;
    this.state.status = 'fetching';
    this.state.inFlight = true;
    this.state.nextWakeAt = null;
    this.state.lastAttemptAt = this.clock();
    this.auditService.debug('REFRESH_STARTED', { trigger }, this.portfolioId);

    const pending = this.run(controller).finally(() => {
      if (this.inFlight === pending) {
        this.inFlight = null;
      }
    });
    this.inFlight = pending;
    return pending;
  }

  private async run(controller: AbortController): Promise<Attempt> {
    const attempt = await this.attempt(controller.signal);

    if (controller.signal.aborted || this.state.status === 'stopped') {
      this.auditService.debug('REFRESH_DISCARDED', { succeeded: attempt.ok }, this.portfolioId);
      return { ok: false, error: this.cancelled(`Refresh of portfolio ${this.portfolioId} was cancelled`) };
    }

    this.abortController = null;
    this.state.inFlight = false;

    if (attempt.ok) {
      this.handleSuccess(attempt.snapshot);
    } else {
      this.handleFailure(attempt.error);
    }
    return attempt;
  }

  private async attempt(signal: AbortSignal): Promise<Attempt> {
    try {
      return { ok: true, snapshot: await this.fetchSnapshot(signal) };
    } catch (error) {
      return { ok: false, error: this.classify(error) };
    }
  }

  /** Raised to callers when stop() wins over their refresh */
  private cancelled(message: string): PortfolioError {
    return new PortfolioError('Cancelled', message, {
      operation: 'refresh',
      component: 'RefreshScheduler',
      portfolioId: this.portfolioId,
      timestamp: this.clock()
    });
  }

  private handleSuccess(snapshot: PortfolioSnapshot): void {
    this.state.lastSuccessAt = this.clock();
    this.state.consecutiveFailures = 0;
    this.state.lastError = null;
    this.auditService.info('REFRESH_SUCCEEDED', { investedCapital: snapshot.investedCapital }, this.portfolioId);

    this.invokeCallback('onSuccess', () => this.onSuccess?.(snapshot, this.getState()));

    if (this.isStopped()) {
      return;
    }
    this.state.status = 'waiting';
    this.armNextWake();
  }

  private handleFailure(error: PortfolioError): void {
    this.state.status = 'cooldown';
    this.state.consecutiveFailures++;
    this.state.lastError = error;
    this.auditService.log(error.requiresUserAction ? 'error' : 'warn', 'REFRESH_FAILED', {
      kind: error.kind,
      message: error.message,
      consecutiveFailures: this.state.consecutiveFailures
    }, this.portfolioId);

    this.invokeCallback('onFailure', () => this.onFailure?.(error, this.getState()));

    if (this.isStopped()) {
      return;
    }
    if (error.requiresUserAction) {
      this.state.status = 'paused';
      this.auditService.warn('SCHEDULER_PAUSED', { kind: error.kind }, this.portfolioId);
      return;
    }
    this.state.status = 'waiting';
    this.armNextWake();
  }

  private invokeCallback(name: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.auditService.error('SCHEDULER_CALLBACK_FAILED', {
        callback: name,
        message: error instanceof Error ? error.message : String(error)
      }, this.portfolioId);
    }
  }

  private armNextWake(): void {
    this.clearWakeTimer();

    const now = this.clock();
    const nextWake = computeNextWake(now, this.scheduleOptions, this.timeZone, this.weekendPolicy);
    this.state.nextWakeAt = nextWake;

    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = undefined;
      if (this.state.status === 'waiting' && this.inFlight === null) {
        void this.launch('scheduled');
      }
    }, Math.max(0, nextWake.getTime() - now.getTime()));
  }

  private clearWakeTimer(): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = undefined;
    }
  }

  private classify(error: unknown): PortfolioError {
    return this.errorHandler.toPortfolioError(error, {
      operation: 'refresh',
      component: 'RefreshScheduler',
      portfolioId: this.portfolioId
    });
  }
}
