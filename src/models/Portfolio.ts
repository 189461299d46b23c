/**
 * Portfolio configuration, snapshot and schedule models
 */

import type { PortfolioError } from '../utils/ErrorHandler';

export type WeekendPolicy = 'checkpoints' | 'skip';

export interface ScheduleOptions {
  /** Minutes between weekday intraday refreshes */
  intervalMinutes: number;
  /** First intraday slot, local hour */
  startHour: number;
  /** Intraday slots stop before this local hour */
  endHour: number;
  /** Daily evening checkpoint, "HH:MM" */
  nightUpdate: string;
  /** Daily early checkpoint, "HH:MM" */
  morningUpdate: string;
}

export const DEFAULT_SCHEDULE_OPTIONS: Readonly<ScheduleOptions> = Object.freeze({
  intervalMinutes: 15,
  startHour: 9,
  endHour: 21,
  nightUpdate: '22:05',
  morningUpdate: '04:00'
});

export interface PortfolioConfig {
  portfolioId: string;
  displayName: string;
  scheduleOptions: ScheduleOptions;
}

export interface PortfolioSnapshot {
  investedCapital: number;
  openPL: number;
  openPLPercent: number;
  dailyPL: number;
  dailyPLPercent: number;
  fetchedAt: Date;
  currency: string;
}

export type SchedulerStatus = 'idle' | 'waiting' | 'fetching' | 'cooldown' | 'paused' | 'stopped';

export interface ScheduleState {
  status: SchedulerStatus;
  nextWakeAt: Date | null;
  lastAttemptAt: Date | null;
  lastSuccessAt: Date | null;
  inFlight: boolean;
  consecutiveFailures: number;
  lastError: PortfolioError | null;
}

export interface PortfolioStatus {
  config: PortfolioConfig;
  snapshot: PortfolioSnapshot | null;
  schedule: ScheduleState;
  lastErrorAt: Date | null;
}

/**
 * Portfolio entry as listed by the provider
 */
export interface ProviderPortfolio {
  id: string;
  type: string;
  name: string;
}

/**
 * Single holding as returned by the provider
 */
export interface ProviderPosition {
  symbol?: string;
  marketValue: number;
  openPL: number;
  dailyPL: number;
  currency?: string;
}
