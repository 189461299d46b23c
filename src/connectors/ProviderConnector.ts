/**
 * Provider Connector interface and base implementation
 * Provides the transport contract consumed by the session and fetch layers
 */

import type { ConnectorStatus, ConnectorHealthStatus } from '../models/ConnectorStatus';
import type { ProviderPortfolio, ProviderPosition } from '../models/Portfolio';

export interface AuthenticationResult {
  token: string;
  /** Token lifetime when the provider reports one */
  expiresInMs?: number;
  userId?: string;
  userEmail?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Standardized interface for portfolio data providers.
 * Implementations throw PortfolioError with a classified kind.
 */
export interface IProviderConnector {
  /**
   * Logs in and returns a session token
   */
  authenticate(email: string, password: string, options?: RequestOptions): Promise<AuthenticationResult>;

  /**
   * Lists every portfolio of the account, watchlists included
   */
  listPortfolios(token: string, options?: RequestOptions): Promise<ProviderPortfolio[]>;

  /**
   * Retrieves the holdings of one portfolio
   */
  getPositions(token: string, portfolioId: string, options?: RequestOptions): Promise<ProviderPosition[]>;

  /**
   * Gets current connector status
   */
  getStatus(): ConnectorStatus;
}

export interface StatusTrackingConfig {
  /** Window over which the error rate is computed */
  monitoringPeriodMs: number;
  /** Error rate above which the connector reports degraded */
  degradedErrorRate: number;
  /** Error rate above which the connector reports offline */
  offlineErrorRate: number;
}

/**
 * Base connector with latency and error-rate tracking
 */
export abstract class BaseProviderConnector implements IProviderConnector {
  protected readonly connectorId: string;
  protected readonly name: string;
  private readonly statusConfig: StatusTrackingConfig;

  private lastRequestAt: Date | null = null;
  private latency: number = 0;
  private recentRequests: { at: number; failed: boolean }[] = [];

  constructor(
    connectorId: string,
    name: string,
    statusConfig: StatusTrackingConfig = {
      monitoringPeriodMs: 3600000,
      degradedErrorRate: 0.1,
      offlineErrorRate: 0.9
    }
  ) {
    this.connectorId = connectorId;
    this.name = name;
    this.statusConfig = statusConfig;
  }

  /**
   * Runs a provider call and records its latency and outcome
   */
  protected async executeTracked<T>(operation: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    this.lastRequestAt = new Date(startTime);

    try {
      const result = await operation();
      this.recordOutcome(startTime, false);
      return result;
    } catch (error) {
      this.recordOutcome(startTime, true);
      throw error;
    }
  }

  private recordOutcome(startTime: number, failed: boolean): void {
    const now = Date.now();
    this.latency = now - startTime;
    this.recentRequests.push({ at: now, failed });

    const cutoff = now - this.statusConfig.monitoringPeriodMs;
    this.recentRequests = this.recentRequests.filter(request => request.at > cutoff);
  }

  private getErrorRate(): number {
    if (this.recentRequests.length === 0) {
      return 0;
    }
    const failures = this.recentRequests.filter(request => request.failed).length;
    return failures / this.recentRequests.length;
  }

  abstract authenticate(email: string, password: string, options?: RequestOptions): Promise<AuthenticationResult>;
  abstract listPortfolios(token: string, options?: RequestOptions): Promise<ProviderPortfolio[]>;
  abstract getPositions(token: string, portfolioId: string, options?: RequestOptions): Promise<ProviderPosition[]>;

  /**
   * Get connector capabilities
   */
  protected abstract getCapabilities(): string[];

  /**
   * Get current connector status
   */
  getStatus(): ConnectorStatus {
    const errorRate = this.getErrorRate();
    let status: ConnectorHealthStatus;

    if (errorRate > this.statusConfig.offlineErrorRate) {
      status = 'offline';
    } else if (errorRate > this.statusConfig.degradedErrorRate) {
      status = 'degraded';
    } else {
      status = 'healthy';
    }

    return {
      connectorId: this.connectorId,
      name: this.name,
      status,
      lastRequestAt: this.lastRequestAt,
      latency: this.latency,
      errorRate,
      capabilities: this.getCapabilities()
    };
  }
}
