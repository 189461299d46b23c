/**
 * Portfolio Fetcher retrieves one portfolio's positions and reduces them to the published metrics
 */

import type { IProviderConnector } from '../connectors/ProviderConnector';
import type { PortfolioSnapshot, ProviderPortfolio, ProviderPosition } from '../models/Portfolio';
import { ErrorHandler, PortfolioError, isPortfolioError } from '../utils/ErrorHandler';
import { roundToCents } from '../utils/numberFormat';
import type { AuditService } from './AuditService';
import type { SessionManager } from './SessionManager';

export const POSITION_PORTFOLIO_TYPE = 'position';

export interface PortfolioFetcherOptions {
  /** Currency used when positions do not state one */
  defaultCurrency?: string;
  clock?: () => Date;
  errorHandler?: ErrorHandler;
}

/**
 * Reduces positions to the five published aggregates.
 * Percentages are relative to invested capital and resolve to 0 when it is 0.
 */
export function reducePositions(
  positions: ProviderPosition[],
  currency: string,
  fetchedAt: Date
): PortfolioSnapshot {
  const totals = positions.reduce(
    (sum, position) => ({
      marketValue: sum.marketValue + position.marketValue,
      openPL: sum.openPL + position.openPL,
      dailyPL: sum.dailyPL + position.dailyPL
    }),
    { marketValue: 0, openPL: 0, dailyPL: 0 }
  );

  const percentOf = (value: number): number =>
    totals.marketValue === 0 ? 0 : roundToCents((value / totals.marketValue) * 100);

  return Object.freeze({
    investedCapital: roundToCents(totals.marketValue),
    openPL: roundToCents(totals.openPL),
    openPLPercent: percentOf(totals.openPL),
    dailyPL: roundToCents(totals.dailyPL),
    dailyPLPercent: percentOf(totals.dailyPL),
    fetchedAt,
    currency
  });
}

/**
 * Keeps position-type entries only; watchlists are never tracked
 */
export function filterPositionPortfolios(portfolios: ProviderPortfolio[]): ProviderPortfolio[] {
  return portfolios.filter(portfolio => portfolio.type === POSITION_PORTFOLIO_TYPE);
}

export class PortfolioFetcher {
  private readonly connector: IProviderConnector;
  private readonly sessionManager: SessionManager;
  private readonly auditService: AuditService;
  private readonly errorHandler: ErrorHandler;
  private readonly defaultCurrency: string;
  private readonly clock: () => Date;

  constructor(
    connector: IProviderConnector,
    sessionManager: SessionManager,
    auditService: AuditService,
    options: PortfolioFetcherOptions = {}
  ) {
    this.connector = connector;
    this.sessionManager = sessionManager;
    this.auditService = auditService;
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.defaultCurrency = options.defaultCurrency ?? 'EUR';
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Single fetch with the given token; no re-authentication
   */
  async fetch(portfolioId: string, token: string, signal?: AbortSignal): Promise<PortfolioSnapshot> {
    try {
      const positions = await this.connector.getPositions(token, portfolioId, { signal });
      const currency = positions.find(position => position.currency)?.currency ?? this.defaultCurrency;
      return reducePositions(positions, currency, this.clock());
    } catch (error) {
      throw this.classify(error, 'fetch', portfolioId);
    }
  }

  /**
   * Fetch using the shared session. An expired token triggers one re-authentication
   * and one retry; a second rejection surfaces as InvalidCredentials.
   */
  async fetchWithSession(portfolioId: string, signal?: AbortSignal): Promise<PortfolioSnapshot> {
    return this.withSessionRetry('fetch', portfolioId, signal, token => this.fetch(portfolioId, token, signal));
  }

  /**
   * Lists the account's position portfolios
   */
  async listPortfolios(signal?: AbortSignal): Promise<ProviderPortfolio[]> {
    return this.withSessionRetry('listPortfolios', undefined, signal, async token => {
      try {
        const portfolios = await this.connector.listPortfolios(token, { signal });
        return filterPositionPortfolios(portfolios);
      } catch (error) {
        throw this.classify(error, 'listPortfolios');
      }
    });
  }

  private async withSessionRetry<T>(
    operation: string,
    portfolioId: string | undefined,
    signal: AbortSignal | undefined,
    call: (token: string) => Promise<T>
  ): Promise<T> {
    const token = await this.getToken(operation, portfolioId, signal);

    try {
      return await call(token);
    } catch (error) {
      if (!isPortfolioError(error, 'AuthExpired')) {
        throw error;
      }
      this.auditService.info('TOKEN_REJECTED', { operation }, portfolioId);
      this.sessionManager.invalidate(token);
    }

    const freshToken = await this.getToken(operation, portfolioId, signal);

    try {
      return await call(freshToken);
    } catch (error) {
      if (!isPortfolioError(error, 'AuthExpired')) {
        throw error;
      }
      this.auditService.error('TOKEN_REJECTED_AFTER_REAUTH', { operation }, portfolioId);
      throw new PortfolioError(
        'InvalidCredentials',
        'Provider rejected a freshly issued token',
        { operation, component: 'PortfolioFetcher', portfolioId, timestamp: new Date() },
        error
      );
    }
  }

  private async getToken(operation: string, portfolioId: string | undefined, signal: AbortSignal | undefined): Promise<string> {
    try {
      return await this.sessionManager.getValidToken(signal);
    } catch (error) {
      throw this.classify(error, operation, portfolioId);
    }
  }

  private classify(error: unknown, operation: string, portfolioId?: string): PortfolioError {
    return this.errorHandler.toPortfolioError(error, {
      operation,
      component: 'PortfolioFetcher',
      portfolioId
    });
  }
}
