/**
 * Investing.com mobile API connector
 * Implements the Provider Connector interface over the app's login and portfolio endpoints
 */

import { createHash } from 'crypto';
import { BaseProviderConnector } from '../ProviderConnector';
import type { AuthenticationResult, RequestOptions } from '../ProviderConnector';
import type { HttpRequest, HttpResponse, HttpTransport } from '../HttpTransport';
import { FetchTransport } from '../HttpTransport';
import type { ProviderPortfolio, ProviderPosition } from '../../models/Portfolio';
import { PortfolioError } from '../../utils/ErrorHandler';
import type { PortfolioErrorKind } from '../../utils/ErrorHandler';
import { parseEuropeanNumber } from '../../utils/numberFormat';
import type { AuditService } from '../../services/AuditService';

export const DEFAULT_API_URL = 'https://aappapi.investing.com';

/** API error code for an expired or unknown x-token / x-udid pair */
export const ERROR_TOKEN_EXPIRED = '1001';
/** API error code for an unknown portfolio id */
export const ERROR_INVALID_PORTFOLIO = '203';

const USER_AGENT = 'Dalvik/2.1.0 (Linux; U; Android 10; Pixel 3 Build/QQ1D.200105.002)';

export interface InvestingConnectorOptions {
  /** Device id sent as x-udid; must stay stable for a token to remain valid */
  deviceId: string;
  apiUrl?: string;
  timeoutMs?: number;
  appVersion?: string;
  metaVersion?: string;
  internalVersion?: string;
  transport?: HttpTransport;
  auditService?: AuditService;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Investing.com Connector
 */
export class InvestingConnector extends BaseProviderConnector {
  private readonly apiUrl: string;
  private readonly deviceId: string;
  private readonly timeoutMs: number;
  private readonly appVersion: string;
  private readonly metaVersion: string;
  private readonly internalVersion: string;
  private readonly transport: HttpTransport;
  private readonly auditService?: AuditService;

  constructor(options: InvestingConnectorOptions) {
    super('investing', 'Investing.com');
    this.deviceId = options.deviceId;
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.appVersion = options.appVersion ?? '1408';
    this.metaVersion = options.metaVersion ?? '14';
    this.internalVersion = options.internalVersion ?? '1293';
    this.transport = options.transport ?? new FetchTransport(this.timeoutMs);
    this.auditService = options.auditService;
  }

  /**
   * Log in with email and plain password (hashed before sending)
   */
  async authenticate(email: string, password: string, options: RequestOptions = {}): Promise<AuthenticationResult> {
    const passwordHash = createHash('md5').update(password).digest('hex');
    const url = this.buildUrl('login_api.php', { action: 'login' });

    const body = new URLSearchParams({
      internal_version: this.internalVersion,
      reg_initiator: 'Side Menu Sign In',
      email,
      smssupport: '1',
      password: passwordHash,
      reg_source: 'android'
    }).toString();

    this.auditService?.debug('PROVIDER_LOGIN_ATTEMPT', { email });

    const response = await this.send('authenticate', {
      method: 'POST',
      url,
      headers: {
        ...this.baseHeaders(),
        'Content-Type': 'application/x-www-form-urlencoded'
      },
      body,
      signal: options.signal
    });

    if (response.status === 401 || response.status === 403) {
      throw this.createError('InvalidCredentials', 'authenticate', `Login rejected with HTTP ${response.status}`);
    }
    if (response.status !== 200) {
      throw this.createError('NetworkError', 'authenticate', `HTTP error ${response.status}`);
    }
    if (!isRecord(response.body)) {
      throw this.createError('DecodeError', 'authenticate', 'Login response is not a JSON object');
    }

    const system = response.body.system;
    if (isRecord(system) && system.status === 'error') {
      const messages = isRecord(system.messages) ? system.messages : {};
      const displayMessage = readString(messages.display_message) ?? 'Unknown error';
      throw this.createError('InvalidCredentials', 'authenticate', `Login failed: ${displayMessage}`);
    }

    const data = response.body.data;
    if (!isRecord(data)) {
      throw this.createError('DecodeError', 'authenticate', 'Login response has no data');
    }

    if (Array.isArray(data.errors)) {
      const firstError: unknown = data.errors[0];
      const fieldError = isRecord(firstError) ? readString(firstError.fieldError) : undefined;
      throw this.createError('InvalidCredentials', 'authenticate', `Login failed: ${fieldError ?? 'Login failed'}`);
    }

    const token = readString(data.token);
    if (!token) {
      throw this.createError('DecodeError', 'authenticate', 'No token in login response');
    }

    this.auditService?.info('PROVIDER_LOGIN_SUCCESS', { email: readString(data.user_email) ?? email });

    return {
      token,
      userId: readString(data.user_ID),
      userEmail: readString(data.user_email)
    };
  }

  /**
   * List all portfolios of the account
   */
  async listPortfolios(token: string, options: RequestOptions = {}): Promise<ProviderPortfolio[]> {
    const url = this.buildUrl('portfolio_api.php', [
      {
        action: 'get_all_portfolios_new',
        bring_sums: false,
        include_pair_attr: false,
        include_pairs: true
      }
    ]);

    const response = await this.send('listPortfolios', {
      method: 'GET',
      url,
      headers: { ...this.baseHeaders(), 'x-token': token, Accept: 'application/json' },
      signal: options.signal
    });

    const screenData = this.readScreenData(response, 'listPortfolios');
    if (screenData === null) {
      return [];
    }

    const entries = screenData.portfolio;
    if (!Array.isArray(entries)) {
      throw this.createError('DecodeError', 'listPortfolios', 'Portfolio list is missing from the response');
    }

    return entries.filter(isRecord).map((entry): ProviderPortfolio => ({
      id: readString(entry.portfolio_id) ?? '',
      name: readString(entry.portfolio_name) ?? '',
      type: readString(entry.portfolioType) ?? 'unknown'
    }));
  }

  /**
   * Retrieve the open positions of one portfolio
   */
  async getPositions(token: string, portfolioId: string, options: RequestOptions = {}): Promise<ProviderPosition[]> {
    const numericId = Number(portfolioId);
    const url = this.buildUrl('portfolio_api.php', {
      action: 'get_portfolio_positions',
      bring_sums: false,
      include_pair_attr: false,
      pair_id: 0,
      portfolioid: Number.isNaN(numericId) ? portfolioId : numericId,
      positionType: 'open'
    });

    const response = await this.send('getPositions', {
      method: 'GET',
      url,
      headers: { ...this.baseHeaders(), 'x-token': token },
      signal: options.signal
    }, portfolioId);

    const screenData = this.readScreenData(response, 'getPositions', portfolioId);
    if (screenData === null) {
      throw this.createError('DecodeError', 'getPositions', 'No data in positions response', portfolioId);
    }

    const positions = screenData.positions;
    if (!Array.isArray(positions)) {
      throw this.createError('DecodeError', 'getPositions', 'Positions are missing from the response', portfolioId);
    }

    return positions.filter(isRecord).map((position): ProviderPosition => ({
      symbol: readString(position.symbol),
      marketValue: this.readNumber(position.MarketValue, 'MarketValue', portfolioId),
      openPL: this.readNumber(position.OpenPL, 'OpenPL', portfolioId),
      dailyPL: this.readNumber(position.DailyPL, 'DailyPL', portfolioId),
      currency: readString(position.currency)
    }));
  }

  protected getCapabilities(): string[] {
    return ['login', 'portfolio_list', 'portfolio_positions'];
  }

  /**
   * Sends a request, mapping transport failures to NetworkError
   */
  private async send(operation: string, request: HttpRequest, portfolioId?: string): Promise<HttpResponse> {
    return this.executeTracked(async () => {
      let response: HttpResponse;
      try {
        response = await this.transport.request({ timeoutMs: this.timeoutMs, ...request });
      } catch (error) {
        const cause = error instanceof Error ? error : undefined;
        const message = cause?.message ?? String(error);
        throw this.createError('NetworkError', operation, `Request failed: ${message}`, portfolioId, cause);
      }

      if (response.status === 401 && operation !== 'authenticate') {
        throw this.createError('AuthExpired', operation, 'Token rejected with HTTP 401', portfolioId);
      }
      return response;
    });
  }

  /**
   * Checks the API status block and returns data[0].screen_data, or null when data is empty
   */
  private readScreenData(response: HttpResponse, operation: string, portfolioId?: string): JsonRecord | null {
    if (response.status !== 200) {
      throw this.createError('NetworkError', operation, `HTTP error ${response.status}`, portfolioId);
    }
    if (!isRecord(response.body)) {
      throw this.createError('DecodeError', operation, 'Response is not a JSON object', portfolioId);
    }

    const system = response.body.system;
    if (isRecord(system) && system.status === 'failed') {
      const errorCode = readString(system.message_error_code) ?? 'unknown';
      if (errorCode === ERROR_TOKEN_EXPIRED) {
        throw this.createError('AuthExpired', operation, 'Token expired or invalid', portfolioId);
      }
      if (errorCode === ERROR_INVALID_PORTFOLIO) {
        throw this.createError('PortfolioNotFound', operation, `Portfolio ${portfolioId ?? ''} not found`.trim(), portfolioId);
      }
      throw this.createError('NetworkError', operation, `API error: ${errorCode}`, portfolioId);
    }

    const data = response.body.data;
    if (data === undefined || (Array.isArray(data) && data.length === 0)) {
      return null;
    }
    if (!Array.isArray(data) || !isRecord(data[0]) || !isRecord(data[0].screen_data)) {
      throw this.createError('DecodeError', operation, 'Missing expected screen_data', portfolioId);
    }

    return data[0].screen_data;
  }

  private readNumber(value: unknown, field: string, portfolioId: string): number {
    const parsed = typeof value === 'string' || typeof value === 'number' ? parseEuropeanNumber(value) : 0;
    if (parsed === null) {
      this.auditService?.warn('UNPARSEABLE_NUMBER', { field, value: String(value) }, portfolioId);
      return 0;
    }
    return parsed;
  }

  private buildUrl(endpoint: string, data: unknown): string {
    const params = new URLSearchParams({
      time_utc_offset: '3600',
      skinID: '2',
      lang_ID: '4',
      data: JSON.stringify(data)
    });
    return `${this.apiUrl}/${endpoint}?${params.toString()}`;
  }

  private baseHeaders(): Record<string, string> {
    return {
      'User-Agent': USER_AGENT,
      'x-udid': this.deviceId,
      'x-app-ver': this.appVersion,
      'x-meta-ver': this.metaVersion
    };
  }

  private createError(
    kind: PortfolioErrorKind,
    operation: string,
    message: string,
    portfolioId?: string,
    originalError?: Error
  ): PortfolioError {
    return new PortfolioError(
      kind,
      message,
      {
        operation,
        component: 'InvestingConnector',
        portfolioId,
        timestamp: new Date()
      },
      originalError
    );
  }
}
