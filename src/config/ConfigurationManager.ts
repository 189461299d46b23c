/**
 * Configuration Manager for application settings and environment-specific configuration
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { LogLevel } from '../models/AuditEvent';
import { DEFAULT_SCHEDULE_OPTIONS } from '../models/Portfolio';
import type { PortfolioConfig, ScheduleOptions, WeekendPolicy } from '../models/Portfolio';
import { DEFAULT_API_URL } from '../connectors/providers/InvestingConnector';
import { parseTimeOfDay } from '../utils/marketSchedule';
import { isValidTimeZone } from '../utils/zonedTime';

export type Environment = 'development' | 'staging' | 'production';

export interface ServerConfig {
  port: number;
  host: string;
}

export interface ProviderConfig {
  apiUrl: string;
  timeoutMs: number;
  /** Currency reported when positions do not state one */
  currency: string;
  /** Seed for the device id; the login email is used when absent */
  deviceSeed?: string;
  /** Token lifetime to assume; tokens are renewed on rejection when absent */
  tokenTtlMs?: number;
  email?: string;
  password?: string;
}

export interface ApplicationConfig {
  environment: Environment;
  version: string;
  logLevel: LogLevel;
  timeZone: string;
  weekendPolicy: WeekendPolicy;
  transientNotifyThreshold: number;
  server: ServerConfig;
  provider: ProviderConfig;
  portfolios: PortfolioConfig[];
}

export interface ConfigValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

export interface EnvironmentVariables {
  NODE_ENV?: string;
  PORT?: string;
  HOST?: string;
  LOG_LEVEL?: string;
  PORTFOLIO_TIMEZONE?: string;
  PORTFOLIO_WEEKEND_POLICY?: string;
  PROVIDER_EMAIL?: string;
  PROVIDER_PASSWORD?: string;
  PROVIDER_API_URL?: string;
  PROVIDER_TIMEOUT_MS?: string;
  [key: string]: string | undefined;
}

/** Loaded settings before defaults are applied; invalid values are kept for validation */
interface ConfigOverrides {
  environment?: Environment;
  version?: string;
  logLevel?: string;
  timeZone?: string;
  weekendPolicy?: string;
  transientNotifyThreshold?: number;
  server?: Partial<ServerConfig>;
  provider?: Partial<ProviderConfig>;
  portfolios?: PortfolioConfig[];
}

export type ObjectSection = 'server' | 'provider';

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const WEEKEND_POLICIES: readonly WeekendPolicy[] = ['checkpoints', 'skip'];

export const DEFAULT_CONFIG_PATH = path.join('config', 'portfolio-sync.json');

export class ConfigurationManager {
  private config: ApplicationConfig;
  private readonly configFilePath: string;
  private readonly env: EnvironmentVariables;

  constructor(configFilePath: string = DEFAULT_CONFIG_PATH, env: EnvironmentVariables = process.env) {
    this.configFilePath = configFilePath;
    this.env = env;
    this.config = getDefaultConfiguration();
  }

  /**
   * Loads configuration from file and environment variables
   */
  async loadConfiguration(): Promise<void> {
    try {
      const errors: ConfigValidationError[] = [];

      const fileConfig = await this.loadConfigurationFromFile(errors);
      const envConfig = this.loadConfigurationFromEnvironment();

      // environment takes precedence over the file
      const merged = mergeConfigurations(mergeConfigurations(getDefaultConfiguration(), fileConfig), envConfig);

      const validation = validateConfiguration(merged);
      errors.push(...validation.errors);
      if (errors.length > 0) {
        throw new Error(`Configuration validation failed: ${formatErrors(errors)}`);
      }

      this.config = toApplicationConfig(merged);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to load configuration: ${errorMessage}`);
    }
  }

  /**
   * Gets the current configuration
   */
  getConfiguration(): ApplicationConfig {
    return structuredClone(this.config);
  }

  /**
   * Gets a specific configuration section
   */
  getConfigSection<T extends keyof ApplicationConfig>(section: T): ApplicationConfig[T] {
    return structuredClone(this.config[section]);
  }

  /**
   * Updates a configuration section; nothing changes when the result is invalid
   */
  updateConfigSection<T extends ObjectSection>(section: T, updates: Partial<ApplicationConfig[T]>): void {
    const candidate = structuredClone(this.config);
    Object.assign(candidate[section], updates);

    const validation = this.validateConfiguration(candidate);
    if (!validation.isValid) {
      throw new Error(`Configuration update failed validation: ${formatErrors(validation.errors)}`);
    }
    this.config = candidate;
  }

  /**
   * Validates the entire configuration
   */
  validateConfiguration(config: ApplicationConfig): ConfigValidationResult {
    return validateConfiguration(config);
  }

  /**
   * Reloads configuration from sources
   */
  async reloadConfiguration(): Promise<void> {
    await this.loadConfiguration();
  }

  getConfigFilePath(): string {
    return this.configFilePath;
  }

  /**
   * Gets environment-specific configuration overrides
   */
  private loadConfigurationFromEnvironment(): ConfigOverrides {
    const env = this.env;
    const envConfig: ConfigOverrides = {};

    if (env.NODE_ENV && isOneOf(env.NODE_ENV, ENVIRONMENTS)) {
      envConfig.environment = env.NODE_ENV;
    }

    if (env.LOG_LEVEL) {
      envConfig.logLevel = env.LOG_LEVEL;
    }

    if (env.PORTFOLIO_TIMEZONE) {
      envConfig.timeZone = env.PORTFOLIO_TIMEZONE;
    }

    if (env.PORTFOLIO_WEEKEND_POLICY) {
      envConfig.weekendPolicy = env.PORTFOLIO_WEEKEND_POLICY;
    }

    if (env.PORT || env.HOST) {
      envConfig.server = {
        ...(env.PORT && { port: Number(env.PORT) }),
        ...(env.HOST && { host: env.HOST })
      };
    }

    if (env.PROVIDER_EMAIL || env.PROVIDER_PASSWORD || env.PROVIDER_API_URL || env.PROVIDER_TIMEOUT_MS) {
      envConfig.provider = {
        ...(env.PROVIDER_EMAIL && { email: env.PROVIDER_EMAIL }),
        ...(env.PROVIDER_PASSWORD && { password: env.PROVIDER_PASSWORD }),
        ...(env.PROVIDER_API_URL && { apiUrl: env.PROVIDER_API_URL }),
        ...(env.PROVIDER_TIMEOUT_MS && { timeoutMs: Number(env.PROVIDER_TIMEOUT_MS) })
      };
    }

    return envConfig;
  }

  /**
   * Loads configuration from file; a missing file contributes nothing
   */
  private async loadConfigurationFromFile(errors: ConfigValidationError[]): Promise<ConfigOverrides> {
    let text: string;
    try {
      text = await fs.readFile(this.configFilePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    const raw: unknown = JSON.parse(text);
    return parseFileConfiguration(raw, errors);
  }
}

/**
 * Gets default configuration
 */
export function getDefaultConfiguration(): ApplicationConfig {
  return {
    environment: 'development',
    version: '1.0.0',
    logLevel: 'info',
    timeZone: 'UTC',
    weekendPolicy: 'checkpoints',
    transientNotifyThreshold: 3,
    server: {
      port: 3000,
      host: 'localhost'
    },
    provider: {
      apiUrl: DEFAULT_API_URL,
      timeoutMs: 30000,
      currency: 'EUR'
    },
    portfolios: []
  };
}

/**
 * Validates the entire configuration
 */
export function validateConfiguration(config: MergedConfig): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];

  if (!isOneOf(config.environment, ENVIRONMENTS)) {
    errors.push({
      path: 'environment',
      message: 'Environment must be development, staging, or production',
      value: config.environment
    });
  }

  if (!isOneOf(config.logLevel, LOG_LEVELS)) {
    errors.push({
      path: 'logLevel',
      message: 'Log level must be debug, info, warn or error',
      value: config.logLevel
    });
  }

  if (!isValidTimeZone(config.timeZone)) {
    errors.push({
      path: 'timeZone',
      message: 'Time zone must be a valid IANA zone name',
      value: config.timeZone
    });
  }

  if (!isOneOf(config.weekendPolicy, WEEKEND_POLICIES)) {
    errors.push({
      path: 'weekendPolicy',
      message: 'Weekend policy must be checkpoints or skip',
      value: config.weekendPolicy
    });
  }

  if (!Number.isInteger(config.transientNotifyThreshold) || config.transientNotifyThreshold < 1) {
    errors.push({
      path: 'transientNotifyThreshold',
      message: 'Transient notify threshold must be a positive integer',
      value: config.transientNotifyThreshold
    });
  }

  errors.push(...validateServerConfig(config.server));
  errors.push(...validateProviderConfig(config.provider));
  errors.push(...validatePortfolios(config.portfolios));

  return {
    isValid: errors.length === 0,
    errors
  };
}

/**
 * Validates one portfolio's schedule options
 */
export function validateScheduleOptions(options: ScheduleOptions, basePath: string): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (!Number.isInteger(options.intervalMinutes) || options.intervalMinutes < 1 || options.intervalMinutes > 60) {
    errors.push({
      path: `${basePath}.intervalMinutes`,
      message: 'Interval must be a whole number of minutes between 1 and 60',
      value: options.intervalMinutes
    });
  }

  if (!Number.isInteger(options.startHour) || options.startHour < 0 || options.startHour > 23) {
    errors.push({
      path: `${basePath}.startHour`,
      message: 'Start hour must be between 0 and 23',
      value: options.startHour
    });
  }

  if (!Number.isInteger(options.endHour) || options.endHour < 0 || options.endHour > 23) {
    errors.push({
      path: `${basePath}.endHour`,
      message: 'End hour must be between 0 and 23',
      value: options.endHour
    });
  } else if (options.endHour <= options.startHour) {
    errors.push({
      path: `${basePath}.endHour`,
      message: 'End hour must be after start hour',
      value: options.endHour
    });
  }

  for (const field of ['nightUpdate', 'morningUpdate'] as const) {
    try {
      parseTimeOfDay(options[field]);
    } catch (error) {
      errors.push({
        path: `${basePath}.${field}`,
        message: error instanceof Error ? error.message : 'Invalid time of day',
        value: options[field]
      });
    }
  }

  return errors;
}

function validateServerConfig(config: ServerConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push({
      path: 'server.port',
      message: 'Port must be between 1 and 65535',
      value: config.port
    });
  }

  if (!config.host || config.host.trim().length === 0) {
    errors.push({
      path: 'server.host',
      message: 'Host is required',
      value: config.host
    });
  }

  return errors;
}

function validateProviderConfig(config: ProviderConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (!/^https?:\/\/\S+$/.test(config.apiUrl)) {
    errors.push({
      path: 'provider.apiUrl',
      message: 'Provider API URL must be an http(s) URL',
      value: config.apiUrl
    });
  }

  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs < 1000) {
    errors.push({
      path: 'provider.timeoutMs',
      message: 'Provider timeout must be at least 1000ms',
      value: config.timeoutMs
    });
  }

  if (!/^[A-Z]{3}$/.test(config.currency)) {
    errors.push({
      path: 'provider.currency',
      message: 'Currency must be a three-letter ISO code',
      value: config.currency
    });
  }

  if (config.tokenTtlMs !== undefined && (!Number.isFinite(config.tokenTtlMs) || config.tokenTtlMs <= 0)) {
    errors.push({
      path: 'provider.tokenTtlMs',
      message: 'Token lifetime must be positive',
      value: config.tokenTtlMs
    });
  }

  return errors;
}

function validatePortfolios(portfolios: PortfolioConfig[]): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];
  const seen = new Set<string>();

  portfolios.forEach((portfolio, index) => {
    const basePath = `portfolios[${index}]`;

    if (!portfolio.portfolioId || portfolio.portfolioId.trim().length === 0) {
      errors.push({
        path: `${basePath}.portfolioId`,
        message: 'Portfolio id is required',
        value: portfolio.portfolioId
      });
    } else if (seen.has(portfolio.portfolioId)) {
      errors.push({
        path: `${basePath}.portfolioId`,
        message: `Portfolio id ${portfolio.portfolioId} is configured more than once`,
        value: portfolio.portfolioId
      });
    }
    seen.add(portfolio.portfolioId);

    if (!portfolio.displayName || portfolio.displayName.trim().length === 0) {
      errors.push({
        path: `${basePath}.displayName`,
        message: 'Display name is required',
        value: portfolio.displayName
      });
    }

    errors.push(...validateScheduleOptions(portfolio.scheduleOptions, `${basePath}.scheduleOptions`));
  });

  return errors;
}

/** Configuration after merging, with enumerated fields not yet checked */
export type MergedConfig = Omit<ApplicationConfig, 'logLevel' | 'weekendPolicy'> & {
  logLevel: string;
  weekendPolicy: string;
};

function mergeConfigurations(base: MergedConfig, override: ConfigOverrides): MergedConfig {
  return {
    environment: override.environment ?? base.environment,
    version: override.version ?? base.version,
    logLevel: override.logLevel ?? base.logLevel,
    timeZone: override.timeZone ?? base.timeZone,
    weekendPolicy: override.weekendPolicy ?? base.weekendPolicy,
    transientNotifyThreshold: override.transientNotifyThreshold ?? base.transientNotifyThreshold,
    server: { ...base.server, ...override.server },
    provider: { ...base.provider, ...override.provider },
    portfolios: override.portfolios ?? base.portfolios
  };
}

function toApplicationConfig(merged: MergedConfig): ApplicationConfig {
  const { logLevel, weekendPolicy } = merged;
  if (!isOneOf(logLevel, LOG_LEVELS) || !isOneOf(weekendPolicy, WEEKEND_POLICIES)) {
    throw new Error('Configuration must be validated before use');
  }
  return { ...merged, logLevel, weekendPolicy };
}

/**
 * Reads the JSON file into overrides, recording values of the wrong type
 */
function parseFileConfiguration(raw: unknown, errors: ConfigValidationError[]): ConfigOverrides {
  if (!isRecord(raw)) {
    errors.push({ path: '', message: 'Configuration file must contain a JSON object' });
    return {};
  }

  const reader = new FieldReader(errors);
  const overrides: ConfigOverrides = {};

  const environment = reader.string(raw, 'environment');
  if (environment !== undefined) {
    if (isOneOf(environment, ENVIRONMENTS)) {
      overrides.environment = environment;
    } else {
      errors.push({ path: 'environment', message: 'Environment must be development, staging, or production', value: environment });
    }
  }

  overrides.version = reader.string(raw, 'version');
  overrides.logLevel = reader.string(raw, 'logLevel');
  overrides.timeZone = reader.string(raw, 'timeZone');
  overrides.weekendPolicy = reader.string(raw, 'weekendPolicy');
  overrides.transientNotifyThreshold = reader.number(raw, 'transientNotifyThreshold');

  const server = reader.record(raw, 'server');
  if (server) {
    overrides.server = compact({
      port: reader.number(server, 'port', 'server'),
      host: reader.string(server, 'host', 'server')
    });
  }

  const provider = reader.record(raw, 'provider');
  if (provider) {
    overrides.provider = compact({
      apiUrl: reader.string(provider, 'apiUrl', 'provider'),
      timeoutMs: reader.number(provider, 'timeoutMs', 'provider'),
      currency: reader.string(provider, 'currency', 'provider'),
      deviceSeed: reader.string(provider, 'deviceSeed', 'provider'),
      tokenTtlMs: reader.number(provider, 'tokenTtlMs', 'provider'),
      email: reader.string(provider, 'email', 'provider'),
      password: reader.string(provider, 'password', 'provider')
    });
  }

  if (raw.portfolios !== undefined) {
    if (Array.isArray(raw.portfolios)) {
      overrides.portfolios = raw.portfolios.flatMap((entry: unknown, index: number) => {
        const portfolio = parsePortfolio(entry, `portfolios[${index}]`, reader);
        return portfolio ? [portfolio] : [];
      });
    } else {
      errors.push({ path: 'portfolios', message: 'Portfolios must be an array', value: raw.portfolios });
    }
  }

  return compact(overrides);
}

function parsePortfolio(entry: unknown, basePath: string, reader: FieldReader): PortfolioConfig | null {
  if (!isRecord(entry)) {
    reader.fail(basePath, 'Portfolio entry must be an object', entry);
    return null;
  }

  const portfolioId = reader.string(entry, 'portfolioId', basePath) ?? '';
  const displayName = reader.string(entry, 'displayName', basePath) ?? `Portfolio ${portfolioId}`;

  const schedulePath = `${basePath}.scheduleOptions`;
  const schedule = reader.record(entry, 'scheduleOptions', basePath) ?? {};

  return {
    portfolioId,
    displayName,
    scheduleOptions: {
      intervalMinutes: reader.number(schedule, 'intervalMinutes', schedulePath) ?? DEFAULT_SCHEDULE_OPTIONS.intervalMinutes,
      startHour: reader.number(schedule, 'startHour', schedulePath) ?? DEFAULT_SCHEDULE_OPTIONS.startHour,
      endHour: reader.number(schedule, 'endHour', schedulePath) ?? DEFAULT_SCHEDULE_OPTIONS.endHour,
      nightUpdate: reader.string(schedule, 'nightUpdate', schedulePath) ?? DEFAULT_SCHEDULE_OPTIONS.nightUpdate,
      morningUpdate: reader.string(schedule, 'morningUpdate', schedulePath) ?? DEFAULT_SCHEDULE_OPTIONS.morningUpdate
    }
  };
}

/**
 * Typed field access on parsed JSON with path-addressed errors
 */
class FieldReader {
  constructor(private readonly errors: ConfigValidationError[]) {}

  string(source: Record<string, unknown>, key: string, basePath?: string): string | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value === 'string') return value;
    this.fail(joinPath(basePath, key), 'Expected a string', value);
    return undefined;
  }

  number(source: Record<string, unknown>, key: string, basePath?: string): number | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value === 'number') return value;
    this.fail(joinPath(basePath, key), 'Expected a number', value);
    return undefined;
  }

  record(source: Record<string, unknown>, key: string, basePath?: string): Record<string, unknown> | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (isRecord(value)) return value;
    this.fail(joinPath(basePath, key), 'Expected an object', value);
    return undefined;
  }

  fail(path: string, message: string, value: unknown): void {
    this.errors.push({ path, message, value });
  }
}

function joinPath(basePath: string | undefined, key: string): string {
  return basePath ? `${basePath}.${key}` : key;
}

/**
 * Drops keys whose value is undefined so they do not override defaults
 */
function compact<T extends object>(value: T): T {
  const result = { ...value };
  for (const key of Object.keys(result)) {
    if (Reflect.get(result, key) === undefined) {
      Reflect.deleteProperty(result, key);
    }
  }
  return result;
}

function formatErrors(errors: ConfigValidationError[]): string {
  return errors.map(e => (e.path ? `${e.path}: ${e.message}` : e.message)).join(', ');
}

function isOneOf<T extends string>(value: string, allowed: readonly T[]): value is T {
  return allowed.some(candidate => candidate === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
