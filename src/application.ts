/**
 * Wires the update core from a loaded configuration
 */

import type { ApplicationConfig } from './config/ConfigurationManager';
import type { HttpTransport } from './connectors/HttpTransport';
import { InvestingConnector } from './connectors/providers/InvestingConnector';
import type { CredentialsProvider } from './models/Session';
import { AuditService } from './services/AuditService';
import type { AuditSink } from './services/AuditService';
import { NotificationService } from './services/NotificationService';
import { PortfolioCoordinator } from './services/PortfolioCoordinator';
import { PortfolioFetcher } from './services/PortfolioFetcher';
import { SessionManager } from './services/SessionManager';
import { ErrorHandler } from './utils/ErrorHandler';
import { generateDeviceId } from './utils/identifiers';

export interface ApplicationDependencies {
  credentialsProvider: CredentialsProvider;
  transport?: HttpTransport;
  auditSink?: AuditSink;
  clock?: () => Date;
}

export interface PortfolioSyncApplication {
  auditService: AuditService;
  errorHandler: ErrorHandler;
  connector: InvestingConnector;
  sessionManager: SessionManager;
  fetcher: PortfolioFetcher;
  notificationService: NotificationService;
  coordinator: PortfolioCoordinator;
}

export function createApplication(
  config: ApplicationConfig,
  dependencies: ApplicationDependencies
): PortfolioSyncApplication {
  const clock = dependencies.clock ?? (() => new Date());
  const auditService = new AuditService({ logLevel: config.logLevel, sink: dependencies.auditSink });
  const errorHandler = new ErrorHandler();

  const connector = new InvestingConnector({
    deviceId: generateDeviceId(config.provider.deviceSeed ?? config.provider.email),
    apiUrl: config.provider.apiUrl,
    timeoutMs: config.provider.timeoutMs,
    transport: dependencies.transport,
    auditService
  });

  const sessionManager = new SessionManager(connector, dependencies.credentialsProvider, auditService, {
    tokenTtlMs: config.provider.tokenTtlMs,
    clock,
    errorHandler
  });

  const fetcher = new PortfolioFetcher(connector, sessionManager, auditService, {
    defaultCurrency: config.provider.currency,
    clock,
    errorHandler
  });

  const notificationService = new NotificationService(auditService, clock);

  const coordinator = new PortfolioCoordinator(sessionManager, fetcher, auditService, {
    timeZone: config.timeZone,
    weekendPolicy: config.weekendPolicy,
    transientNotifyThreshold: config.transientNotifyThreshold,
    notificationService,
    clock,
    errorHandler
  });

  return { auditService, errorHandler, connector, sessionManager, fetcher, notificationService, coordinator };
}
