import { createServer, IncomingMessage, ServerResponse } from 'http';
import { createApplication } from '../application';
import { ConfigCredentialsProvider } from '../config/ConfigCredentialsProvider';
import { ConfigurationManager } from '../config/ConfigurationManager';
import type { IProviderConnector } from '../connectors/ProviderConnector';
import type { PortfolioStatus } from '../models/Portfolio';
import { consoleSink } from '../services/AuditService';
import type { AuditService } from '../services/AuditService';
import type { PortfolioCoordinator } from '../services/PortfolioCoordinator';
import { isPortfolioError } from '../utils/ErrorHandler';
import type { PortfolioError, PortfolioErrorKind } from '../utils/ErrorHandler';
import { toSensorReadings } from './readings';

export interface ApiRequest {
  method: string;
  path: string;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface ApiContext {
  coordinator: PortfolioCoordinator;
  connector: IProviderConnector;
  version: string;
  defaultCurrency: string;
}

// provider-side failures not listed here answer 502
const ERROR_STATUS: Partial<Record<PortfolioErrorKind, number>> = {
  UnknownPortfolio: 404,
  Cancelled: 409
};

const PORTFOLIO_ROUTE = /^\/api\/portfolios\/([^/]+)(?:\/(sensors|refresh))?\/?$/;

/**
 * Routes one API request; no socket involved
 */
export async function handleApiRoute(request: ApiRequest, context: ApiContext): Promise<ApiResponse> {
  const { method, path } = request;
  const { coordinator } = context;

  if (path === '/api/health') {
    if (method !== 'GET') return methodNotAllowed();
    const connector = context.connector.getStatus();
    const portfolios = coordinator.listPortfolios();
    return {
      status: 200,
      body: {
        status: connector.status === 'healthy' ? 'healthy' : 'degraded',
        version: context.version,
        timestamp: new Date(),
        connector,
        portfolios: {
          total: portfolios.length,
          paused: portfolios.filter(p => p.schedule.status === 'paused').length
        }
      }
    };
  }

  if (path === '/api/portfolios' || path === '/api/portfolios/') {
    if (method !== 'GET') return methodNotAllowed();
    return { status: 200, body: coordinator.listPortfolios().map(serializeStatus) };
  }

  if (path === '/api/notifications') {
    if (method !== 'GET') return methodNotAllowed();
    return { status: 200, body: coordinator.getNotificationService().list() };
  }

  if (path === '/api/provider/portfolios') {
    if (method !== 'GET') return methodNotAllowed();
    try {
      return { status: 200, body: await coordinator.listAvailablePortfolios() };
    } catch (error) {
      if (isPortfolioError(error)) return portfolioErrorResponse(error);
      throw error;
    }
  }

  const match = PORTFOLIO_ROUTE.exec(path);
  if (!match) {
    return { status: 404, body: { error: 'API endpoint not found' } };
  }

  const portfolioId = decodeURIComponent(match[1]);
  const action = match[2];
  const status = coordinator.getPortfolioStatus(portfolioId);
  if (!status) {
    return { status: 404, body: { error: 'Portfolio not found', portfolioId } };
  }

  if (action === 'refresh') {
    if (method !== 'POST') return methodNotAllowed();
    try {
      const snapshot = await coordinator.manualRefresh(portfolioId);
      return { status: 200, body: { portfolioId, snapshot } };
    } catch (error) {
      if (isPortfolioError(error)) return portfolioErrorResponse(error);
      throw error;
    }
  }

  if (method !== 'GET') return methodNotAllowed();

  if (action === 'sensors') {
    return { status: 200, body: toSensorReadings(status.config, status.snapshot, context.defaultCurrency) };
  }

  return { status: 200, body: serializeStatus(status) };
}

function methodNotAllowed(): ApiResponse {
  return { status: 405, body: { error: 'Method not allowed' } };
}

function portfolioErrorResponse(error: PortfolioError): ApiResponse {
  return {
    status: ERROR_STATUS[error.kind] ?? 502,
    body: { error: error.kind, message: error.userMessage, detail: error.message }
  };
}

function serializeStatus(status: PortfolioStatus): Record<string, unknown> {
  const { lastError, ...schedule } = status.schedule;
  return {
    portfolioId: status.config.portfolioId,
    displayName: status.config.displayName,
    scheduleOptions: status.config.scheduleOptions,
    snapshot: status.snapshot,
    schedule: {
      ...schedule,
      lastError: lastError ? { kind: lastError.kind, message: lastError.message } : null
    },
    lastErrorAt: status.lastErrorAt
  };
}

/**
 * HTTP server exposing the portfolio API
 */
export class WebServer {
  private server: ReturnType<typeof createServer>;
  private readonly port: number;
  private readonly host: string;
  private readonly context: ApiContext;
  private readonly auditService: AuditService;

  constructor(context: ApiContext, auditService: AuditService, port: number = 3000, host: string = 'localhost') {
    this.context = context;
    this.auditService = auditService;
    this.port = port;
    this.host = host;

    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch(error => this.writeError(res, error));
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method || 'GET';
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if (!url.pathname.startsWith('/api/')) {
      this.writeJson(res, { status: 404, body: { error: 'Not found' } });
      return;
    }

    const response = await handleApiRoute({ method, path: url.pathname }, this.context);
    this.writeJson(res, response);
  }

  private writeJson(res: ServerResponse, response: ApiResponse): void {
    res.writeHead(response.status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response.body));
  }

  private writeError(res: ServerResponse, error: unknown): void {
    const message = error instanceof Error ? error.message : 'Unknown error';
    this.auditService.error('API_REQUEST_FAILED', { message });
    if (!res.headersSent) {
      this.writeJson(res, { status: 500, body: { error: 'Internal server error', message } });
    } else {
      res.end();
    }
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.auditService.info('WEB_SERVER_STARTED', { url: `http://${this.host}:${this.port}/api/health` });
        resolve();
      });
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        this.auditService.info('WEB_SERVER_STOPPED');
        resolve();
      });
    });
  }
}

async function main(): Promise<void> {
  const configManager = new ConfigurationManager();
  await configManager.loadConfiguration();
  const config = configManager.getConfiguration();

  const app = createApplication(config, {
    credentialsProvider: new ConfigCredentialsProvider(configManager),
    auditSink: consoleSink
  });

  for (const portfolio of config.portfolios) {
    app.coordinator.addPortfolio(portfolio);
  }

  const server = new WebServer(
    {
      coordinator: app.coordinator,
      connector: app.connector,
      version: config.version,
      defaultCurrency: config.provider.currency
    },
    app.auditService,
    config.server.port,
    config.server.host
  );
  await server.start();

  const shutdown = (): void => {
    app.coordinator.shutdown();
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

// Start server if this file is run directly
if (require.main === module) {
  main().catch(error => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
