/**
 * Connector status and health monitoring models
 */

export type ConnectorHealthStatus = 'healthy' | 'degraded' | 'offline';

export interface ConnectorStatus {
  connectorId: string;
  name: string;
  status: ConnectorHealthStatus;
  lastRequestAt: Date | null;
  latency: number;
  errorRate: number;
  capabilities: string[];
}
