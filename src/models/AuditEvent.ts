/**
 * Structured log event models
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AuditEvent {
  eventId: string;
  timestamp: Date;
  level: LogLevel;
  eventType: string;
  portfolioId?: string;
  details: Record<string, unknown>;
}
