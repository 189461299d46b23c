import { randomBytes } from 'crypto';
import type { AuditEvent, LogLevel } from '../models/AuditEvent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'apikey', 'key'];

export type AuditSink = (event: AuditEvent) => void;

export interface AuditServiceOptions {
  logLevel?: LogLevel;
  sink?: AuditSink;
  maxEvents?: number;
}

/**
 * Writes an event to the console at the matching level
 */
export const consoleSink: AuditSink = (event) => {
  const scope = event.portfolioId ? ` [${event.portfolioId}]` : '';
  const line = `${event.timestamp.toISOString()} ${event.level.toUpperCase()} ${event.eventType}${scope}`;
  switch (event.level) {
    case 'error':
      console.error(line, event.details);
      break;
    case 'warn':
      console.warn(line, event.details);
      break;
    default:
      console.log(line, event.details);
  }
};

/**
 * Audit Service is the structured event log for the whole service.
 * Events are append-only, redacted before storage and filtered by level.
 */
export class AuditService {
  private auditLog: AuditEvent[] = [];
  private logLevel: LogLevel;
  private readonly sink?: AuditSink;
  private readonly maxEvents: number;

  constructor(options: AuditServiceOptions = {}) {
    this.logLevel = options.logLevel ?? 'info';
    this.sink = options.sink;
    this.maxEvents = options.maxEvents ?? 5000;
  }

  /**
   * Records an event; returns its id, or null when the level is filtered out
   */
  log(
    level: LogLevel,
    eventType: string,
    details: Record<string, unknown> = {},
    portfolioId?: string
  ): string | null {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.logLevel]) {
      return null;
    }

    const auditEvent: AuditEvent = {
      eventId: randomBytes(8).toString('hex'),
      timestamp: new Date(),
      level,
      eventType,
      portfolioId,
      details: this.redactSensitiveData(details)
    };

    this.auditLog.push(auditEvent);
    if (this.auditLog.length > this.maxEvents) {
      this.auditLog = this.auditLog.slice(-this.maxEvents);
    }

    this.sink?.(auditEvent);
    return auditEvent.eventId;
  }

  debug(eventType: string, details?: Record<string, unknown>, portfolioId?: string): string | null {
    return this.log('debug', eventType, details, portfolioId);
  }

  info(eventType: string, details?: Record<string, unknown>, portfolioId?: string): string | null {
    return this.log('info', eventType, details, portfolioId);
  }

  warn(eventType: string, details?: Record<string, unknown>, portfolioId?: string): string | null {
    return this.log('warn', eventType, details, portfolioId);
  }

  error(eventType: string, details?: Record<string, unknown>, portfolioId?: string): string | null {
    return this.log('error', eventType, details, portfolioId);
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  /**
   * Exports events, optionally limited to a time range
   */
  exportAuditLog(startDate?: Date, endDate?: Date): AuditEvent[] {
    return this.auditLog
      .filter(event => {
        if (startDate && event.timestamp < startDate) return false;
        if (endDate && event.timestamp > endDate) return false;
        return true;
      })
      .map(event => ({ ...event, details: { ...event.details } }));
  }

  /**
   * Gets all audit events (for testing purposes)
   */
  getAllEvents(): AuditEvent[] {
    return [...this.auditLog];
  }

  getEventsByType(eventType: string): AuditEvent[] {
    return this.auditLog.filter(event => event.eventType === eventType);
  }

  /**
   * Clears audit log (for testing purposes only)
   */
  clearLog(): void {
    this.auditLog = [];
  }

  private redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();

      if (SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        redacted[key] = '[REDACTED]';
      } else if (Array.isArray(value)) {
        redacted[key] = value.map(item => (isRecord(item) ? this.redactSensitiveData(item) : item));
      } else if (isRecord(value)) {
        redacted[key] = this.redactSensitiveData(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}
