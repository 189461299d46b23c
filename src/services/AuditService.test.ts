import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as fc from 'fast-check';
import { AuditService } from './AuditService';
import type { AuditEvent } from '../models/AuditEvent';

describe('AuditService', () => {
  let auditService: AuditService;

  beforeEach(() => {
    auditService = new AuditService({ logLevel: 'debug' });
  });

  describe('Property-Based Tests', () => {
    /**
     * Feature: portfolio-sync, Property 5: login events are logged without exposing secrets
     */
    it('should log login events without exposing secrets', () => {
      fc.assert(
        fc.property(
          fc.record({
            password: fc.string({ minLength: 1, maxLength: 50 }),
            token: fc.string({ minLength: 1, maxLength: 50 }),
            email: fc.string({ minLength: 3, maxLength: 30 }),
            attempts: fc.integer({ min: 0, max: 10 })
          }),
          fc.option(fc.string({ minLength: 1, maxLength: 10 }), { nil: undefined }),
          (details, portfolioId) => {
            auditService.clearLog();

            const eventId = auditService.info('SESSION_AUTHENTICATED', details, portfolioId);

            const events = auditService.getAllEvents();
            expect(events).toHaveLength(1);

            const loggedEvent = events[0];
            expect(loggedEvent.eventId).toBe(eventId);
            expect(loggedEvent.portfolioId).toBe(portfolioId);
            expect(loggedEvent.details.password).toBe('[REDACTED]');
            expect(loggedEvent.details.token).toBe('[REDACTED]');
            expect(loggedEvent.details.email).toBe(details.email);
            expect(loggedEvent.details.attempts).toBe(details.attempts);
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('Redaction', () => {
    it('redacts nested records and records inside arrays', () => {
      auditService.info('PROVIDER_CONFIGURED', {
        provider: { apiUrl: 'https://provider.test', apiKey: 'test-secret' },
        sessions: [{ xToken: 'test-token', user: 'a' }]
      });

      const [event] = auditService.getAllEvents();
      expect(event.details).toEqual({
        provider: { apiUrl: 'https://provider.test', apiKey: '[REDACTED]' },
        sessions: [{ xToken: '[REDACTED]', user: 'a' }]
      });
    });

    it('leaves dates intact', () => {
      const expiresAt = new Date('2026-01-05T10:00:00Z');
      auditService.info('SESSION_AUTHENTICATED', { expiresAt });

      expect(auditService.getAllEvents()[0].details.expiresAt).toBe(expiresAt);
    });
  });

  describe('Levels', () => {
    it('drops events below the configured level', () => {
      auditService.setLogLevel('warn');

      expect(auditService.info('REFRESH_SUCCEEDED')).toBeNull();
      expect(auditService.warn('REFRESH_FAILED')).not.toBeNull();
      expect(auditService.error('SESSION_CREDENTIALS_REJECTED')).not.toBeNull();

      expect(auditService.getAllEvents().map(e => e.level)).toEqual(['warn', 'error']);
      expect(auditService.getLogLevel()).toBe('warn');
    });

    it('defaults to info', () => {
      const service = new AuditService();
      expect(service.debug('REFRESH_STARTED')).toBeNull();
      expect(service.info('REFRESH_STARTED')).not.toBeNull();
    });
  });

  describe('Sink and export', () => {
    it('mirrors stored events to the sink', () => {
      const received: AuditEvent[] = [];
      const service = new AuditService({ sink: event => received.push(event) });

      service.warn('REFRESH_FAILED', { kind: 'NetworkError' }, 'p-1');

      expect(received).toHaveLength(1);
      expect(received[0]).toMatchObject({ level: 'warn', eventType: 'REFRESH_FAILED', portfolioId: 'p-1' });
    });

    it('keeps only the most recent events', () => {
      const service = new AuditService({ maxEvents: 2 });
      service.info('A');
      service.info('B');
      service.info('C');

      expect(service.getAllEvents().map(e => e.eventType)).toEqual(['B', 'C']);
    });

    it('exports events inside a time range', () => {
      vi.useFakeTimers();
      try {
        vi.setSystemTime(new Date('2026-01-05T09:00:00Z'));
        auditService.info('FIRST');
        vi.setSystemTime(new Date('2026-01-05T10:00:00Z'));
        auditService.info('SECOND');
        vi.setSystemTime(new Date('2026-01-05T11:00:00Z'));
        auditService.info('THIRD');

        const exported = auditService.exportAuditLog(
          new Date('2026-01-05T09:30:00Z'),
          new Date('2026-01-05T10:30:00Z')
        );
        expect(exported.map(e => e.eventType)).toEqual(['SECOND']);
        expect(auditService.getEventsByType('THIRD')).toHaveLength(1);
      } finally {
        vi.useRealTimers();
      }
    });
  });
});
