/**
 * Notification Service
 * Keeps persistent, user-facing notifications about portfolios that need attention
 */

import type { PortfolioErrorKind } from '../utils/ErrorHandler';
import type { AuditService } from './AuditService';

export interface PersistentNotification {
  /** `<portfolio slug>_error`, so each portfolio holds at most one */
  id: string;
  portfolioId: string;
  kind: PortfolioErrorKind;
  title: string;
  message: string;
  createdAt: Date;
  /** Number of times the same condition was reported while the notification was open */
  occurrences: number;
}

export interface NotificationRequest {
  portfolioId: string;
  slug: string;
  kind: PortfolioErrorKind;
  title: string;
  message: string;
}

export type NotificationListener = (event: 'created' | 'dismissed', notification: PersistentNotification) => void;

export class NotificationService {
  private notifications: Map<string, PersistentNotification> = new Map();
  private listeners: NotificationListener[] = [];
  private readonly auditService: AuditService;
  private readonly clock: () => Date;

  constructor(auditService: AuditService, clock: () => Date = () => new Date()) {
    this.auditService = auditService;
    this.clock = clock;
  }

  static notificationId(slug: string): string {
    return `${slug}_error`;
  }

  /**
   * Creates the portfolio's notification unless one is already open.
   * Returns true when a new notification was created.
   */
  create(request: NotificationRequest): boolean {
    const id = NotificationService.notificationId(request.slug);
    const existing = this.notifications.get(id);

    if (existing) {
      existing.occurrences++;
      return false;
    }

    const notification: PersistentNotification = {
      id,
      portfolioId: request.portfolioId,
      kind: request.kind,
      title: request.title,
      message: request.message,
      createdAt: this.clock(),
      occurrences: 1
    };
    this.notifications.set(id, notification);

    this.auditService.warn('NOTIFICATION_CREATED', { notificationId: id, kind: request.kind }, request.portfolioId);
    this.emit('created', notification);
    return true;
  }

  /**
   * Dismisses every open notification of a portfolio
   */
  dismissForPortfolio(portfolioId: string): number {
    let dismissed = 0;
    for (const notification of Array.from(this.notifications.values())) {
      if (notification.portfolioId === portfolioId) {
        this.notifications.delete(notification.id);
        this.auditService.info('NOTIFICATION_DISMISSED', { notificationId: notification.id }, portfolioId);
        this.emit('dismissed', notification);
        dismissed++;
      }
    }
    return dismissed;
  }

  get(id: string): PersistentNotification | undefined {
    const notification = this.notifications.get(id);
    return notification ? { ...notification } : undefined;
  }

  hasOpenNotification(portfolioId: string): boolean {
    return Array.from(this.notifications.values()).some(n => n.portfolioId === portfolioId);
  }

  list(): PersistentNotification[] {
    return Array.from(this.notifications.values())
      .map(notification => ({ ...notification }))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  addListener(listener: NotificationListener): void {
    this.listeners.push(listener);
  }

  removeListener(listener: NotificationListener): void {
    this.listeners = this.listeners.filter(l => l !== listener);
  }

  private emit(event: 'created' | 'dismissed', notification: PersistentNotification): void {
    for (const listener of this.listeners) {
      try {
        listener(event, { ...notification });
      } catch (error) {
        this.auditService.error('NOTIFICATION_LISTENER_FAILED', {
          event,
          message: error instanceof Error ? error.message : String(error)
        }, notification.portfolioId);
      }
    }
  }
}
