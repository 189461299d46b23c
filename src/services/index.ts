export * from './AuditService';
export * from './NotificationService';
export * from './PortfolioCoordinator';
export * from './PortfolioFetcher';
export * from './RefreshScheduler';
export * from './SessionManager';
