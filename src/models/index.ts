export * from './AuditEvent';
export * from './ConnectorStatus';
export * from './Portfolio';
export * from './Session';
