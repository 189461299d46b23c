export * from './ErrorHandler';
export * from './identifiers';
export * from './marketSchedule';
export * from './numberFormat';
export * from './zonedTime';
