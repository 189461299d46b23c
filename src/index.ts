/**
 * Portfolio Sync - Main Entry Point
 * Keeps brokerage portfolio metrics current on a market-hours schedule
 */

export * from './models';
export * from './services';
export * from './connectors';
export * from './config';
export * from './utils';
export * from './application';
export { WebServer, handleApiRoute } from './web/server';
export type { ApiContext, ApiRequest, ApiResponse } from './web/server';
export * from './web/readings';

// Application version and metadata
export const APP_VERSION = '1.0.0';
export const APP_NAME = 'Portfolio Sync';
