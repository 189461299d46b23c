export * from './HttpTransport';
export * from './ProviderConnector';
export * from './providers/InvestingConnector';
