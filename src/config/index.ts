export * from './ConfigurationManager';
export * from './ConfigCredentialsProvider';
