import type { Credentials, CredentialsProvider } from '../models/Session';
import type { ConfigurationManager } from './ConfigurationManager';

/**
 * Reads the provider login from the loaded configuration on every request,
 * so a reloaded configuration takes effect at the next re-authentication
 */
export class ConfigCredentialsProvider implements CredentialsProvider {
  private readonly configManager: ConfigurationManager;

  constructor(configManager: ConfigurationManager) {
    this.configManager = configManager;
  }

  async getCredentials(): Promise<Credentials> {
    const { email, password } = this.configManager.getConfigSection('provider');
    if (!email || !password) {
      throw new Error('Provider credentials are not configured (PROVIDER_EMAIL / PROVIDER_PASSWORD)');
    }
    return { email, password };
  }
}
