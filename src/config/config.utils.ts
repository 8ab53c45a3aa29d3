import { randomBytes } from 'crypto';
import { Logger } from '@nestjs/common';
import type { VcsConfiguration } from './config.types';

/**
 * Generate API Key
 *
 * @returns 32 random bytes, base64 encoded (44 characters)
 */
export function generateApiKey(): string {
  return randomBytes(32).toString('base64');
}

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs a summary of the loaded configuration for debugging purposes.
 * Sensitive values (API key, key material) are never printed.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: VcsConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`HTTP Server: port ${config.main.port}`);
  summaryLogger.log(`Host URL: ${config.main.hostUrl}`);

  if (config.vault.mode === 'remote') {
    summaryLogger.log(`Vault: remote EDV at ${config.vault.edvUrl} (timeout ${config.vault.timeout}ms)`);
  } else {
    summaryLogger.log('Vault: local (in-memory)');
  }

  summaryLogger.log(`Key Directory: ${config.crypto.keysPath}`);
  summaryLogger.log(
    `Credential Signing: ${config.crypto.signingKeyPath ? 'persistent key' : 'ephemeral key (generated on startup)'}`,
  );
  summaryLogger.log(`Status List: ${config.statusList.size} slots per shard at ${config.statusList.baseUrl}/<n>`);
  summaryLogger.log(`API Rate Limiting: ${config.throttle.limit} requests per ${config.throttle.ttl}ms`);

  summaryLogger.log('Configuration loaded successfully');
}
/* c8 ignore stop */
