import { Logger } from '@nestjs/common';
import { ALLOWED_VAULT_MODES, MAX_CSL_SIZE, VaultMode } from './config.constants';

const logger = new Logger('ConfigValidation');

export function isVaultMode(value: string): value is VaultMode {
  return ALLOWED_VAULT_MODES.includes(value);
}

/**
 * Validates the status list shard capacity.
 *
 * Capacity is fixed for the lifetime of a deployment, so a bad value must stop startup.
 */
export function validateStatusListSize(size: number): void {
  if (size < 1 || size > MAX_CSL_SIZE) {
    throw new Error(`VCS_CSL_SIZE must be between 1 and ${MAX_CSL_SIZE} (received: ${size})`);
  }
}

/**
 * Validates vault settings for the selected mode.
 *
 * Logs a warning when an EDV URL is configured but ignored in local mode.
 */
export function validateVaultConfig(mode: VaultMode, edvUrl: string | undefined): void {
  if (mode === VaultMode.REMOTE && !edvUrl) {
    throw new Error('VCS_VAULT_MODE=remote requires VCS_EDV_URL (base URL of the encrypted data vault server)');
  }

  if (mode === VaultMode.LOCAL && edvUrl) {
    logger.warn(
      'VCS_EDV_URL is set but VCS_VAULT_MODE=local; credentials are kept in process memory and the URL is IGNORED.',
    );
  }
}
