import { registerAs } from '@nestjs/config';
import * as process from 'process';
import { join, resolve } from 'path';
import { Logger } from '@nestjs/common';
import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import {
  DEFAULT_DATA_PATH,
  DEFAULT_SERVER_PORT,
  DEFAULT_SERVER_ORIGIN,
  DEFAULT_VAULT_MODE,
  DEFAULT_EDV_REQUEST_TIMEOUT,
  DEFAULT_THROTTLE_TTL,
  DEFAULT_THROTTLE_LIMIT,
  DEFAULT_CSL_SIZE,
  KEYS_DIRECTORY,
  MIN_API_KEY_LENGTH,
  STATUS_PATH,
  ALLOWED_VAULT_MODES,
} from './config/config.constants';
import {
  parseOptionalBoolean,
  parseNumberWithDefault,
  parseStringWithDefault,
  parseBaseUrl,
} from './config/config.parsers';
import { isVaultMode, validateStatusListSize, validateVaultConfig } from './config/config.validators';
import { generateApiKey } from './config/config.utils';
import type { VcsConfiguration } from './config/config.types';

const logger = new Logger('ConfigValidation');

/**
 * Resolve the API key protecting the issuer endpoints.
 *
 * Loading strategy (in order of precedence):
 * 1. VCS_API_KEY environment variable
 * 2. Persisted key from ${VCS_DATA_PATH}/.api-key (auto-generated on first run)
 * 3. Auto-generate and persist a new key
 *
 * @throws {Error} If strict mode is enabled without VCS_API_KEY, the key is too short,
 *   or a generated key cannot be persisted
 */
function resolveApiKey(dataPath: string): string {
  const apiKeyFromEnv = process.env.VCS_API_KEY;
  const strictMode = parseOptionalBoolean(process.env.VCS_API_KEY_STRICT, false);
  const apiKeyFilePath = join(dataPath, '.api-key');

  let apiKey: string | undefined;
  let source: 'env' | 'file' | 'generated' | undefined;

  if (apiKeyFromEnv && apiKeyFromEnv.trim()) {
    apiKey = apiKeyFromEnv.trim();
    source = 'env';
  } else if (strictMode) {
    throw new Error(
      'VCS_API_KEY is required when VCS_API_KEY_STRICT=true. Generate one with: openssl rand -base64 32',
    );
  } else {
    try {
      if (existsSync(apiKeyFilePath)) {
        const fileContent = readFileSync(apiKeyFilePath, 'utf-8').trim();
        if (fileContent.length >= MIN_API_KEY_LENGTH) {
          apiKey = fileContent;
          source = 'file';
        }
      }
    } catch (err) {
      // Unreadable file: fall through to generation
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.debug(`Could not read API key from file: ${errorMessage}`);
    }

    if (!apiKey) {
      apiKey = generateApiKey();
      source = 'generated';

      try {
        mkdirSync(dataPath, { recursive: true, mode: 0o700 });
        writeFileSync(apiKeyFilePath, apiKey, { mode: 0o600 });
        logger.warn(`Auto-generated API key saved to ${apiKeyFilePath}. Set VCS_API_KEY for production deployments.`);
      } catch (err) {
        const errorMessage = err instanceof Error ? err.message : String(err);
        throw new Error(
          `Cannot persist auto-generated API key to ${apiKeyFilePath}: ${errorMessage}. Configure VCS_API_KEY manually.`,
        );
      }
    }
  }

  if (apiKey.length < MIN_API_KEY_LENGTH) {
    throw new Error(
      `VCS_API_KEY must be at least ${MIN_API_KEY_LENGTH} characters (current: ${apiKey.length}). ` +
        'Generate with: openssl rand -base64 32',
    );
  }

  logger.log(`✓ API key loaded from ${source}`);
  return apiKey;
}

/**
 * Build Main Server Configuration
 *
 * Optional environment variables:
 * - VCS_SERVER_PORT: HTTP server port (default: 8070)
 * - VCS_HOST_URL: Public base URL of this service (default: http://localhost:<port>)
 * - VCS_SERVER_ORIGIN: CORS origin outside development (default: '*')
 * - VCS_API_KEY / VCS_API_KEY_STRICT: see resolveApiKey
 *
 * @throws {Error} If VCS_HOST_URL is not an absolute http(s) URL
 */
function buildMainConfig(dataPath: string): VcsConfiguration['main'] {
  const port = parseNumberWithDefault(process.env.VCS_SERVER_PORT, DEFAULT_SERVER_PORT);
  const hostUrl = parseBaseUrl(
    parseStringWithDefault(process.env.VCS_HOST_URL, `http://localhost:${port}`),
    'VCS_HOST_URL',
  );

  return {
    port,
    hostUrl,
    origin: parseStringWithDefault(process.env.VCS_SERVER_ORIGIN?.trim(), DEFAULT_SERVER_ORIGIN),
    apiKey: resolveApiKey(dataPath),
  };
}

/**
 * Build Vault Configuration
 *
 * Optional environment variables:
 * - VCS_VAULT_MODE: 'local' or 'remote' (default: 'local')
 * - VCS_EDV_URL: Encrypted data vault base URL (required in remote mode)
 * - VCS_EDV_REQUEST_TIMEOUT: EDV request timeout in ms (default: 10000)
 *
 * @throws {Error} If the mode is unknown or remote mode has no EDV URL
 */
function buildVaultConfig(): VcsConfiguration['vault'] {
  const mode = parseStringWithDefault(process.env.VCS_VAULT_MODE?.trim().toLowerCase(), DEFAULT_VAULT_MODE);
  if (!isVaultMode(mode)) {
    throw new Error(`Invalid VCS_VAULT_MODE: "${mode}". Must be one of: ${ALLOWED_VAULT_MODES.join(', ')}`);
  }

  const rawEdvUrl = process.env.VCS_EDV_URL?.trim();
  const edvUrl = rawEdvUrl ? parseBaseUrl(rawEdvUrl, 'VCS_EDV_URL') : undefined;
  validateVaultConfig(mode, edvUrl);

  return {
    mode,
    edvUrl,
    timeout: parseNumberWithDefault(process.env.VCS_EDV_REQUEST_TIMEOUT, DEFAULT_EDV_REQUEST_TIMEOUT),
  };
}

/**
 * Build Crypto Configuration
 *
 * Blind-index and envelope keys are persisted under ${VCS_DATA_PATH}/keys so that
 * stored credentials stay retrievable across restarts.
 *
 * Optional environment variables:
 * - VCS_SIGNING_KEY_PATH: PKCS#8 PEM Ed25519 key used to sign credentials
 *   (default: ephemeral key generated on startup)
 */
function buildCryptoConfig(dataPath: string): VcsConfiguration['crypto'] {
  const signingKeyPath = process.env.VCS_SIGNING_KEY_PATH?.trim();

  return {
    dataPath,
    keysPath: join(dataPath, KEYS_DIRECTORY),
    signingKeyPath: signingKeyPath || undefined,
  };
}

/**
 * Build Status List Configuration
 *
 * Optional environment variables:
 * - VCS_CSL_SIZE: Slots per status list shard (default: 50)
 */
function buildStatusListConfig(hostUrl: string): VcsConfiguration['statusList'] {
  const size = parseNumberWithDefault(process.env.VCS_CSL_SIZE, DEFAULT_CSL_SIZE);
  validateStatusListSize(size);

  return {
    size,
    baseUrl: `${hostUrl}${STATUS_PATH}`,
  };
}

/**
 * Build Throttle Configuration
 *
 * Optional environment variables:
 * - VCS_THROTTLE_TTL: Time window in milliseconds (default: 60000)
 * - VCS_THROTTLE_LIMIT: Maximum requests per TTL window (default: 500)
 */
function buildThrottleConfig(): VcsConfiguration['throttle'] {
  return {
    ttl: parseNumberWithDefault(process.env.VCS_THROTTLE_TTL, DEFAULT_THROTTLE_TTL),
    limit: parseNumberWithDefault(process.env.VCS_THROTTLE_LIMIT, DEFAULT_THROTTLE_LIMIT),
  };
}

/**
 * Register Config VCS
 */
export default registerAs('vcs', (): VcsConfiguration => {
  const dataPath = resolve(parseStringWithDefault(process.env.VCS_DATA_PATH, DEFAULT_DATA_PATH));
  const main = buildMainConfig(dataPath);

  return {
    environment: parseStringWithDefault(process.env.NODE_ENV, 'production'),
    main,
    vault: buildVaultConfig(),
    crypto: buildCryptoConfig(dataPath),
    statusList: buildStatusListConfig(main.hostUrl),
    throttle: buildThrottleConfig(),
  };
});
