export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];

/**
 * Where encrypted credentials are kept.
 */
export enum VaultMode {
  /** In-process vault; contents are lost on restart */
  LOCAL = 'local',
  /** Remote encrypted data vault reached over HTTP */
  REMOTE = 'remote',
}

export const ALLOWED_VAULT_MODES: readonly string[] = Object.values(VaultMode);

// Configuration defaults
export const DEFAULT_SERVER_PORT = 8070;
export const DEFAULT_DATA_PATH = './data';
export const DEFAULT_SERVER_ORIGIN = '*';
export const DEFAULT_VAULT_MODE = VaultMode.LOCAL;
export const DEFAULT_EDV_REQUEST_TIMEOUT = 10000;
export const DEFAULT_THROTTLE_TTL = 60000;
export const DEFAULT_THROTTLE_LIMIT = 500;
export const MIN_API_KEY_LENGTH = 32;

// Status list shards
export const DEFAULT_CSL_SIZE = 50;
export const MAX_CSL_SIZE = 131072;
export const STATUS_PATH = '/status';

// Key material
export const KEYS_DIRECTORY = 'keys';
export const SYMMETRIC_KEY_BYTES = 32;
