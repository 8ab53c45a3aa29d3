import type { VaultMode } from './config.constants';

/**
 * Configuration type definition for type-safe access
 */
export interface VcsConfiguration {
  environment: string;
  main: {
    port: number;
    hostUrl: string;
    origin: string;
    apiKey: string;
  };
  vault: {
    mode: VaultMode;
    edvUrl?: string;
    timeout: number;
  };
  crypto: {
    dataPath: string;
    keysPath: string;
    signingKeyPath?: string;
  };
  statusList: {
    size: number;
    baseUrl: string;
  };
  throttle: {
    ttl: number;
    limit: number;
  };
}
