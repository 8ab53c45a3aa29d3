import { Inject, Injectable } from '@nestjs/common';
import { KeyStoreService } from './key-store.service';
import { MAC_PROVIDER, MacProvider } from './interfaces';
import { CryptoUnavailableException } from '../shared/errors';

/** Label whose MAC names the credential-ID index family */
const VC_ID_INDEX_LABEL = 'vcID';

/**
 * Derives deterministic, keyed, non-reversible indexes for identifiers.
 *
 * The vault only ever sees these values, never the identifiers themselves.
 * There is no unkeyed fallback: when the MAC cannot be computed the caller's
 * operation fails with {@link CryptoUnavailableException}.
 */
@Injectable()
export class BlindIndexerService {
  private cachedIndexName?: string;

  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    @Inject(MAC_PROVIDER) private readonly macProvider: MacProvider,
    private readonly keyStore: KeyStoreService,
  ) {}

  /**
   * Blind index of an identifier, base64url encoded.
   */
  async index(identifier: string | Uint8Array): Promise<string> {
    const message = typeof identifier === 'string' ? new TextEncoder().encode(identifier) : identifier;
    return this.mac(message, 'computing blind index');
  }

  /**
   * Name of the indexed attribute carrying credential-ID blind indexes.
   * Derived from the persisted key, so it is stable across restarts.
   */
  async indexName(): Promise<string> {
    if (!this.cachedIndexName) {
      this.cachedIndexName = await this.mac(new TextEncoder().encode(VC_ID_INDEX_LABEL), 'deriving blind index name');
    }
    return this.cachedIndexName;
  }

  private async mac(message: Uint8Array, operation: string): Promise<string> {
    try {
      const tag = await this.macProvider.computeMac(message, this.keyStore.getMacKey());
      return Buffer.from(tag).toString('base64url');
    } catch (error) {
      throw new CryptoUnavailableException(operation, error);
    }
  }
}
