import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { BlindIndexerService } from '../crypto/blind-indexer.service';
import { ENVELOPE_CIPHER, EnvelopeCipher } from '../crypto/interfaces';
import { InconsistentStateException, UpstreamException } from '../shared/errors';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { StructuredDocument, VAULT_GATEWAY, VaultGateway } from './interfaces';
import { VaultNotFoundError } from './vault.errors';
import { documentIdFromLocation } from './utils/document-id';

const SINGLE_MATCH_CONTEXT = 'retrieving VC';
const MULTIPLE_MATCH_CONTEXT = 'determining if the multiple VCs matching the given ID are the same';

function isStructuredDocument(value: unknown): value is StructuredDocument {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'content' in value &&
    typeof value.content === 'object' &&
    value.content !== null &&
    'message' in value.content &&
    typeof value.content.message === 'string'
  );
}

/**
 * Resolves a blind index to a single credential payload.
 *
 * An eventually consistent vault may hold several documents for one index. They are
 * all read and decrypted concurrently, then compared byte for byte: identical copies
 * resolve to the first one, any difference is an {@link InconsistentStateException}.
 * Near-duplicates (same JSON, different bytes) count as different.
 */
@Injectable()
export class ConsistencyReconcilerService {
  private readonly logger = new Logger(ConsistencyReconcilerService.name);

  /* v8 ignore next 6 - false positive on constructor parameter properties */
  constructor(
    @Inject(VAULT_GATEWAY) private readonly vault: VaultGateway,
    @Inject(ENVELOPE_CIPHER) private readonly cipher: EnvelopeCipher,
    private readonly blindIndexer: BlindIndexerService,
    private readonly metricsService: MetricsService,
  ) {}

  async resolve(vaultId: string, blindIndex: string): Promise<Buffer> {
    const locations = await this.query(vaultId, blindIndex);

    switch (locations.length) {
      case 0:
        throw new NotFoundException(`no VC under profile "${vaultId}" was found with the given id`);
      case 1:
        return this.readPayload(vaultId, documentIdFromLocation(locations[0]), SINGLE_MATCH_CONTEXT);
      default:
        return this.reconcile(vaultId, locations);
    }
  }

  private async query(vaultId: string, blindIndex: string): Promise<string[]> {
    const name = await this.blindIndexer.indexName();
    try {
      return await this.vault.queryVault(vaultId, { name, value: blindIndex });
    } catch (error) {
      if (error instanceof VaultNotFoundError) {
        throw new NotFoundException(`no VC under profile "${vaultId}" was found with the given id`);
      }
      throw new UpstreamException('vault request failed', 'querying vault', error);
    }
  }

  private async reconcile(vaultId: string, locations: string[]): Promise<Buffer> {
    this.logger.warn(`${locations.length} documents match one blind index in vault ${vaultId}, comparing them`);

    const [first, ...rest] = await Promise.all(
      locations.map((location) => this.readPayload(vaultId, documentIdFromLocation(location), MULTIPLE_MATCH_CONTEXT)),
    );

    if (rest.some((payload) => !payload.equals(first))) {
      this.metricsService.increment(METRIC_PATHS.CREDENTIALS_CONFLICTS_TOTAL);
      this.logger.error(`Divergent duplicates found in vault ${vaultId} (${locations.length} documents)`);
      throw new InconsistentStateException(locations.length);
    }

    return first;
  }

  /**
   * Read, decrypt and unwrap one document.
   * @param context Operation named in error messages
   * @returns The stored credential bytes
   */
  private async readPayload(vaultId: string, documentId: string, context: string): Promise<Buffer> {
    let jwe: string;
    try {
      jwe = (await this.vault.readDocument(vaultId, documentId)).jwe;
    } catch (error) {
      throw new UpstreamException('failed to read document', context, error);
    }

    let plaintext: Uint8Array;
    try {
      plaintext = await this.cipher.decrypt(jwe);
    } catch (error) {
      throw new UpstreamException('decrypting document failed', context, error);
    }

    let structuredDocument: unknown;
    try {
      structuredDocument = JSON.parse(Buffer.from(plaintext).toString('utf-8'));
    } catch (error) {
      throw new UpstreamException('decrypted structured document unmarshalling failed', context, error);
    }
    if (!isStructuredDocument(structuredDocument)) {
      throw new UpstreamException(
        'decrypted structured document unmarshalling failed',
        context,
        new Error('content.message is missing'),
      );
    }

    return Buffer.from(structuredDocument.content.message, 'utf-8');
  }
}
