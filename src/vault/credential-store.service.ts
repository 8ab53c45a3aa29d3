import { Inject, Injectable, Logger } from '@nestjs/common';
import { BlindIndexerService } from '../crypto/blind-indexer.service';
import { UpstreamException } from '../shared/errors';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { ConsistencyReconcilerService } from './consistency-reconciler.service';
import { EnvelopeBuilderService } from './envelope-builder.service';
import { EncryptedDocument, VAULT_GATEWAY, VaultGateway } from './interfaces';
import { VaultAlreadyExistsError, VaultNotFoundError } from './vault.errors';

/**
 * Stores and retrieves credentials by logical ID.
 *
 * The vault only ever sees the blind index of the logical ID.
 */
@Injectable()
export class CredentialStoreService {
  private readonly logger = new Logger(CredentialStoreService.name);

  /* v8 ignore next 7 - false positive on constructor parameter properties */
  constructor(
    @Inject(VAULT_GATEWAY) private readonly vault: VaultGateway,
    private readonly envelopeBuilder: EnvelopeBuilderService,
    private readonly blindIndexer: BlindIndexerService,
    private readonly reconciler: ConsistencyReconcilerService,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * Encrypt and write a credential into `vaultId`.
   *
   * When the vault does not exist yet it is created and the same document is written
   * once more. No other failure is retried.
   *
   * @param content Credential exactly as received
   * @param logicalId Credential ID
   * @param vaultId Vault of the owning profile
   */
  async storeCredential(content: string, logicalId: string, vaultId: string): Promise<void> {
    const document = await this.envelopeBuilder.build(content, logicalId);

    try {
      await this.vault.createDocument(vaultId, document);
    } catch (error) {
      if (!(error instanceof VaultNotFoundError)) {
        throw new UpstreamException('vault request failed', 'storing VC', error);
      }
      await this.createVaultAndWrite(vaultId, document);
    }

    this.metricsService.increment(METRIC_PATHS.CREDENTIALS_STORED_TOTAL);
    this.logger.debug(`Credential stored in vault ${vaultId} as document ${document.id}`);
  }

  /**
   * Exact bytes stored for `logicalId`, reconciled across duplicate documents.
   */
  async retrieveCredential(logicalId: string, vaultId: string): Promise<Buffer> {
    const blindIndex = await this.blindIndexer.index(logicalId);
    const payload = await this.reconciler.resolve(vaultId, blindIndex);

    this.metricsService.increment(METRIC_PATHS.CREDENTIALS_RETRIEVED_TOTAL);
    return payload;
  }

  private async createVaultAndWrite(vaultId: string, document: EncryptedDocument): Promise<void> {
    this.logger.log(`Vault ${vaultId} does not exist, creating it`);

    try {
      await this.vault.createDataVault({ referenceId: vaultId, sequence: 0 });
    } catch (error) {
      // Another request may have created it in the meantime
      if (!(error instanceof VaultAlreadyExistsError)) {
        throw new UpstreamException('vault request failed', 'creating vault for VC', error);
      }
    }

    try {
      await this.vault.createDocument(vaultId, document);
    } catch (error) {
      throw new UpstreamException('vault request failed', 'storing VC', error);
    }
  }
}
