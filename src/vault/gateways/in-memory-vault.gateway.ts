import { Injectable, Logger } from '@nestjs/common';
import { DataVaultConfiguration, EncryptedDocument, IndexQuery, VaultGateway } from '../interfaces';
import { VaultAlreadyExistsError, VaultDocumentNotFoundError, VaultNotFoundError, VaultRequestError } from '../vault.errors';
import { documentLocation } from '../utils/document-id';

/**
 * Process-local vault used in `local` mode and in tests.
 *
 * Unique indexed attributes are not enforced, so this gateway can hold several
 * documents for one blind index, the way an eventually consistent EDV can.
 * Documents are copied on the way in and out.
 */
@Injectable()
export class InMemoryVaultGateway implements VaultGateway {
  private readonly logger = new Logger(InMemoryVaultGateway.name);
  private readonly vaults = new Map<string, Map<string, EncryptedDocument>>();

  async createDataVault(config: DataVaultConfiguration): Promise<string> {
    const vaultId = config.referenceId;
    if (this.vaults.has(vaultId)) {
      throw new VaultAlreadyExistsError(vaultId);
    }

    this.vaults.set(vaultId, new Map());
    this.logger.log(`Vault created: ${vaultId}`);
    return vaultId;
  }

  async createDocument(vaultId: string, document: EncryptedDocument): Promise<string> {
    const documents = this.getVault(vaultId);
    if (documents.has(document.id)) {
      throw new VaultRequestError(`a document with ID ${document.id} already exists in vault ${vaultId}`, 409);
    }

    documents.set(document.id, structuredClone(document));
    this.logger.debug(`Document ${document.id} stored in vault ${vaultId}`);
    return documentLocation(vaultId, document.id);
  }

  async readDocument(vaultId: string, documentId: string): Promise<EncryptedDocument> {
    const document = this.getVault(vaultId).get(documentId);
    if (!document) {
      throw new VaultDocumentNotFoundError(vaultId, documentId);
    }

    return structuredClone(document);
  }

  async queryVault(vaultId: string, query: IndexQuery): Promise<string[]> {
    const locations: string[] = [];

    for (const document of this.getVault(vaultId).values()) {
      const matches = document.indexedAttributeCollections.some((collection) =>
        collection.indexedAttributes.some((attribute) => attribute.name === query.name && attribute.value === query.value),
      );
      if (matches) {
        locations.push(documentLocation(vaultId, document.id));
      }
    }

    return locations;
  }

  /**
   * Number of documents held in a vault, 0 when the vault does not exist.
   */
  getDocumentCount(vaultId: string): number {
    return this.vaults.get(vaultId)?.size ?? 0;
  }

  private getVault(vaultId: string): Map<string, EncryptedDocument> {
    const documents = this.vaults.get(vaultId);
    if (!documents) {
      throw new VaultNotFoundError(vaultId);
    }
    return documents;
  }
}
