/**
 * Plaintext document handed to the envelope cipher.
 * `content.message` holds the credential exactly as the caller supplied it.
 */
export interface StructuredDocument {
  id: string;
  content: StructuredDocumentContent;
}

export interface StructuredDocumentContent {
  message: string;
}

export interface IndexedAttribute {
  name: string;
  value: string;
  unique: boolean;
}

export interface IdTypePair {
  id: string;
  type: string;
}

export interface IndexedAttributeCollection {
  sequence: number;
  hmac: IdTypePair;
  indexedAttributes: IndexedAttribute[];
}

/**
 * What the vault stores. Only `indexedAttributeCollections` is readable by the vault;
 * `jwe` is an opaque compact JWE.
 */
export interface EncryptedDocument {
  id: string;
  sequence: number;
  jwe: string;
  indexedAttributeCollections: IndexedAttributeCollection[];
}

export interface DataVaultConfiguration {
  referenceId: string;
  sequence: number;
}

export interface IndexQuery {
  name: string;
  value: string;
}

/**
 * Contract required of the encrypted data vault.
 *
 * The backend may be eventually consistent: a query can return more than one
 * location for an index declared unique.
 */
export interface VaultGateway {
  /** @returns the new vault's ID */
  createDataVault(config: DataVaultConfiguration): Promise<string>;
  /** @returns the location of the stored document */
  createDocument(vaultId: string, document: EncryptedDocument): Promise<string>;
  readDocument(vaultId: string, documentId: string): Promise<EncryptedDocument>;
  /** @returns locations of every document whose indexed attribute matches */
  queryVault(vaultId: string, query: IndexQuery): Promise<string[]>;
}

export const VAULT_GATEWAY = Symbol('VAULT_GATEWAY');
