/**
 * Errors raised by {@link VaultGateway} implementations.
 */

export const VAULT_NOT_FOUND_MESSAGE = 'specified vault does not exist';
export const DOCUMENT_NOT_FOUND_MESSAGE = 'specified document does not exist';

/**
 * The target vault does not exist. The only error that triggers lazy vault creation.
 */
export class VaultNotFoundError extends Error {
  public readonly vaultId: string;

  constructor(vaultId: string) {
    super(`${VAULT_NOT_FOUND_MESSAGE}: ${vaultId}`);
    this.name = 'VaultNotFoundError';
    this.vaultId = vaultId;
  }
}

export class VaultDocumentNotFoundError extends Error {
  public readonly documentId: string;

  constructor(vaultId: string, documentId: string) {
    super(`${DOCUMENT_NOT_FOUND_MESSAGE}: ${vaultId}/${documentId}`);
    this.name = 'VaultDocumentNotFoundError';
    this.documentId = documentId;
  }
}

/**
 * Any other vault failure (transport error, unexpected status, conflicting ID).
 */
export class VaultRequestError extends Error {
  public readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, { cause });
    this.name = 'VaultRequestError';
    this.status = status;
  }
}

export class VaultAlreadyExistsError extends Error {
  public readonly vaultId: string;

  constructor(vaultId: string) {
    super(`vault already exists: ${vaultId}`);
    this.name = 'VaultAlreadyExistsError';
    this.vaultId = vaultId;
  }
}
