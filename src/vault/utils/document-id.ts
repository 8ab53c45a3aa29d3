import { randomBytes } from 'crypto';

const DOCUMENT_ID_BYTES = 16;

/**
 * Generate a vault document ID: 16 random bytes, base64url encoded (22 characters),
 * safe to use as a URL path segment.
 */
export function generateDocumentId(): string {
  return randomBytes(DOCUMENT_ID_BYTES).toString('base64url');
}

/**
 * Document ID of a vault document location (its last path segment).
 */
export function documentIdFromLocation(location: string): string {
  const segments = location.split('/');
  return segments[segments.length - 1];
}

export function documentLocation(vaultId: string, documentId: string): string {
  return `/encrypted-data-vaults/${encodeURIComponent(vaultId)}/documents/${encodeURIComponent(documentId)}`;
}
