/**
 * Handle to a persisted symmetric key. Only the crypto module reads `material`.
 */
export interface KeyHandle {
  /** Stable identifier, e.g. "mac" or "envelope" */
  id: string;
  material: Uint8Array;
}

/**
 * Keyed MAC collaborator used to derive blind indexes.
 */
export interface MacProvider {
  computeMac(message: Uint8Array, keyHandle: KeyHandle): Promise<Uint8Array>;
}

/**
 * Authenticated-encryption collaborator that wraps structured documents.
 */
export interface EnvelopeCipher {
  /** Returns an opaque compact envelope */
  encrypt(plaintext: Uint8Array): Promise<string>;
  decrypt(envelope: string): Promise<Uint8Array>;
}

export const MAC_PROVIDER = Symbol('MAC_PROVIDER');
export const ENVELOPE_CIPHER = Symbol('ENVELOPE_CIPHER');
