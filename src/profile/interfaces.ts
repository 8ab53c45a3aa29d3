export const SIGNATURE_TYPES = ['Ed25519Signature2018', 'JsonWebSignature2020'] as const;
export type SignatureType = (typeof SIGNATURE_TYPES)[number];

export const SIGNATURE_REPRESENTATIONS = ['proofValue', 'jws'] as const;
export type SignatureRepresentation = (typeof SIGNATURE_REPRESENTATIONS)[number];

/**
 * Issuer profile. Its name doubles as the `referenceId` of the profile's vault.
 */
export interface Profile {
  name: string;
  uri: string;
  did: string;
  signatureType: SignatureType;
  signatureRepresentation: SignatureRepresentation;
  /** Verification method used when a request names none */
  creator: string;
  /** ISO 8601 creation time */
  created: string;
  disableVCStatus: boolean;
  overwriteIssuer: boolean;
}

export interface CreateProfileRequest {
  name?: string;
  uri?: string;
  did?: string;
  signatureType?: string;
  signatureRepresentation?: string;
  creator?: string;
  disableVCStatus?: boolean;
  overwriteIssuer?: boolean;
}

/**
 * Profile persistence.
 */
export interface ProfileStore {
  /** @throws {NotFoundException} when no profile has this name */
  getProfile(name: string): Promise<Profile>;
  /** @throws {ConflictException} when a profile with this name exists; the stored one is left as is */
  createProfile(profile: Profile): Promise<void>;
}

export const PROFILE_STORE = Symbol('PROFILE_STORE');

export function isSignatureType(value: string): value is SignatureType {
  return SIGNATURE_TYPES.some((type) => type === value);
}

export function isSignatureRepresentation(value: string): value is SignatureRepresentation {
  return SIGNATURE_REPRESENTATIONS.some((representation) => representation === value);
}
