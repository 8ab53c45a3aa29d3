import type { Credential, SignedCredential } from '../credential/credential.types';
import type { CredentialDraft } from '../credential/credential.composer';
import type { Profile, SignatureRepresentation } from '../profile/interfaces';

export const PROOF_PURPOSES = [
  'assertionMethod',
  'authentication',
  'capabilityDelegation',
  'capabilityInvocation',
] as const;
export type ProofPurpose = (typeof PROOF_PURPOSES)[number];

export const DEFAULT_PROOF_PURPOSE: ProofPurpose = 'assertionMethod';

/**
 * Per-request overrides of the profile's signing defaults. Unset fields fall back to the profile.
 */
export interface SigningOptions {
  verificationMethod?: string;
  purpose?: string;
  representation?: SignatureRepresentation;
  /** ISO 8601 */
  created?: string;
  challenge?: string;
  domain?: string;
}

/**
 * Options accepted by the issueCredential endpoint.
 */
export interface IssueCredentialOptions {
  verificationMethod?: string;
  assertionMethod?: string;
  proofPurpose?: string;
  created?: string;
  challenge?: string;
  domain?: string;
}

export interface ProofFormatOptions {
  kid?: string;
  proofPurpose?: string;
  created?: string;
}

/**
 * Body of composeAndIssueCredential: the credential's parts plus how to sign it.
 */
export interface ComposeCredentialRequest extends CredentialDraft {
  proofFormat?: string;
  proofFormatOptions?: ProofFormatOptions;
}

/**
 * Produces the proof of an issued credential.
 */
export interface CredentialSigner {
  signCredential(profile: Profile, credential: Credential, options: SigningOptions): Promise<SignedCredential>;
}

export const CREDENTIAL_SIGNER = Symbol('CREDENTIAL_SIGNER');
