export const BASE_CONTEXT = 'https://www.w3.org/2018/credentials/v1';
export const STATUS_LIST_CONTEXT = 'https://w3id.org/vc-status-list-2017/v1';
export const JSON_WEB_SIGNATURE_2020_CONTEXT = 'https://trustbloc.github.io/context/vc/credentials-v1.jsonld';

export const VERIFIABLE_CREDENTIAL_TYPE = 'VerifiableCredential';
export const CREDENTIAL_STATUS_TYPE = 'CredentialStatusList2017';

export type JsonContext = string | Record<string, unknown>;

export interface IssuerObject {
  id: string;
  name?: string;
  [key: string]: unknown;
}

export type CredentialIssuer = string | IssuerObject;

/**
 * Reference from a credential to its status list slot.
 */
export interface CredentialStatus {
  id: string;
  type: string;
  statusListIndex: string;
  statusListCredential: string;
}

export interface TypedId {
  id?: string;
  type: string | string[];
  [key: string]: unknown;
}

export interface Proof {
  type: string;
  created: string;
  proofPurpose: string;
  verificationMethod: string;
  jws?: string;
  proofValue?: string;
  challenge?: string;
  domain?: string;
}

/**
 * A W3C verifiable credential after parsing. Unknown top-level members are kept.
 */
export interface Credential {
  '@context': JsonContext[];
  id?: string;
  type: string[];
  issuer?: CredentialIssuer;
  issuanceDate?: string;
  expirationDate?: string;
  credentialSubject: unknown;
  credentialStatus?: CredentialStatus;
  termsOfUse?: TypedId[];
  evidence?: unknown;
  [key: string]: unknown;
}

export interface SignedCredential extends Credential {
  proof: Proof;
}
