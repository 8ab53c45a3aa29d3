import { BASE_CONTEXT, Credential, VERIFIABLE_CREDENTIAL_TYPE } from './credential.types';
import { parseTermsOfUse } from './credential.parser';

export interface CredentialDraft {
  issuer?: string;
  subject?: string;
  types?: string[];
  issuanceDate?: string;
  expirationDate?: string;
  claims?: Record<string, unknown>;
  evidence?: Record<string, unknown>;
  termsOfUse?: unknown;
}

/**
 * Build an unsigned credential from its parts. Claims become the subject, with `subject` as its id.
 */
export function composeCredential(draft: CredentialDraft): Credential {
  const credential: Credential = {
    '@context': [BASE_CONTEXT],
    type: draft.types && draft.types.length > 0 ? [...draft.types] : [VERIFIABLE_CREDENTIAL_TYPE],
    credentialSubject: { ...draft.claims, id: draft.subject },
  };

  if (draft.issuer) {
    credential.issuer = { id: draft.issuer };
  }
  if (draft.issuanceDate) {
    credential.issuanceDate = draft.issuanceDate;
  }
  if (draft.expirationDate) {
    credential.expirationDate = draft.expirationDate;
  }

  const termsOfUse = parseTermsOfUse(draft.termsOfUse ?? undefined);
  if (termsOfUse) {
    credential.termsOfUse = termsOfUse;
  }
  if (draft.evidence) {
    credential.evidence = draft.evidence;
  }
  return credential;
}
