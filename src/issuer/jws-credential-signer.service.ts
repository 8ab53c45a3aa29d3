import { Injectable, Logger } from '@nestjs/common';
import { FlattenedSign } from 'jose';
import { sign } from 'crypto';
import { SigningKeyService } from '../crypto/signing-key.service';
import type { Credential, Proof, SignedCredential } from '../credential/credential.types';
import type { Profile } from '../profile/interfaces';
import { CredentialSigner, DEFAULT_PROOF_PURPOSE, SigningOptions } from './interfaces';

const DETACHED_JWS_HEADER = { alg: 'EdDSA', b64: false, crit: ['b64'] };

/**
 * Bytes covered by a proof: the credential without any proof, followed by the proof options.
 */
export function proofSigningInput(credential: Credential, proofOptions: Proof): Uint8Array {
  const { proof: _existing, ...unsigned } = credential;
  return Buffer.from(JSON.stringify({ credential: unsigned, proof: proofOptions }), 'utf-8');
}

/**
 * Signs credentials with the service's Ed25519 key, as a detached JWS (RFC 7797)
 * or a raw base64url signature in `proofValue`.
 */
@Injectable()
export class JwsCredentialSignerService implements CredentialSigner {
  private readonly logger = new Logger(JwsCredentialSignerService.name);

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly signingKey: SigningKeyService) {}

  async signCredential(profile: Profile, credential: Credential, options: SigningOptions): Promise<SignedCredential> {
    const proof: Proof = {
      type: profile.signatureType,
      created: options.created ?? new Date().toISOString(),
      proofPurpose: options.purpose || DEFAULT_PROOF_PURPOSE,
      verificationMethod: options.verificationMethod || profile.creator,
    };
    if (options.challenge) {
      proof.challenge = options.challenge;
    }
    if (options.domain) {
      proof.domain = options.domain;
    }

    const input = proofSigningInput(credential, proof);
    const representation = options.representation ?? profile.signatureRepresentation;

    if (representation === 'jws') {
      const jws = await new FlattenedSign(input)
        .setProtectedHeader(DETACHED_JWS_HEADER)
        .sign(this.signingKey.getPrivateKey());
      proof.jws = `${jws.protected ?? ''}..${jws.signature}`;
    } else {
      proof.proofValue = sign(null, input, this.signingKey.getPrivateKey()).toString('base64url');
    }

    this.logger.debug(`Signed credential ${credential.id ?? '(no id)'} with ${proof.verificationMethod}`);
    return { ...credential, proof };
  }
}
