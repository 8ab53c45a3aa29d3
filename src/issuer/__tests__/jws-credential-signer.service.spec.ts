import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { createPublicKey, verify } from 'crypto';
import { decodeProtectedHeader, flattenedVerify } from 'jose';
import { JwsCredentialSignerService, proofSigningInput } from '../jws-credential-signer.service';
import { SigningKeyService } from '../../crypto/signing-key.service';
import type { Credential } from '../../credential/credential.types';
import type { Profile } from '../../profile/interfaces';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('JwsCredentialSignerService', () => {
  const restoreLogger = silenceNestLogger();
  let signer: JwsCredentialSignerService;
  let signingKey: SigningKeyService;

  const profile: Profile = {
    name: 'issuer-a',
    uri: 'https://issuer.example.com',
    did: 'did:example:issuer',
    signatureType: 'Ed25519Signature2018',
    signatureRepresentation: 'jws',
    creator: 'did:example:issuer#key-1',
    created: '2024-05-01T12:00:00.000Z',
    disableVCStatus: false,
    overwriteIssuer: false,
  };

  const credential: Credential = {
    '@context': ['https://www.w3.org/2018/credentials/v1'],
    id: 'urn:uuid:vc-1',
    type: ['VerifiableCredential'],
    issuer: { id: 'did:example:issuer', name: 'issuer-a' },
    credentialSubject: { id: 'did:example:holder' },
  };

  afterAll(() => restoreLogger());

  beforeEach(async () => {
    const module = await Test.createTestingModule({
      providers: [
        JwsCredentialSignerService,
        SigningKeyService,
        { provide: ConfigService, useValue: { get: jest.fn().mockReturnValue(undefined) } },
      ],
    }).compile();

    signer = module.get(JwsCredentialSignerService);
    signingKey = module.get(SigningKeyService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('fills the proof from the profile defaults', async () => {
    jest.useFakeTimers({ now: new Date('2024-06-01T08:00:00.000Z'), doNotFake: ['nextTick', 'queueMicrotask', 'setImmediate'] });

    const signed = await signer.signCredential(profile, credential, {});

    expect(signed.proof).toEqual({
      type: 'Ed25519Signature2018',
      created: '2024-06-01T08:00:00.000Z',
      proofPurpose: 'assertionMethod',
      verificationMethod: 'did:example:issuer#key-1',
      jws: expect.stringMatching(/^[\w-]+\.\.[\w-]+$/),
    });
    expect(signed.id).toBe('urn:uuid:vc-1');
  });

  it('produces a detached JWS over the credential and proof options', async () => {
    const signed = await signer.signCredential(profile, credential, { challenge: 'c-1', domain: 'example.com' });
    const { jws, ...proofOptions } = signed.proof;
    const [protectedHeader, , signature] = (jws ?? '').split('.');

    expect(decodeProtectedHeader(jws ?? '')).toEqual({ alg: 'EdDSA', b64: false, crit: ['b64'] });
    await expect(
      flattenedVerify(
        { protected: protectedHeader, payload: proofSigningInput(credential, proofOptions), signature },
        createPublicKey(signingKey.getPrivateKey()),
      ),
    ).resolves.toMatchObject({ protectedHeader: { alg: 'EdDSA' } });
    expect(proofOptions).toMatchObject({ challenge: 'c-1', domain: 'example.com' });
  });

  it('signs into proofValue when asked to', async () => {
    const signed = await signer.signCredential(profile, credential, {
      representation: 'proofValue',
      verificationMethod: 'did:example:issuer#other',
      purpose: 'authentication',
      created: '2024-05-02T00:00:00Z',
    });
    const { proofValue, ...proofOptions } = signed.proof;

    expect(signed.proof.jws).toBeUndefined();
    expect(proofOptions).toEqual({
      type: 'Ed25519Signature2018',
      created: '2024-05-02T00:00:00Z',
      proofPurpose: 'authentication',
      verificationMethod: 'did:example:issuer#other',
    });
    expect(
      verify(
        null,
        proofSigningInput(credential, proofOptions),
        createPublicKey(signingKey.getPrivateKey()),
        Buffer.from(proofValue ?? '', 'base64url'),
      ),
    ).toBe(true);
  });

  it('uses the profile representation when the request names none', async () => {
    const signed = await signer.signCredential({ ...profile, signatureRepresentation: 'proofValue' }, credential, {});

    expect(signed.proof.proofValue).toEqual(expect.any(String));
    expect(signed.proof.jws).toBeUndefined();
  });

  it('ignores a proof already on the credential', async () => {
    const withProof: Credential = { ...credential, proof: { type: 'Old' } };

    expect(proofSigningInput(withProof, { type: 't', created: 'c', proofPurpose: 'p', verificationMethod: 'v' })).toEqual(
      proofSigningInput(credential, { type: 't', created: 'c', proofPurpose: 'p', verificationMethod: 'v' }),
    );
  });
});
