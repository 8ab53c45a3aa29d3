import { composeCredential } from '../credential.composer';
import { InvalidCredentialError } from '../credential.parser';

describe('composeCredential', () => {
  it('builds a minimal credential', () => {
    expect(composeCredential({ subject: 'did:example:holder' })).toEqual({
      '@context': ['https://www.w3.org/2018/credentials/v1'],
      type: ['VerifiableCredential'],
      credentialSubject: { id: 'did:example:holder' },
    });
  });

  it('uses the given types, dates and issuer', () => {
    const credential = composeCredential({
      issuer: 'did:example:issuer',
      types: ['VerifiableCredential', 'UniversityDegreeCredential'],
      issuanceDate: '2024-05-01T12:00:00Z',
      expirationDate: '2025-05-01T12:00:00Z',
    });

    expect(credential).toMatchObject({
      type: ['VerifiableCredential', 'UniversityDegreeCredential'],
      issuer: { id: 'did:example:issuer' },
      issuanceDate: '2024-05-01T12:00:00Z',
      expirationDate: '2025-05-01T12:00:00Z',
    });
  });

  it('puts the claims into the subject, with the subject id taking precedence', () => {
    const credential = composeCredential({
      subject: 'did:example:holder',
      claims: { id: 'did:example:other', degree: { type: 'BachelorDegree' } },
    });

    expect(credential.credentialSubject).toEqual({ id: 'did:example:holder', degree: { type: 'BachelorDegree' } });
  });

  it('wraps a single terms-of-use object in a list', () => {
    const credential = composeCredential({ termsOfUse: { id: 'urn:tou:1', type: 'IssuerPolicy' } });

    expect(credential.termsOfUse).toEqual([{ id: 'urn:tou:1', type: 'IssuerPolicy' }]);
  });

  it('accepts a list of terms of use', () => {
    const credential = composeCredential({
      termsOfUse: [{ type: 'IssuerPolicy' }, { type: ['HolderPolicy', 'Extra'], profile: 'p-1' }],
    });

    expect(credential.termsOfUse).toEqual([
      { id: undefined, type: 'IssuerPolicy' },
      { id: undefined, type: ['HolderPolicy', 'Extra'], profile: 'p-1' },
    ]);
  });

  it('rejects terms of use that are neither an object nor a list of objects', () => {
    expect(() => composeCredential({ termsOfUse: 'policy' })).toThrow(InvalidCredentialError);
    expect(() => composeCredential({ termsOfUse: [{ id: 'urn:tou:1' }] })).toThrow(
      'invalid termsOfUse: type must be a string or an array of strings',
    );
  });

  it('keeps the evidence', () => {
    expect(composeCredential({ evidence: { id: 'urn:evidence:1' } }).evidence).toEqual({ id: 'urn:evidence:1' });
  });
});
