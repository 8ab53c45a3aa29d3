import { InvalidCredentialError, issuerId, parseCredential, parseCredentialJson, parseTypedId } from '../credential.parser';
import { BASE_CONTEXT } from '../credential.types';

describe('credential parser', () => {
  const valid = {
    '@context': [BASE_CONTEXT, 'https://www.w3.org/2018/credentials/examples/v1'],
    id: 'http://example.edu/credentials/1872',
    type: ['VerifiableCredential', 'UniversityDegreeCredential'],
    issuer: 'did:example:76e12ec712ebc6f1c221ebfeb1f',
    issuanceDate: '2010-01-01T19:23:24Z',
    credentialSubject: { id: 'did:example:ebfeb1f712ebc6f1c276e12ec21', degree: 'BachelorDegree' },
  };

  describe('parseCredential', () => {
    it('accepts a well-formed credential', () => {
      const credential = parseCredential(valid);

      expect(credential).toEqual(valid);
      expect(credential.id).toBe('http://example.edu/credentials/1872');
    });

    it('drops an embedded proof', () => {
      const credential = parseCredential({ ...valid, proof: { type: 'Ed25519Signature2018' } });

      expect(credential.proof).toBeUndefined();
    });

    it('keeps members it does not interpret', () => {
      const credential = parseCredential({ ...valid, refreshService: { id: 'https://example.edu/refresh' } });

      expect(credential.refreshService).toEqual({ id: 'https://example.edu/refresh' });
    });

    it('normalises a single context and type to arrays', () => {
      const credential = parseCredential({ ...valid, '@context': BASE_CONTEXT, type: 'VerifiableCredential' });

      expect(credential['@context']).toEqual([BASE_CONTEXT]);
      expect(credential.type).toEqual(['VerifiableCredential']);
    });

    it('accepts an issuer object', () => {
      const credential = parseCredential({ ...valid, issuer: { id: 'did:example:issuer', name: 'Example University' } });

      expect(credential.issuer).toEqual({ id: 'did:example:issuer', name: 'Example University' });
    });

    it.each([
      ['a non-object', [], 'credential must be a JSON object'],
      ['a missing context', { ...valid, '@context': undefined }, '@context is required'],
      ['a wrong base context', { ...valid, '@context': ['https://example.com/v1'] }, `the first @context entry must be ${BASE_CONTEXT}`],
      ['a missing VerifiableCredential type', { ...valid, type: ['Degree'] }, 'type must include VerifiableCredential'],
      ['a numeric type', { ...valid, type: [1] }, 'type must be a string or an array of strings'],
      ['a missing subject', { ...valid, credentialSubject: undefined }, 'credentialSubject is required'],
      ['an issuer without id', { ...valid, issuer: { name: 'x' } }, 'issuer must be a URI or an object with an id'],
      ['a numeric id', { ...valid, id: 7 }, 'id must be a string'],
      ['a malformed status', { ...valid, credentialStatus: { id: 'x' } }, 'credentialStatus must carry id, type, statusListIndex and statusListCredential'],
    ])('rejects %s', (_label, input, message) => {
      expect(() => parseCredential(input)).toThrow(new InvalidCredentialError(message));
    });
  });

  describe('parseCredentialJson', () => {
    it('parses a JSON string', () => {
      expect(parseCredentialJson(JSON.stringify(valid)).id).toBe(valid.id);
    });

    it('reports invalid JSON as InvalidCredentialError', () => {
      expect(() => parseCredentialJson('{')).toThrow(InvalidCredentialError);
    });
  });

  describe('parseTypedId', () => {
    it('accepts a string type', () => {
      expect(parseTypedId({ type: 'IssuerPolicy', id: 'http://example.com/policies/1' })).toEqual({
        type: 'IssuerPolicy',
        id: 'http://example.com/policies/1',
      });
    });

    it('rejects a missing type', () => {
      expect(() => parseTypedId({ id: 'x' })).toThrow('type must be a string or an array of strings');
    });
  });

  describe('issuerId', () => {
    it('handles both issuer forms', () => {
      expect(issuerId('did:example:a')).toBe('did:example:a');
      expect(issuerId({ id: 'did:example:b' })).toBe('did:example:b');
      expect(issuerId(undefined)).toBeUndefined();
    });
  });
});
