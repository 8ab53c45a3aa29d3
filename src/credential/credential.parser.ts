import {
  BASE_CONTEXT,
  Credential,
  CredentialIssuer,
  CredentialStatus,
  JsonContext,
  TypedId,
  VERIFIABLE_CREDENTIAL_TYPE,
} from './credential.types';

/**
 * A value that is not a well-formed verifiable credential.
 */
export class InvalidCredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCredentialError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseContexts(value: unknown): JsonContext[] {
  const contexts = typeof value === 'string' ? [value] : value;
  if (!Array.isArray(contexts) || contexts.length === 0) {
    throw new InvalidCredentialError('@context is required');
  }

  const parsed: JsonContext[] = [];
  for (const context of contexts) {
    if (typeof context !== 'string' && !isRecord(context)) {
      throw new InvalidCredentialError('@context entries must be URIs or objects');
    }
    parsed.push(context);
  }

  if (parsed[0] !== BASE_CONTEXT) {
    throw new InvalidCredentialError(`the first @context entry must be ${BASE_CONTEXT}`);
  }
  return parsed;
}

function parseTypes(value: unknown): string[] {
  const types = typeof value === 'string' ? [value] : value;
  if (!Array.isArray(types) || !types.every((type): type is string => typeof type === 'string')) {
    throw new InvalidCredentialError('type must be a string or an array of strings');
  }
  if (!types.includes(VERIFIABLE_CREDENTIAL_TYPE)) {
    throw new InvalidCredentialError(`type must include ${VERIFIABLE_CREDENTIAL_TYPE}`);
  }
  return types;
}

function parseIssuer(value: unknown): CredentialIssuer | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (isRecord(value)) {
    const { id, name, ...rest } = value;
    if (typeof id === 'string' && (name === undefined || typeof name === 'string')) {
      return Object.assign(rest, { id, name });
    }
  }
  throw new InvalidCredentialError('issuer must be a URI or an object with an id');
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value !== undefined && typeof value !== 'string') {
    throw new InvalidCredentialError(`${field} must be a string`);
  }
  return value;
}

function parseCredentialStatus(value: unknown): CredentialStatus | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.type === 'string' &&
    typeof value.statusListIndex === 'string' &&
    typeof value.statusListCredential === 'string'
  ) {
    return {
      id: value.id,
      type: value.type,
      statusListIndex: value.statusListIndex,
      statusListCredential: value.statusListCredential,
    };
  }
  throw new InvalidCredentialError('credentialStatus must carry id, type, statusListIndex and statusListCredential');
}

/**
 * Parse one `TypedId` (`termsOfUse` entry): an object with a string or string-array `type`.
 */
export function parseTypedId(value: unknown): TypedId {
  if (!isRecord(value)) {
    throw new InvalidCredentialError('expected an object');
  }

  const { id, type, ...rest } = value;
  if (id !== undefined && typeof id !== 'string') {
    throw new InvalidCredentialError('id must be a string');
  }
  if (typeof type === 'string') {
    return Object.assign(rest, { id, type });
  }
  if (Array.isArray(type) && type.every((entry): entry is string => typeof entry === 'string')) {
    return Object.assign(rest, { id, type });
  }
  throw new InvalidCredentialError('type must be a string or an array of strings');
}

/**
 * `termsOfUse` is either one object or a list of them.
 */
export function parseTermsOfUse(value: unknown): TypedId[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const entries = Array.isArray(value) ? value : [value];
  try {
    return entries.map(parseTypedId);
  } catch (error) {
    throw new InvalidCredentialError(`invalid termsOfUse: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Validate the structure of a credential. Any embedded `proof` is dropped; it is
 * never checked. Members this service does not interpret are kept as they are.
 */
export function parseCredential(value: unknown): Credential {
  if (!isRecord(value)) {
    throw new InvalidCredentialError('credential must be a JSON object');
  }

  const {
    proof: _proof,
    '@context': context,
    type,
    id,
    issuer,
    issuanceDate,
    expirationDate,
    credentialSubject,
    credentialStatus,
    termsOfUse,
    ...extensions
  } = value;

  if (credentialSubject === undefined || credentialSubject === null) {
    throw new InvalidCredentialError('credentialSubject is required');
  }

  const credential: Credential = {
    '@context': parseContexts(context),
    id: optionalString(id, 'id'),
    type: parseTypes(type),
    issuer: parseIssuer(issuer),
    issuanceDate: optionalString(issuanceDate, 'issuanceDate'),
    expirationDate: optionalString(expirationDate, 'expirationDate'),
    credentialSubject,
    credentialStatus: parseCredentialStatus(credentialStatus),
    termsOfUse: parseTermsOfUse(termsOfUse),
  };

  return Object.assign(extensions, credential);
}

/**
 * Parse a credential sent as a JSON string.
 */
export function parseCredentialJson(raw: string): Credential {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new InvalidCredentialError(error instanceof Error ? error.message : String(error));
  }
  return parseCredential(value);
}

/**
 * ID of a credential issuer, whichever form it takes.
 */
export function issuerId(issuer: CredentialIssuer | undefined): string | undefined {
  return typeof issuer === 'string' ? issuer : issuer?.id;
}
