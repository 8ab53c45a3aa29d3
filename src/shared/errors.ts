import { ConflictException, InternalServerErrorException } from '@nestjs/common';
import { getErrorMessage } from './error.utils';

/**
 * Raised when a collaborator (signer, crypto, vault) fails. The message carries
 * the operation that was in progress so callers can tell failures apart.
 */
export class UpstreamException extends InternalServerErrorException {
  public readonly operation: string;

  constructor(summary: string, operation: string, cause: unknown) {
    super(`${summary} while ${operation}: ${getErrorMessage(cause)}`, { cause });
    this.name = 'UpstreamException';
    this.operation = operation;
  }
}

/**
 * The keyed MAC or the envelope cipher could not be evaluated.
 * There is no fallback: the enclosing operation must fail.
 */
export class CryptoUnavailableException extends UpstreamException {
  constructor(operation: string, cause: unknown) {
    super('cryptographic operation unavailable', operation, cause);
    this.name = 'CryptoUnavailableException';
  }
}

export const INCONSISTENT_STATE_MESSAGE =
  'multiple VCs with differing contents were found matching the given ID. This indicates inconsistency in ' +
  'the VC database. To solve this, delete the extra VCs and leave only one';

/**
 * Duplicate documents behind one blind index decrypted to different payloads.
 */
export class InconsistentStateException extends ConflictException {
  public readonly matches: number;

  constructor(matches: number) {
    super(INCONSISTENT_STATE_MESSAGE);
    this.name = 'InconsistentStateException';
    this.matches = matches;
  }
}
