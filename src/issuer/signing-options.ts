import { BadRequestException } from '@nestjs/common';
import { isSignatureRepresentation, SIGNATURE_REPRESENTATIONS } from '../profile/interfaces';
import { ComposeCredentialRequest, IssueCredentialOptions, PROOF_PURPOSES, SigningOptions } from './interfaces';

function isProofPurpose(value: string): boolean {
  return PROOF_PURPOSES.some((purpose) => purpose === value);
}

/**
 * @throws {BadRequestException} On an unknown proof purpose or an assertion method
 *   that is not `<did>#<fragment>`
 */
export function validateIssueOptions(options: IssueCredentialOptions | undefined): void {
  if (!options) {
    return;
  }
  if (options.proofPurpose && !isProofPurpose(options.proofPurpose)) {
    throw new BadRequestException(`invalid proof purpose: ${options.proofPurpose}`);
  }
  if (options.assertionMethod && options.assertionMethod.split('#').length !== 2) {
    throw new BadRequestException(`invalid assertion method: ${options.assertionMethod}`);
  }
}

/**
 * Signing options for issueCredential. An explicit verification method wins over the assertion method.
 */
export function issueSigningOptions(options: IssueCredentialOptions | undefined): SigningOptions {
  if (!options) {
    return {};
  }
  return {
    verificationMethod: options.verificationMethod || options.assertionMethod,
    purpose: options.proofPurpose,
    created: options.created,
    challenge: options.challenge,
    domain: options.domain,
  };
}

/**
 * Signing options for composeAndIssueCredential, read from `proofFormat` and `proofFormatOptions`.
 */
export function composeSigningOptions(request: ComposeCredentialRequest): SigningOptions {
  const representation = request.proofFormat || 'jws';
  if (!isSignatureRepresentation(representation)) {
    throw new BadRequestException(
      `failed to prepare signing options: unsupported proof format ${representation}. ` +
        `Must be one of: ${SIGNATURE_REPRESENTATIONS.join(', ')}`,
    );
  }

  const formatOptions = request.proofFormatOptions ?? {};
  if (formatOptions.proofPurpose && !isProofPurpose(formatOptions.proofPurpose)) {
    throw new BadRequestException(`failed to prepare signing options: invalid proof purpose: ${formatOptions.proofPurpose}`);
  }

  return {
    purpose: formatOptions.proofPurpose,
    verificationMethod: formatOptions.kid,
    representation,
    created: formatOptions.created,
  };
}
