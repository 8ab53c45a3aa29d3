import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ProfileService } from '../profile/profile.service';
import type { Profile } from '../profile/interfaces';
import { StatusListAllocatorService } from '../status/status-list-allocator.service';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { UpstreamException } from '../shared/errors';
import { InvalidCredentialError, issuerId, parseCredential } from '../credential/credential.parser';
import { composeCredential } from '../credential/credential.composer';
import {
  Credential,
  JSON_WEB_SIGNATURE_2020_CONTEXT,
  SignedCredential,
  STATUS_LIST_CONTEXT,
} from '../credential/credential.types';
import {
  ComposeCredentialRequest,
  CREDENTIAL_SIGNER,
  CredentialSigner,
  IssueCredentialOptions,
  SigningOptions,
} from './interfaces';
import { composeSigningOptions, issueSigningOptions, validateIssueOptions } from './signing-options';

/**
 * Turns an unsigned credential into an issued one for a profile: status slot,
 * contexts, issuer, proof. Any failure aborts the issuance and leaves nothing signed.
 */
function addContext(credential: Credential, context: string): void {
  if (!credential['@context'].includes(context)) {
    credential['@context'].push(context);
  }
}

@Injectable()
export class IssuanceService {
  private readonly logger = new Logger(IssuanceService.name);

  /* v8 ignore next 6 - false positive on constructor parameter properties */
  constructor(
    private readonly profileService: ProfileService,
    private readonly statusAllocator: StatusListAllocatorService,
    @Inject(CREDENTIAL_SIGNER) private readonly signer: CredentialSigner,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * POST /:profileID/credentials/issueCredential
   */
  async issueCredential(
    profileName: string,
    rawCredential: unknown,
    options: IssueCredentialOptions | undefined,
  ): Promise<SignedCredential> {
    const profile = await this.profileService.getProfile(profileName);
    validateIssueOptions(options);

    let credential: Credential;
    try {
      credential = parseCredential(rawCredential);
    } catch (error) {
      if (error instanceof InvalidCredentialError) {
        throw new BadRequestException(`failed to validate credential: ${error.message}`);
      }
      throw error;
    }

    return this.issue(profile, credential, issueSigningOptions(options));
  }

  /**
   * POST /:profileID/credentials/composeAndIssueCredential
   */
  async composeAndIssue(profileName: string, request: ComposeCredentialRequest): Promise<SignedCredential> {
    const profile = await this.profileService.getProfile(profileName);

    let credential: Credential;
    try {
      credential = composeCredential(request);
    } catch (error) {
      if (error instanceof InvalidCredentialError) {
        throw new BadRequestException(`failed to build credential: ${error.message}`);
      }
      throw error;
    }

    return this.issue(profile, credential, composeSigningOptions(request));
  }

  async issue(profile: Profile, credential: Credential, options: SigningOptions): Promise<SignedCredential> {
    const prepared: Credential = { ...credential, '@context': [...credential['@context']] };

    if (!profile.disableVCStatus) {
      prepared.credentialStatus = await this.statusAllocator.createStatus();
      addContext(prepared, STATUS_LIST_CONTEXT);
    }

    if (profile.signatureType === 'JsonWebSignature2020') {
      addContext(prepared, JSON_WEB_SIGNATURE_2020_CONTEXT);
    }

    if (profile.overwriteIssuer || !issuerId(prepared.issuer)) {
      prepared.issuer = { id: profile.did, name: profile.name };
    }

    let signed: SignedCredential;
    try {
      signed = await this.signer.signCredential(profile, prepared, options);
    } catch (error) {
      throw new UpstreamException('failed to sign credential', 'issuing credential', error);
    }

    this.metricsService.increment(METRIC_PATHS.CREDENTIALS_ISSUED_TOTAL);
    this.logger.log(`Issued credential ${signed.id ?? '(no id)'} for profile ${profile.name}`);
    return signed;
  }
}
