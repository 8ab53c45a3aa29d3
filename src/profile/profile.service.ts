import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { VAULT_GATEWAY, VaultGateway } from '../vault/interfaces';
import { VaultAlreadyExistsError } from '../vault/vault.errors';
import { UpstreamException } from '../shared/errors';
import { getErrorMessage } from '../shared/error.utils';
import {
  CreateProfileRequest,
  isSignatureRepresentation,
  isSignatureType,
  Profile,
  PROFILE_STORE,
  ProfileStore,
  SIGNATURE_REPRESENTATIONS,
  SIGNATURE_TYPES,
} from './interfaces';

const DEFAULT_KEY_FRAGMENT = 'key-1';

@Injectable()
export class ProfileService {
  private readonly logger = new Logger(ProfileService.name);

  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    @Inject(PROFILE_STORE) private readonly profileStore: ProfileStore,
    @Inject(VAULT_GATEWAY) private readonly vault: VaultGateway,
  ) {}

  async getProfile(name: string): Promise<Profile> {
    return this.profileStore.getProfile(name);
  }

  /**
   * Validate and save a new profile, then create its vault.
   *
   * @throws {BadRequestException} If a required field is missing or malformed
   * @throws {ConflictException} If a profile with this name exists
   */
  async createProfile(request: CreateProfileRequest): Promise<Profile> {
    const profile = this.buildProfile(request);

    await this.profileStore.createProfile(profile);

    try {
      await this.vault.createDataVault({ referenceId: profile.name, sequence: 0 });
    } catch (error) {
      if (!(error instanceof VaultAlreadyExistsError)) {
        throw new UpstreamException('vault request failed', 'creating vault for profile', error);
      }
      this.logger.debug(`Vault for profile ${profile.name} already exists`);
    }

    this.logger.log(`Created profile ${profile.name} (${profile.did})`);
    return profile;
  }

  private buildProfile(request: CreateProfileRequest): Profile {
    if (!request.name) {
      throw new BadRequestException('missing profile name');
    }
    if (!request.uri) {
      throw new BadRequestException('missing URI information');
    }
    if (!request.signatureType) {
      throw new BadRequestException('missing signature type');
    }

    try {
      new URL(request.uri);
    } catch (error) {
      throw new BadRequestException(`invalid uri: ${getErrorMessage(error)}`);
    }

    if (!isSignatureType(request.signatureType)) {
      throw new BadRequestException(
        `unsupported signature type ${request.signatureType}. Must be one of: ${SIGNATURE_TYPES.join(', ')}`,
      );
    }

    const representation = request.signatureRepresentation ?? 'jws';
    if (!isSignatureRepresentation(representation)) {
      throw new BadRequestException(
        `unsupported signature representation ${representation}. Must be one of: ${SIGNATURE_REPRESENTATIONS.join(', ')}`,
      );
    }

    if (!request.did) {
      throw new BadRequestException('missing DID');
    }
    if (!request.did.startsWith('did:')) {
      throw new BadRequestException(`invalid DID: ${request.did}`);
    }

    return {
      name: request.name,
      uri: request.uri,
      did: request.did,
      signatureType: request.signatureType,
      signatureRepresentation: representation,
      creator: request.creator || `${request.did}#${DEFAULT_KEY_FRAGMENT}`,
      created: new Date().toISOString(),
      disableVCStatus: request.disableVCStatus ?? false,
      overwriteIssuer: request.overwriteIssuer ?? false,
    };
  }
}
