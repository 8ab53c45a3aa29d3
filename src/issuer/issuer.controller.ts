import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, UseGuards } from '@nestjs/common';
import { ApiCreatedResponse, ApiOkResponse, ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { JsonWebKey } from 'crypto';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { SigningKeyService } from '../crypto/signing-key.service';
import type { SignedCredential } from '../credential/credential.types';
import { IssuanceService } from './issuance.service';
import { IssueCredentialDto } from './dto/issue-credential.dto';
import { ComposeCredentialDto } from './dto/compose-credential.dto';

@ApiTags('Issuer')
@ApiSecurity('api-key')
@Controller()
@UseGuards(ApiKeyGuard)
export class IssuerController {
  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    private readonly issuanceService: IssuanceService,
    private readonly signingKey: SigningKeyService,
  ) {}

  @Post(':profileID/credentials/issueCredential')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Issue a Credential',
    description: 'Adds a status list entry (unless disabled for the profile), sets the issuer and signs.',
  })
  @ApiCreatedResponse({ description: 'The signed credential.' })
  @ApiResponse({ status: 400, description: 'Invalid credential or options.' })
  @ApiResponse({ status: 404, description: 'Profile not found.' })
  async issueCredential(
    @Param('profileID') profileID: string,
    @Body() dto: IssueCredentialDto,
  ): Promise<SignedCredential> {
    return this.issuanceService.issueCredential(profileID, dto.credential, dto.options);
  }

  @Post(':profileID/credentials/composeAndIssueCredential')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Compose and Issue a Credential', description: 'Builds the credential from its parts, then issues it.' })
  @ApiCreatedResponse({ description: 'The signed credential.' })
  @ApiResponse({ status: 400, description: 'Invalid request.' })
  @ApiResponse({ status: 404, description: 'Profile not found.' })
  async composeAndIssueCredential(
    @Param('profileID') profileID: string,
    @Body() dto: ComposeCredentialDto,
  ): Promise<SignedCredential> {
    return this.issuanceService.composeAndIssue(profileID, dto);
  }

  /**
   * Public half of the signing key, for registration in the issuer's DID document.
   */
  @Get('kms/signingKey')
  @ApiOperation({ summary: 'Get the Signing Public Key' })
  @ApiOkResponse({ description: 'Ed25519 public key as a JWK.' })
  getSigningKey(): JsonWebKey {
    return this.signingKey.getPublicKeyJwk();
  }
}
