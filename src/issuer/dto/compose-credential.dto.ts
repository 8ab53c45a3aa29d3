import { IsArray, IsDateString, IsObject, IsOptional, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { SIGNATURE_REPRESENTATIONS } from '../../profile/interfaces';
import type { ComposeCredentialRequest, ProofFormatOptions } from '../interfaces';

export class ProofFormatOptionsDto implements ProofFormatOptions {
  @ApiPropertyOptional({ description: 'Verification method of the signing key' })
  @IsOptional()
  @IsString()
  kid?: string;

  @ApiPropertyOptional({ example: 'assertionMethod' })
  @IsOptional()
  @IsString()
  proofPurpose?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsDateString()
  created?: string;
}

export class ComposeCredentialDto implements ComposeCredentialRequest {
  @ApiPropertyOptional({ description: 'Issuer ID. Replaced by the profile DID when absent.' })
  @IsOptional()
  @IsString()
  issuer?: string;

  @ApiPropertyOptional({ description: 'ID of the credential subject', example: 'did:example:holder' })
  @IsOptional()
  @IsString()
  subject?: string;

  @ApiPropertyOptional({ type: [String], default: ['VerifiableCredential'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  types?: string[];

  @ApiPropertyOptional()
  @IsOptional()
  @IsDateString()
  issuanceDate?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsDateString()
  expirationDate?: string;

  @ApiPropertyOptional({ description: 'Claims about the subject' })
  @IsOptional()
  @IsObject()
  claims?: Record<string, unknown>;

  @ApiPropertyOptional()
  @IsOptional()
  @IsObject()
  evidence?: Record<string, unknown>;

  @ApiPropertyOptional({ description: 'One terms-of-use object or a list of them' })
  @IsOptional()
  termsOfUse?: unknown;

  @ApiPropertyOptional({ enum: SIGNATURE_REPRESENTATIONS, default: 'jws' })
  @IsOptional()
  @IsString()
  proofFormat?: string;

  @ApiPropertyOptional({ type: ProofFormatOptionsDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => ProofFormatOptionsDto)
  proofFormatOptions?: ProofFormatOptionsDto;
}
