import { IsDateString, IsObject, IsOptional, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { PROOF_PURPOSES } from '../interfaces';
import type { IssueCredentialOptions } from '../interfaces';

export class IssueCredentialOptionsDto implements IssueCredentialOptions {
  @ApiPropertyOptional({ description: 'Verification method for the proof. Takes priority over assertionMethod.' })
  @IsOptional()
  @IsString()
  verificationMethod?: string;

  @ApiPropertyOptional({ description: 'Assertion method, `<did>#<fragment>`', example: 'did:example:issuer#key-1' })
  @IsOptional()
  @IsString()
  assertionMethod?: string;

  @ApiPropertyOptional({ enum: PROOF_PURPOSES, default: 'assertionMethod' })
  @IsOptional()
  @IsString()
  proofPurpose?: string;

  @ApiPropertyOptional({ description: 'Proof creation time (ISO 8601). Defaults to now.' })
  @IsOptional()
  @IsDateString()
  created?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  challenge?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  domain?: string;
}

export class IssueCredentialDto {
  @ApiProperty({
    description: 'Unsigned verifiable credential. An existing proof is discarded.',
    example: {
      '@context': ['https://www.w3.org/2018/credentials/v1'],
      id: 'urn:uuid:vc-1',
      type: ['VerifiableCredential'],
      credentialSubject: { id: 'did:example:holder' },
    },
  })
  @IsObject()
  credential!: Record<string, unknown>;

  @ApiPropertyOptional({ type: IssueCredentialOptionsDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => IssueCredentialOptionsDto)
  options?: IssueCredentialOptionsDto;
}
