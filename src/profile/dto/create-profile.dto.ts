import { IsBoolean, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { SIGNATURE_REPRESENTATIONS, SIGNATURE_TYPES } from '../interfaces';
import type { CreateProfileRequest } from '../interfaces';

/**
 * Presence and format of the required fields are checked by ProfileService.
 */
export class CreateProfileDto implements CreateProfileRequest {
  @ApiProperty({ description: 'Unique profile name', example: 'issuer-a' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  name?: string;

  @ApiProperty({ description: 'Issuer URI', example: 'https://issuer.example.com' })
  @IsOptional()
  @IsString()
  uri?: string;

  @ApiProperty({ description: 'Issuer DID', example: 'did:example:issuer' })
  @IsOptional()
  @IsString()
  did?: string;

  @ApiProperty({ description: 'Proof type used when signing', enum: SIGNATURE_TYPES })
  @IsOptional()
  @IsString()
  signatureType?: string;

  @ApiPropertyOptional({ description: 'Where the signature goes in the proof', enum: SIGNATURE_REPRESENTATIONS, default: 'jws' })
  @IsOptional()
  @IsString()
  signatureRepresentation?: string;

  @ApiPropertyOptional({
    description: 'Default verification method. Defaults to `<did>#key-1`.',
    example: 'did:example:issuer#key-1',
  })
  @IsOptional()
  @IsString()
  creator?: string;

  @ApiPropertyOptional({ description: 'Issue credentials without a status list entry', default: false })
  @IsOptional()
  @IsBoolean()
  disableVCStatus?: boolean;

  @ApiPropertyOptional({ description: 'Replace the issuer of incoming credentials with this profile', default: false })
  @IsOptional()
  @IsBoolean()
  overwriteIssuer?: boolean;
}
