import { ApiProperty } from '@nestjs/swagger';
import { SIGNATURE_REPRESENTATIONS, SIGNATURE_TYPES } from '../interfaces';
import type { Profile, SignatureRepresentation, SignatureType } from '../interfaces';

export class ProfileResponseDto implements Profile {
  @ApiProperty({ example: 'issuer-a' })
  name!: string;

  @ApiProperty({ example: 'https://issuer.example.com' })
  uri!: string;

  @ApiProperty({ example: 'did:example:issuer' })
  did!: string;

  @ApiProperty({ enum: SIGNATURE_TYPES })
  signatureType!: SignatureType;

  @ApiProperty({ enum: SIGNATURE_REPRESENTATIONS })
  signatureRepresentation!: SignatureRepresentation;

  @ApiProperty({ example: 'did:example:issuer#key-1' })
  creator!: string;

  @ApiProperty({ example: '2024-05-01T12:00:00.000Z' })
  created!: string;

  @ApiProperty()
  disableVCStatus!: boolean;

  @ApiProperty()
  overwriteIssuer!: boolean;
}
