import { IsNotEmpty, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class StoreCredentialDto {
  @ApiProperty({ description: 'Name of the profile whose vault receives the credential.', example: 'issuer-a' })
  @IsString()
  @IsNotEmpty({ message: 'missing profile name' })
  profile!: string;

  @ApiProperty({
    description: 'The verifiable credential as a JSON string. It is stored byte for byte.',
    example: '{"@context":["https://www.w3.org/2018/credentials/v1"],"id":"urn:uuid:vc-1","type":["VerifiableCredential"],"credentialSubject":{"id":"did:example:holder"}}',
  })
  @IsString()
  credential!: string;
}

export class RetrieveCredentialQueryDto {
  @ApiProperty({ description: 'ID of the credential.', example: 'urn:uuid:vc-1' })
  @IsString()
  @IsNotEmpty({ message: 'missing verifiable credential ID' })
  id!: string;

  @ApiProperty({ description: 'Name of the profile whose vault holds the credential.', example: 'issuer-a' })
  @IsString()
  @IsNotEmpty({ message: 'missing profile name' })
  profile!: string;
}
