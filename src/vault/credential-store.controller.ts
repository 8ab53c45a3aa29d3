import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Query,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { CredentialStoreService } from './credential-store.service';
import { RetrieveCredentialQueryDto, StoreCredentialDto } from './dto/store-credential.dto';
import { InvalidCredentialError, parseCredentialJson } from '../credential/credential.parser';

@ApiTags('Credential Store')
@ApiSecurity('api-key')
@Controller()
@UseGuards(ApiKeyGuard)
export class CredentialStoreController {
  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly credentialStore: CredentialStoreService) {}

  /**
   * POST /store
   * Encrypts a credential into the profile's vault, indexed by the credential ID.
   */
  @Post('store')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Store a Credential',
    description: 'Stores the credential in the encrypted vault of the given profile. The vault is created on first use.',
  })
  @ApiOkResponse({ description: 'Credential stored.' })
  @ApiResponse({ status: 400, description: 'Credential is malformed or has no ID, or the profile is missing.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  async storeCredential(@Body() dto: StoreCredentialDto): Promise<void> {
    let credentialId: string | undefined;
    try {
      credentialId = parseCredentialJson(dto.credential).id;
    } catch (error) {
      if (error instanceof InvalidCredentialError) {
        throw new BadRequestException(`unable to unmarshal the VC: ${error.message}`);
      }
      throw error;
    }

    if (!credentialId) {
      throw new BadRequestException('missing verifiable credential ID');
    }

    await this.credentialStore.storeCredential(dto.credential, credentialId, dto.profile);
  }

  /**
   * GET /retrieve?id=&profile=
   * Returns the exact bytes that were stored.
   */
  @Get('retrieve')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Retrieve a Credential',
    description: 'Looks the credential up by its ID and returns it exactly as it was stored.',
  })
  @ApiOkResponse({ description: 'The stored credential.' })
  @ApiResponse({ status: 404, description: 'No credential with this ID in the profile vault.' })
  @ApiResponse({ status: 409, description: 'Several differing credentials are stored under this ID.' })
  async retrieveCredential(@Query() query: RetrieveCredentialQueryDto): Promise<StreamableFile> {
    const payload = await this.credentialStore.retrieveCredential(query.id, query.profile);
    return new StreamableFile(payload, { type: 'application/json', length: payload.length });
  }
}
