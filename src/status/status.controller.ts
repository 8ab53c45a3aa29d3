import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { ProfileService } from '../profile/profile.service';
import { InvalidCredentialError, parseCredentialJson } from '../credential/credential.parser';
import type { Credential } from '../credential/credential.types';
import { StatusListAllocatorService } from './status-list-allocator.service';
import { UpdateStatusDto } from './dto/update-status.dto';
import { StatusListResponseDto } from './dto/status-list-response.dto';
import type { StatusListShard } from './interfaces';

@ApiTags('Credential Status')
@Controller()
export class StatusController {
  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    private readonly allocator: StatusListAllocatorService,
    private readonly profileService: ProfileService,
  ) {}

  /**
   * GET /status/:id
   * Public: verifiers fetch status lists without credentials.
   */
  @Get('status/:id')
  @ApiOperation({ summary: 'Get a Credential Status List' })
  @ApiOkResponse({ type: StatusListResponseDto })
  @ApiResponse({ status: 404, description: 'No status list with this ID.' })
  async getStatusList(@Param('id') id: string): Promise<StatusListShard> {
    return this.allocator.get(this.allocator.shardId(id));
  }

  /**
   * POST /updateStatus
   * Sets the status of the slot referenced by an issued credential.
   */
  @Post('updateStatus')
  @HttpCode(HttpStatus.OK)
  @UseGuards(ApiKeyGuard)
  @ApiSecurity('api-key')
  @ApiOperation({ summary: 'Update Credential Status' })
  @ApiOkResponse({ description: 'Status updated.' })
  @ApiResponse({ status: 400, description: 'Malformed credential, disabled status, or unallocated slot.' })
  @ApiResponse({ status: 404, description: 'Profile or status list not found.' })
  async updateStatus(@Body() dto: UpdateStatusDto): Promise<void> {
    let credential: Credential;
    try {
      credential = parseCredentialJson(dto.credential);
    } catch (error) {
      if (error instanceof InvalidCredentialError) {
        throw new BadRequestException(`unable to unmarshal the VC: ${error.message}`);
      }
      throw error;
    }

    const profileName = typeof credential.issuer === 'object' ? credential.issuer.name : undefined;
    if (!profileName) {
      throw new BadRequestException('credential issuer carries no profile name');
    }

    const profile = await this.profileService.getProfile(profileName);
    if (profile.disableVCStatus) {
      throw new BadRequestException(`vc status is disabled for profile ${profile.name}`);
    }

    const slot = this.allocator.resolveSlot(credential.credentialStatus);
    await this.allocator.update(slot, dto.status, dto.statusReason ?? '');
  }
}
