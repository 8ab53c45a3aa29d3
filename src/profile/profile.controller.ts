import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, UseGuards } from '@nestjs/common';
import { ApiCreatedResponse, ApiOkResponse, ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { ProfileService } from './profile.service';
import { CreateProfileDto } from './dto/create-profile.dto';
import { ProfileResponseDto } from './dto/profile-response.dto';
import type { Profile } from './interfaces';

@ApiTags('Profiles')
@ApiSecurity('api-key')
@Controller('profile')
@UseGuards(ApiKeyGuard)
export class ProfileController {
  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly profileService: ProfileService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create an Issuer Profile', description: 'Creates the profile and its credential vault.' })
  @ApiCreatedResponse({ type: ProfileResponseDto })
  @ApiResponse({ status: 400, description: 'A required field is missing or malformed.' })
  @ApiResponse({ status: 409, description: 'A profile with this name exists.' })
  async createProfile(@Body() dto: CreateProfileDto): Promise<Profile> {
    return this.profileService.createProfile(dto);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an Issuer Profile' })
  @ApiOkResponse({ type: ProfileResponseDto })
  @ApiResponse({ status: 404, description: 'Profile not found.' })
  async getProfile(@Param('id') id: string): Promise<Profile> {
    return this.profileService.getProfile(id);
  }
}
