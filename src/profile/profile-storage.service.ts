import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { Profile, ProfileStore } from './interfaces';

export const PROFILE_NOT_FOUND_MESSAGE = 'specified profile ID does not exist';

/**
 * In-memory {@link ProfileStore}. Profiles are lost on restart.
 */
@Injectable()
export class ProfileStorageService implements ProfileStore {
  private readonly profiles = new Map<string, Profile>();

  async getProfile(name: string): Promise<Profile> {
    const profile = this.profiles.get(name);
    if (!profile) {
      throw new NotFoundException(`${PROFILE_NOT_FOUND_MESSAGE}: ${name}`);
    }
    return { ...profile };
  }

  // Check and insert run without an await in between
  async createProfile(profile: Profile): Promise<void> {
    if (this.profiles.has(profile.name)) {
      throw new ConflictException(`profile ${profile.name} already exists`);
    }
    this.profiles.set(profile.name, { ...profile });
  }
}
