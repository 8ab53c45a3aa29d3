import { Module } from '@nestjs/common';
import { VaultModule } from '../vault/vault.module';
import { PROFILE_STORE } from './interfaces';
import { ProfileStorageService } from './profile-storage.service';
import { ProfileService } from './profile.service';
import { ProfileController } from './profile.controller';

@Module({
  imports: [VaultModule],
  controllers: [ProfileController],
  providers: [{ provide: PROFILE_STORE, useClass: ProfileStorageService }, ProfileService],
  exports: [ProfileService],
})
export class ProfileModule {}
