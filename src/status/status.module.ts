import { Module } from '@nestjs/common';
import { ProfileModule } from '../profile/profile.module';
import { StatusListStorageService } from './status-list-storage.service';
import { StatusListAllocatorService } from './status-list-allocator.service';
import { StatusController } from './status.controller';

@Module({
  imports: [ProfileModule],
  controllers: [StatusController],
  providers: [StatusListStorageService, StatusListAllocatorService],
  exports: [StatusListAllocatorService],
})
export class StatusModule {}
