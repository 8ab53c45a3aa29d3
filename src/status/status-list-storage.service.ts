import { Injectable } from '@nestjs/common';
import { AllocatorPointer, StatusListShard } from './interfaces';

/**
 * In-process persistence for status list shards and the allocator pointer.
 *
 * Every read and write copies, so a caller holding a shard cannot change the stored one.
 * Only {@link StatusListAllocatorService} writes here, always under its lock.
 */
@Injectable()
export class StatusListStorageService {
  private readonly shards = new Map<string, StatusListShard>();
  private pointer: AllocatorPointer = { currentShardSeq: 0, fill: 0 };

  async getShard(id: string): Promise<StatusListShard | undefined> {
    const shard = this.shards.get(id);
    return shard ? structuredClone(shard) : undefined;
  }

  async saveShard(shard: StatusListShard): Promise<void> {
    this.shards.set(shard.id, structuredClone(shard));
  }

  async getPointer(): Promise<AllocatorPointer> {
    return { ...this.pointer };
  }

  async savePointer(pointer: AllocatorPointer): Promise<void> {
    this.pointer = { ...pointer };
  }

  getShardCount(): number {
    return this.shards.size;
  }
}
