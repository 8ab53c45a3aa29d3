import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Mutex } from 'async-mutex';
import { DEFAULT_CSL_SIZE } from '../config/config.constants';
import { CREDENTIAL_STATUS_TYPE, CredentialStatus } from '../credential/credential.types';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { SlotReference, SlotStatus, StatusListShard, StatusSlot } from './interfaces';
import { StatusListStorageService } from './status-list-storage.service';

/**
 * Hands out status list slots and mutates them.
 *
 * Owns the allocation pointer. Allocations and updates run one at a time behind a
 * single mutex, so no two callers ever receive the same (shard, index) pair.
 * Shards have a fixed capacity; a full shard is never written again except to
 * update one of its slots.
 */
@Injectable()
export class StatusListAllocatorService {
  private readonly logger = new Logger(StatusListAllocatorService.name);
  private readonly lock = new Mutex();
  private readonly capacity: number;
  private readonly baseUrl: string;

  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    private readonly storage: StatusListStorageService,
    private readonly configService: ConfigService,
    private readonly metricsService: MetricsService,
  ) {
    this.capacity = this.configService.get<number>('vcs.statusList.size') ?? DEFAULT_CSL_SIZE;
    const baseUrl = this.configService.get<string>('vcs.statusList.baseUrl');
    if (!baseUrl) {
      throw new Error('Status list base URL not configured (vcs.statusList.baseUrl)');
    }
    this.baseUrl = baseUrl;
  }

  /**
   * Public ID of the shard with sequence number `seq`.
   */
  shardId(seq: number | string): string {
    return `${this.baseUrl}/${seq}`;
  }

  /**
   * Claim the next free slot, opening a new shard when the current one is full.
   */
  async allocate(): Promise<StatusSlot> {
    const release = await this.lock.acquire();
    try {
      const pointer = await this.storage.getPointer();
      let shard = pointer.currentShardSeq > 0 ? await this.storage.getShard(this.shardId(pointer.currentShardSeq)) : undefined;
      let { currentShardSeq, fill } = pointer;

      if (!shard || fill >= shard.capacity) {
        currentShardSeq += 1;
        fill = 0;
        shard = { id: this.shardId(currentShardSeq), capacity: this.capacity, slots: [] };
        this.metricsService.set(METRIC_PATHS.STATUS_SHARDS_TOTAL, currentShardSeq);
        this.logger.log(`Opened status list shard ${shard.id}`);
      }

      const index = fill;
      shard.slots.push({ index, status: 'unset', reason: '' });
      await this.storage.saveShard(shard);
      await this.storage.savePointer({ currentShardSeq, fill: index + 1 });

      this.metricsService.increment(METRIC_PATHS.STATUS_ALLOCATED_TOTAL);
      return { shardId: shard.id, index, status: 'unset', reason: '' };
    } finally {
      release();
    }
  }

  /**
   * Allocate a slot and describe it the way it is embedded in a credential.
   */
  async createStatus(): Promise<CredentialStatus> {
    const slot = await this.allocate();
    return {
      id: `${slot.shardId}#${slot.index}`,
      type: CREDENTIAL_STATUS_TYPE,
      statusListIndex: String(slot.index),
      statusListCredential: slot.shardId,
    };
  }

  async get(shardId: string): Promise<StatusListShard> {
    const shard = await this.storage.getShard(shardId);
    if (!shard) {
      throw new NotFoundException(`credential status list ${shardId} not found`);
    }
    return shard;
  }

  /**
   * Overwrite a slot's status and reason. Only slots already claimed can be updated.
   */
  async update(slot: SlotReference, status: SlotStatus, reason: string): Promise<void> {
    const release = await this.lock.acquire();
    try {
      const shard = await this.get(slot.shardId);
      const entry = shard.slots[slot.index];
      if (!Number.isInteger(slot.index) || !entry) {
        throw new BadRequestException(`status list index ${slot.index} has not been allocated in ${slot.shardId}`);
      }

      entry.status = status;
      entry.reason = reason;
      await this.storage.saveShard(shard);

      this.metricsService.increment(METRIC_PATHS.STATUS_UPDATED_TOTAL);
      this.logger.log(`Status of ${slot.shardId}#${slot.index} set to ${status}`);
    } finally {
      release();
    }
  }

  /**
   * Slot referenced by a credential's `credentialStatus`.
   */
  resolveSlot(credentialStatus: CredentialStatus | undefined): SlotReference {
    if (!credentialStatus) {
      throw new BadRequestException('credential has no credentialStatus');
    }
    if (credentialStatus.type !== CREDENTIAL_STATUS_TYPE) {
      throw new BadRequestException(`unsupported credentialStatus type: ${credentialStatus.type}`);
    }
    if (!/^\d+$/.test(credentialStatus.statusListIndex)) {
      throw new BadRequestException(`invalid statusListIndex: ${credentialStatus.statusListIndex}`);
    }

    const reference = {
      shardId: credentialStatus.statusListCredential,
      index: Number(credentialStatus.statusListIndex),
    };
    if (credentialStatus.id !== `${reference.shardId}#${reference.index}`) {
      throw new BadRequestException(`credentialStatus id ${credentialStatus.id} does not match its status list entry`);
    }
    return reference;
  }
}
