export type SlotStatus = 'set' | 'unset';

export const SLOT_STATUSES: readonly SlotStatus[] = ['set', 'unset'];

export interface StatusSlotEntry {
  index: number;
  status: SlotStatus;
  reason: string;
}

/**
 * Credential status list (CSL) shard. Slots are claimed in index order and never removed.
 */
export interface StatusListShard {
  /** Public URL, `<hostUrl>/status/<n>` */
  id: string;
  capacity: number;
  slots: StatusSlotEntry[];
}

export interface SlotReference {
  shardId: string;
  index: number;
}

export interface StatusSlot extends SlotReference {
  status: SlotStatus;
  reason: string;
}

/**
 * Allocation target: sequence number of the current shard (0 before the first one)
 * and how many of its slots are claimed.
 */
export interface AllocatorPointer {
  currentShardSeq: number;
  fill: number;
}
