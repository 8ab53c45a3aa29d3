import { ApiProperty } from '@nestjs/swagger';
import { SLOT_STATUSES } from '../interfaces';
import type { SlotStatus, StatusListShard, StatusSlotEntry } from '../interfaces';

export class StatusSlotEntryDto implements StatusSlotEntry {
  @ApiProperty({ example: 0 })
  index!: number;

  @ApiProperty({ enum: SLOT_STATUSES })
  status!: SlotStatus;

  @ApiProperty({ example: '' })
  reason!: string;
}

export class StatusListResponseDto implements StatusListShard {
  @ApiProperty({ example: 'http://localhost:8070/status/1' })
  id!: string;

  @ApiProperty({ example: 50 })
  capacity!: number;

  @ApiProperty({ type: [StatusSlotEntryDto] })
  slots!: StatusSlotEntryDto[];
}
