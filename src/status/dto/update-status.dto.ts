import { IsIn, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { SLOT_STATUSES } from '../interfaces';
import type { SlotStatus } from '../interfaces';

export class UpdateStatusDto {
  @ApiProperty({
    description: 'The issued credential as a JSON string. Its issuer must carry the profile name.',
  })
  @IsString()
  @IsNotEmpty()
  credential!: string;

  @ApiProperty({ description: 'New status of the credential', enum: SLOT_STATUSES, example: 'set' })
  @IsIn(SLOT_STATUSES)
  status!: SlotStatus;

  @ApiPropertyOptional({ description: 'Why the status changed', example: 'Disciplinary action' })
  @IsOptional()
  @IsString()
  @MaxLength(1024)
  statusReason?: string;
}
