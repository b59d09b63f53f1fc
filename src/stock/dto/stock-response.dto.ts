import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { MOVEMENT_KINDS } from '../stock.types';

export class StockRecordResponseDto {
  @ApiProperty({ format: 'uuid' })
  variantId!: string;

  @ApiProperty({ example: 'branch-north' })
  branchId!: string;

  @ApiProperty({ example: 50 })
  onHand!: number;

  @ApiProperty({ example: 45 })
  reserved!: number;

  @ApiProperty({ example: 7 })
  version!: number;

  @ApiProperty({ example: '2026-03-02T09:30:00.000Z' })
  updatedAt!: string;
}

export class StockMovementResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ format: 'uuid' })
  variantId!: string;

  @ApiProperty({ example: 'branch-north' })
  branchId!: string;

  @ApiProperty({ example: -45 })
  delta!: number;

  @ApiProperty({ enum: MOVEMENT_KINDS })
  kind!: string;

  @ApiProperty({ example: 'pos-17-0001' })
  reference!: string;

  @ApiPropertyOptional({ nullable: true })
  reason!: string | null;

  @ApiProperty({ example: '2026-03-02T09:30:00.000Z' })
  timestamp!: string;

  @ApiProperty({ example: 12 })
  sequence!: number;
}
