import { IsInt, IsNotEmpty, IsOptional, IsString, IsUUID, Length, Min, NotEquals } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { SequenceQueryDto } from '../../common/dto/sequence-query.dto';

export class ReserveStockDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  variantId!: string;

  @ApiProperty({ example: 'branch-north' })
  @IsString()
  @Length(1, 64)
  branchId!: string;

  @ApiProperty({ example: 3, minimum: 1 })
  @IsInt()
  @Min(1)
  quantity!: number;

  @ApiProperty({ example: 'pos-17-0001', description: 'Idempotency key of the hold' })
  @IsString()
  @Length(1, 128)
  ref!: string;

  @ApiPropertyOptional({ example: 30, description: 'Hold expiry in minutes; 0 keeps it until released' })
  @IsOptional()
  @IsInt()
  @Min(0)
  ttlMinutes?: number;
}

export class ReservationRefDto {
  @ApiProperty({ example: 'pos-17-0001' })
  @IsString()
  @Length(1, 128)
  ref!: string;
}

export class ReplenishStockDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  variantId!: string;

  @ApiProperty({ example: 'branch-north' })
  @IsString()
  @Length(1, 64)
  branchId!: string;

  @ApiProperty({ example: 24, minimum: 1 })
  @IsInt()
  @Min(1)
  quantity!: number;

  @ApiProperty({ example: 'delivery-2291' })
  @IsString()
  @Length(1, 128)
  ref!: string;
}

export class AdjustStockDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  variantId!: string;

  @ApiProperty({ example: 'branch-north' })
  @IsString()
  @Length(1, 64)
  branchId!: string;

  @ApiProperty({ example: -2, description: 'Signed change to on-hand' })
  @IsInt()
  @NotEquals(0)
  delta!: number;

  @ApiProperty({ example: 'damaged in storage' })
  @IsString()
  @IsNotEmpty()
  @Length(1, 200)
  reason!: string;
}

export class TransferStockDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  variantId!: string;

  @ApiProperty({ example: 'branch-north' })
  @IsString()
  @Length(1, 64)
  fromBranchId!: string;

  @ApiProperty({ example: 'branch-south' })
  @IsString()
  @Length(1, 64)
  toBranchId!: string;

  @ApiProperty({ example: 5, minimum: 1 })
  @IsInt()
  @Min(1)
  quantity!: number;

  @ApiProperty({ example: 'transfer-0042' })
  @IsString()
  @Length(1, 128)
  ref!: string;
}

export class SetThresholdDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  variantId!: string;

  @ApiProperty({ example: 'branch-north' })
  @IsString()
  @Length(1, 64)
  branchId!: string;

  @ApiProperty({ example: 10, minimum: 0, description: '0 disables low-stock alerts' })
  @IsInt()
  @Min(0)
  threshold!: number;
}

export class MovementsQueryDto extends SequenceQueryDto {
  @ApiProperty({ example: 'branch-north' })
  @IsString()
  @Length(1, 64)
  branchId!: string;
}
