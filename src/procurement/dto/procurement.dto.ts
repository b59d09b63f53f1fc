import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsInt,
  IsISO8601,
  IsOptional,
  IsString,
  IsUUID,
  Length,
  Min,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsCalendarDate } from '../../common/validators/is-calendar-date.validator';
import { PURCHASE_ORDER_STATUSES } from '../procurement.types';

export class PurchaseOrderLineDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  variantId!: string;

  @ApiProperty({ example: 10, minimum: 1 })
  @IsInt()
  @Min(1)
  quantity!: number;

  @ApiProperty({ example: 6400, description: 'Minor units' })
  @IsInt()
  @Min(0)
  unitCost!: number;
}

export class CreatePurchaseOrderDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  supplierId!: string;

  @ApiProperty({ example: 'branch-north' })
  @IsString()
  @Length(1, 64)
  branchId!: string;

  @ApiProperty({ example: '2026-03-10' })
  @IsCalendarDate()
  expectedDate!: string;

  @ApiProperty({ type: [PurchaseOrderLineDto] })
  @ValidateNested({ each: true })
  @Type(() => PurchaseOrderLineDto)
  @ArrayMinSize(1)
  @ArrayMaxSize(200)
  lines!: PurchaseOrderLineDto[];
}

export class GoodsReceiptLineDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  variantId!: string;

  @ApiProperty({ example: 4 })
  @IsInt()
  quantity!: number;
}

export class ReceiveGoodsDto {
  @ApiProperty({ type: [GoodsReceiptLineDto] })
  @ValidateNested({ each: true })
  @Type(() => GoodsReceiptLineDto)
  @ArrayMinSize(1)
  @ArrayMaxSize(200)
  lines!: GoodsReceiptLineDto[];

  @ApiPropertyOptional({ example: '2026-03-11', description: 'Defaults to now' })
  @IsOptional()
  @IsISO8601({ strict: true })
  receivedAt?: string;
}

export class PurchaseOrderResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ example: 'PO-2026-0001' })
  number!: string;

  @ApiProperty({ format: 'uuid' })
  supplierId!: string;

  @ApiProperty({ example: 'branch-north' })
  branchId!: string;

  @ApiProperty({ enum: PURCHASE_ORDER_STATUSES })
  status!: string;

  @ApiProperty({ example: '2026-03-10' })
  expectedDate!: string;
}

export class VendorRatingResponseDto {
  @ApiProperty({ format: 'uuid' })
  supplierId!: string;

  @ApiProperty({ example: 4 })
  deliveries!: number;

  @ApiProperty({ example: 3 })
  onTimeDeliveries!: number;

  @ApiProperty({ example: 2 })
  totalDelayDays!: number;

  @ApiProperty({ example: 40 })
  orderedUnits!: number;

  @ApiProperty({ example: 36 })
  deliveredUnits!: number;

  @ApiProperty({ example: 4.13 })
  score!: number;
}
