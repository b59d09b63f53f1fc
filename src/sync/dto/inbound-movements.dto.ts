import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsIn,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  Length,
  Min,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { MOVEMENT_KINDS, MovementKind } from '../../stock/stock.types';

export class RemoteMovementDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  id!: string;

  @ApiProperty({ example: 'b8f7b0c2-6a57-4a8e-9e43-0d2f3f1f2a10' })
  @IsString()
  @IsNotEmpty()
  variantId!: string;

  @ApiProperty({ example: 'branch-north' })
  @IsString()
  @Length(1, 64)
  branchId!: string;

  @ApiProperty({ example: -3 })
  @IsInt()
  delta!: number;

  @ApiProperty({ enum: MOVEMENT_KINDS })
  @IsIn(MOVEMENT_KINDS)
  kind!: MovementKind;

  @ApiProperty({ example: 'quote-17:1' })
  @IsString()
  reference!: string;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  reason: string | null = null;

  @ApiProperty({ example: '2026-03-02T09:30:00.000Z' })
  @IsISO8601()
  timestamp!: string;

  @ApiProperty({ example: 42 })
  @IsInt()
  @Min(1)
  sequence!: number;
}

export class InboundMovementsDto {
  @ApiProperty({ example: 'branch-north' })
  @IsString()
  @Length(1, 64)
  originBranchId!: string;

  @ApiProperty({ type: [RemoteMovementDto] })
  @ValidateNested({ each: true })
  @Type(() => RemoteMovementDto)
  @ArrayMinSize(1)
  @ArrayMaxSize(500)
  movements!: RemoteMovementDto[];
}

export class InboundResultDto {
  @ApiProperty({ example: 3 })
  applied!: number;

  @ApiProperty({ example: 1 })
  duplicates!: number;
}
