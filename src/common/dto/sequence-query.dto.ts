import { IsOptional, IsInt, Min, Max } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';

/** Cursor over an append-only log: entries with sequence greater than `after`. */
export class SequenceQueryDto {
  @ApiPropertyOptional({ example: 0, minimum: 0, default: 0, type: 'number' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  after: number = 0;

  @ApiPropertyOptional({ example: 100, minimum: 1, maximum: 500, default: 100, type: 'number' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit: number = 100;
}
