import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class StoreHealthDto {
  @ApiProperty({ example: 'up' })
  status!: string;

  @ApiProperty({ example: 'memory', enum: ['memory', 'postgres'] })
  driver!: string;

  @ApiPropertyOptional({ type: String, example: '3ms' })
  responseTime?: string;

  @ApiPropertyOptional({ type: String, example: 'connection refused' })
  message?: string;
}

export class HealthResponseDto {
  @ApiProperty({ example: 'ok' })
  status!: string;

  @ApiProperty({ type: StoreHealthDto })
  store!: StoreHealthDto;

  @ApiProperty({ example: '41MB' })
  heapUsed!: string;
}
