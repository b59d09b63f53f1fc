import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class ApiErrorField {
  @ApiProperty({ example: 'quantity' })
  field!: string;

  @ApiProperty({ example: 'quantity must be a positive integer' })
  message!: string;
}

export class ApiErrorResponse {
  @ApiProperty({ example: 400 })
  statusCode!: number;

  @ApiProperty({ example: 'Validation failed' })
  message!: string;

  @ApiProperty({ example: 'INSUFFICIENT_STOCK' })
  errorCode!: string;

  @ApiPropertyOptional({ type: [ApiErrorField] })
  errors?: ApiErrorField[];

  @ApiProperty({ example: '2026-03-02T09:30:00.000Z' })
  timestamp!: string;

  @ApiProperty({ example: '/api/v1/stock/reserve' })
  path!: string;

  @ApiPropertyOptional({ example: 'req_123' })
  requestId?: string;
}
