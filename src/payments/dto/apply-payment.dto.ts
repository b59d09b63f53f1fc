import { IsIn, IsInt, IsUUID } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { PAYMENT_METHODS, PaymentMethod } from '../payments.types';

export class ApplyPaymentDto {
  @ApiProperty({ format: 'uuid', description: 'Document id of the invoice' })
  @IsUUID()
  invoiceId!: string;

  @ApiProperty({ example: 20000, description: 'Minor units; must not exceed the balance' })
  @IsInt()
  amount!: number;

  @ApiProperty({ enum: PAYMENT_METHODS })
  @IsIn(PAYMENT_METHODS)
  method!: PaymentMethod;
}

export class PaymentResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ format: 'uuid' })
  invoiceId!: string;

  @ApiProperty({ example: 20000 })
  amount!: number;

  @ApiProperty({ enum: PAYMENT_METHODS })
  method!: string;

  @ApiProperty({ example: 'cashier-7' })
  actorId!: string;

  @ApiProperty({ example: 1 })
  sequence!: number;

  @ApiProperty({ example: '2026-03-02T09:30:00.000Z' })
  at!: string;
}

export class LoyaltyBalanceResponseDto {
  @ApiProperty({ format: 'uuid' })
  customerId!: string;

  @ApiProperty({ example: 2 })
  points!: number;

  @ApiProperty({ example: 1 })
  transactions!: number;
}
