import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { DOCUMENT_STAGES } from '../documents.types';

export class DocumentLineResponseDto {
  @ApiProperty({ example: 1 })
  lineNo!: number;

  @ApiProperty({ format: 'uuid' })
  variantId!: string;

  @ApiProperty({ example: 'TEA-250G' })
  sku!: string;

  @ApiProperty({ example: 2 })
  quantity!: number;

  @ApiProperty({ example: 10000 })
  unitPrice!: number;

  @ApiProperty({ example: 1000, description: 'Tax rate in basis points' })
  taxRateBps!: number;
}

export class DocumentTotalsResponseDto {
  @ApiProperty({ example: 25000 })
  subtotal!: number;

  @ApiProperty({ example: 2500 })
  tax!: number;

  @ApiProperty({ example: 27500 })
  grandTotal!: number;
}

export class DocumentResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ example: 'QUO-2026-0001' })
  number!: string;

  @ApiPropertyOptional({ example: 'INV-2026-0001', nullable: true })
  invoiceNumber!: string | null;

  @ApiProperty({ format: 'uuid' })
  customerId!: string;

  @ApiProperty({ example: 'branch-north' })
  branchId!: string;

  @ApiProperty({ type: [DocumentLineResponseDto] })
  lines!: DocumentLineResponseDto[];

  @ApiProperty({ type: DocumentTotalsResponseDto })
  totals!: DocumentTotalsResponseDto;

  @ApiProperty({ enum: DOCUMENT_STAGES })
  stage!: string;

  @ApiProperty({ type: [String] })
  reservationRefs!: string[];

  @ApiProperty({ example: 20000 })
  amountPaid!: number;

  @ApiProperty({ example: 7500 })
  balance!: number;
}

export class StageTransitionResponseDto {
  @ApiProperty({ format: 'uuid' })
  documentId!: string;

  @ApiPropertyOptional({ enum: DOCUMENT_STAGES, nullable: true })
  from!: string | null;

  @ApiProperty({ enum: DOCUMENT_STAGES })
  to!: string;

  @ApiProperty({ example: 'cashier-7' })
  actorId!: string;

  @ApiPropertyOptional({ nullable: true })
  note!: string | null;

  @ApiProperty({ example: '2026-03-02T09:30:00.000Z' })
  at!: string;
}

export class AuditEventResponseDto {
  @ApiProperty({ enum: ['STOCK', 'DOCUMENT', 'PURCHASE_ORDER', 'VARIANT'] })
  entityType!: string;

  @ApiProperty({ format: 'uuid' })
  entityId!: string;

  @ApiProperty({ example: 'stage:INVOICED' })
  action!: string;

  @ApiProperty({ example: 'sales-7' })
  actorId!: string;

  @ApiProperty({ example: 'SALES' })
  role!: string;

  @ApiProperty({ example: '4d1c1f0e-3b7a-4f43-9a61-2a0b8c5e7d11' })
  requestId!: string;

  @ApiProperty({ type: 'object', additionalProperties: true, example: { from: 'CONVERTED', to: 'INVOICED' } })
  detail!: Record<string, string | number | boolean | null>;

  @ApiProperty({ example: '2026-03-02T09:30:00.000Z' })
  at!: string;
}
