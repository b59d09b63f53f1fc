import { Body, Controller, Get, HttpCode, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiSecurity,
  ApiTags,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { CommandDispatcher } from '../commands/command-dispatcher.service';
import type { Principal } from '../commands/roles';
import { CurrentPrincipal } from '../common/decorators/principal.decorator';
import { ApiErrorResponse } from '../common/swagger/api-error-response.dto';
import { DocumentsService } from './documents.service';
import { CancelDocumentDto, CreateQuotationDto } from './dto/create-quotation.dto';
import { AuditEventResponseDto, DocumentResponseDto, StageTransitionResponseDto } from './dto/document-response.dto';

@ApiTags('Documents')
@ApiSecurity('principal')
@ApiForbiddenResponse({ description: 'Role not allowed', type: ApiErrorResponse })
@Controller('documents')
export class DocumentsController {
  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly documents: DocumentsService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Create a draft quotation' })
  @ApiCreatedResponse({ type: DocumentResponseDto })
  @ApiBadRequestResponse({ description: 'Validation failed', type: ApiErrorResponse })
  @ApiNotFoundResponse({ description: 'Variant not found', type: ApiErrorResponse })
  create(@CurrentPrincipal() principal: Principal, @Body() dto: CreateQuotationDto) {
    return this.dispatcher.execute('documents.create', principal, (ctx) =>
      this.documents.createQuotation(ctx, dto.customerId, dto.branchId, dto.lines),
    );
  }

  @Post(':id/approve')
  @HttpCode(200)
  @ApiOperation({ summary: 'DRAFT → APPROVED' })
  @ApiParam({ name: 'id', description: 'Document UUID' })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiConflictResponse({ description: 'Invalid stage transition', type: ApiErrorResponse })
  approve(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('documents.approve', principal, (ctx) => this.documents.approve(ctx, id));
  }

  @Post(':id/convert')
  @HttpCode(200)
  @ApiOperation({ summary: 'APPROVED → CONVERTED, reserving every line' })
  @ApiParam({ name: 'id', description: 'Document UUID' })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiUnprocessableEntityResponse({ description: 'Insufficient stock', type: ApiErrorResponse })
  @ApiConflictResponse({ description: 'Invalid stage transition', type: ApiErrorResponse })
  convert(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('documents.convert', principal, (ctx) => this.documents.convert(ctx, id));
  }

  @Post(':id/invoice')
  @HttpCode(200)
  @ApiOperation({ summary: 'CONVERTED → INVOICED, deducting the reservations' })
  @ApiParam({ name: 'id', description: 'Document UUID' })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiConflictResponse({ description: 'Invalid stage transition', type: ApiErrorResponse })
  invoice(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('documents.invoice', principal, (ctx) => this.documents.invoice(ctx, id));
  }

  @Post(':id/cancel')
  @HttpCode(200)
  @ApiOperation({ summary: 'Cancel a document that has not been invoiced' })
  @ApiParam({ name: 'id', description: 'Document UUID' })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiConflictResponse({ description: 'Invalid stage transition', type: ApiErrorResponse })
  cancel(
    @CurrentPrincipal() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: CancelDocumentDto,
  ) {
    return this.dispatcher.execute('documents.cancel', principal, (ctx) =>
      this.documents.cancel(ctx, id, dto.reason),
    );
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get document' })
  @ApiParam({ name: 'id', description: 'Document UUID' })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found', type: ApiErrorResponse })
  get(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('documents.read', principal, () => this.documents.get(id));
  }

  @Get(':id/transitions')
  @ApiOperation({ summary: 'Stage history of a document' })
  @ApiParam({ name: 'id', description: 'Document UUID' })
  @ApiOkResponse({ type: [StageTransitionResponseDto] })
  history(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('documents.read', principal, () => this.documents.history(id));
  }

  @Get(':id/audit')
  @ApiOperation({ summary: 'Audit trail of a document: who changed what, in order' })
  @ApiParam({ name: 'id', description: 'Document UUID' })
  @ApiOkResponse({ type: [AuditEventResponseDto] })
  @ApiNotFoundResponse({ description: 'Document not found', type: ApiErrorResponse })
  audit(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('documents.read', principal, () => this.documents.auditTrail(id));
  }
}
