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
} from '@nestjs/swagger';
import { CommandDispatcher } from '../commands/command-dispatcher.service';
import type { Principal } from '../commands/roles';
import { CurrentPrincipal } from '../common/decorators/principal.decorator';
import { ApiErrorResponse } from '../common/swagger/api-error-response.dto';
import {
  CreatePurchaseOrderDto,
  PurchaseOrderResponseDto,
  ReceiveGoodsDto,
  VendorRatingResponseDto,
} from './dto/procurement.dto';
import { ProcurementService } from './procurement.service';

@ApiTags('Purchase Orders')
@ApiSecurity('principal')
@ApiForbiddenResponse({ description: 'Role not allowed', type: ApiErrorResponse })
@Controller('purchase-orders')
export class ProcurementController {
  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly procurement: ProcurementService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Request a purchase order' })
  @ApiCreatedResponse({ type: PurchaseOrderResponseDto })
  @ApiBadRequestResponse({ description: 'Validation failed', type: ApiErrorResponse })
  create(@CurrentPrincipal() principal: Principal, @Body() dto: CreatePurchaseOrderDto) {
    return this.dispatcher.execute('procurement.create', principal, (ctx) =>
      this.procurement.create(ctx, dto.supplierId, dto.branchId, dto.expectedDate, dto.lines),
    );
  }

  @Get('vendors/:supplierId/rating')
  @ApiOperation({ summary: 'Delivery rating of a supplier' })
  @ApiParam({ name: 'supplierId', description: 'Supplier UUID' })
  @ApiOkResponse({ type: VendorRatingResponseDto })
  rating(@CurrentPrincipal() principal: Principal, @Param('supplierId', ParseUUIDPipe) supplierId: string) {
    return this.dispatcher.execute('procurement.read', principal, () =>
      this.procurement.getVendorRating(supplierId),
    );
  }

  @Post(':id/approve')
  @HttpCode(200)
  @ApiOperation({ summary: 'REQUESTED → APPROVED' })
  @ApiParam({ name: 'id', description: 'Purchase order UUID' })
  @ApiOkResponse({ type: PurchaseOrderResponseDto })
  @ApiConflictResponse({ description: 'Invalid status transition', type: ApiErrorResponse })
  approve(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('procurement.approve', principal, (ctx) => this.procurement.approve(ctx, id));
  }

  @Post(':id/receive')
  @HttpCode(200)
  @ApiOperation({ summary: 'Record a goods receipt against the order' })
  @ApiParam({ name: 'id', description: 'Purchase order UUID' })
  @ApiBadRequestResponse({ description: 'Over-receipt or unknown line', type: ApiErrorResponse })
  @ApiConflictResponse({ description: 'Order cannot receive goods', type: ApiErrorResponse })
  receive(
    @CurrentPrincipal() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ReceiveGoodsDto,
  ) {
    return this.dispatcher.execute('procurement.receive', principal, (ctx) =>
      this.procurement.receiveGRN(ctx, id, dto.lines, dto.receivedAt),
    );
  }

  @Post(':id/close')
  @HttpCode(200)
  @ApiOperation({ summary: 'Short-close the order' })
  @ApiParam({ name: 'id', description: 'Purchase order UUID' })
  @ApiOkResponse({ type: PurchaseOrderResponseDto })
  close(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('procurement.close', principal, (ctx) => this.procurement.close(ctx, id));
  }

  @Post(':id/cancel')
  @HttpCode(200)
  @ApiOperation({ summary: 'Cancel a requested or approved order' })
  @ApiParam({ name: 'id', description: 'Purchase order UUID' })
  @ApiOkResponse({ type: PurchaseOrderResponseDto })
  cancel(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('procurement.cancel', principal, (ctx) => this.procurement.cancel(ctx, id));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get purchase order' })
  @ApiParam({ name: 'id', description: 'Purchase order UUID' })
  @ApiOkResponse({ type: PurchaseOrderResponseDto })
  @ApiNotFoundResponse({ description: 'Purchase order not found', type: ApiErrorResponse })
  get(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('procurement.read', principal, () => this.procurement.get(id));
  }

  @Get(':id/receipts')
  @ApiOperation({ summary: 'Goods receipts posted against the order' })
  @ApiParam({ name: 'id', description: 'Purchase order UUID' })
  receipts(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('procurement.read', principal, () => this.procurement.listReceipts(id));
  }
}
