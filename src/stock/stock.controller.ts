import { Body, Controller, Get, HttpCode, Param, Post, Put, Query } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiSecurity,
  ApiTags,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { AlertsService } from '../alerts/alerts.service';
import { CommandDispatcher } from '../commands/command-dispatcher.service';
import type { Principal } from '../commands/roles';
import { CurrentPrincipal } from '../common/decorators/principal.decorator';
import { ApiErrorResponse } from '../common/swagger/api-error-response.dto';
import {
  AdjustStockDto,
  MovementsQueryDto,
  ReplenishStockDto,
  ReservationRefDto,
  ReserveStockDto,
  SetThresholdDto,
  TransferStockDto,
} from './dto/stock-commands.dto';
import { StockMovementResponseDto, StockRecordResponseDto } from './dto/stock-response.dto';
import { StockLedgerService } from './stock-ledger.service';

@ApiTags('Stock')
@ApiSecurity('principal')
@ApiForbiddenResponse({ description: 'Role not allowed', type: ApiErrorResponse })
@Controller('stock')
export class StockController {
  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly ledger: StockLedgerService,
    private readonly alerts: AlertsService,
  ) {}

  @Post('reserve')
  @HttpCode(200)
  @ApiOperation({ summary: 'Hold stock against a reference (idempotent per ref)' })
  @ApiOkResponse({ type: StockRecordResponseDto })
  @ApiBadRequestResponse({ description: 'Validation failed', type: ApiErrorResponse })
  @ApiUnprocessableEntityResponse({ description: 'Insufficient stock', type: ApiErrorResponse })
  @ApiConflictResponse({ description: 'Concurrent update, retry', type: ApiErrorResponse })
  reserve(@CurrentPrincipal() principal: Principal, @Body() dto: ReserveStockDto) {
    return this.dispatcher.execute('stock.reserve', principal, (ctx) =>
      this.ledger.reserve(ctx, dto.variantId, dto.branchId, dto.quantity, dto.ref, { ttlMinutes: dto.ttlMinutes }),
    );
  }

  @Post('release')
  @HttpCode(200)
  @ApiOperation({ summary: 'Release a held reservation' })
  @ApiOkResponse({ type: StockRecordResponseDto })
  @ApiNotFoundResponse({ description: 'No held reservation for ref', type: ApiErrorResponse })
  @ApiConflictResponse({ description: 'Reservation belongs to a document', type: ApiErrorResponse })
  release(@CurrentPrincipal() principal: Principal, @Body() dto: ReservationRefDto) {
    return this.dispatcher.execute('stock.release', principal, (ctx) => this.ledger.release(ctx, dto.ref));
  }

  @Post('deduct')
  @HttpCode(200)
  @ApiOperation({ summary: 'Turn a held reservation into a permanent decrement' })
  @ApiOkResponse({ type: StockRecordResponseDto })
  @ApiNotFoundResponse({ description: 'No held reservation for ref', type: ApiErrorResponse })
  @ApiConflictResponse({ description: 'Reservation belongs to a document', type: ApiErrorResponse })
  deduct(@CurrentPrincipal() principal: Principal, @Body() dto: ReservationRefDto) {
    return this.dispatcher.execute('stock.deduct', principal, (ctx) => this.ledger.deduct(ctx, dto.ref));
  }

  @Post('replenish')
  @HttpCode(200)
  @ApiOperation({ summary: 'Add stock on hand' })
  @ApiOkResponse({ type: StockRecordResponseDto })
  @ApiBadRequestResponse({ description: 'Validation failed', type: ApiErrorResponse })
  replenish(@CurrentPrincipal() principal: Principal, @Body() dto: ReplenishStockDto) {
    return this.dispatcher.execute('stock.replenish', principal, (ctx) =>
      this.ledger.replenish(ctx, dto.variantId, dto.branchId, dto.quantity, dto.ref),
    );
  }

  @Post('adjust')
  @HttpCode(200)
  @ApiOperation({ summary: 'Correct stock on hand by a signed delta' })
  @ApiOkResponse({ type: StockRecordResponseDto })
  @ApiUnprocessableEntityResponse({ description: 'Would drop on-hand below reserved', type: ApiErrorResponse })
  adjust(@CurrentPrincipal() principal: Principal, @Body() dto: AdjustStockDto) {
    return this.dispatcher.execute('stock.adjust', principal, (ctx) =>
      this.ledger.adjust(ctx, dto.variantId, dto.branchId, dto.delta, dto.reason),
    );
  }

  @Post('transfer')
  @HttpCode(200)
  @ApiOperation({ summary: 'Move stock between branches atomically' })
  @ApiOkResponse({ type: [StockRecordResponseDto] })
  @ApiUnprocessableEntityResponse({ description: 'Insufficient stock at source', type: ApiErrorResponse })
  transfer(@CurrentPrincipal() principal: Principal, @Body() dto: TransferStockDto) {
    return this.dispatcher.execute('stock.transfer', principal, (ctx) =>
      this.ledger.transfer(ctx, dto.variantId, dto.fromBranchId, dto.toBranchId, dto.quantity, dto.ref),
    );
  }

  @Put('thresholds')
  @ApiOperation({ summary: 'Set the low-stock threshold of a variant at a branch' })
  @ApiOkResponse({ type: SetThresholdDto })
  setThreshold(@CurrentPrincipal() principal: Principal, @Body() dto: SetThresholdDto) {
    return this.dispatcher.execute('stock.setThreshold', principal, (ctx) =>
      this.alerts.setThreshold(ctx, dto.variantId, dto.branchId, dto.threshold),
    );
  }

  @Get('movements')
  @ApiOperation({ summary: 'Movement log of a branch, in sequence order' })
  @ApiOkResponse({ type: [StockMovementResponseDto] })
  movements(@CurrentPrincipal() principal: Principal, @Query() query: MovementsQueryDto) {
    return this.dispatcher.execute('stock.read', principal, () =>
      this.ledger.listMovements(query.branchId, query.after, query.limit),
    );
  }

  @Get(':variantId/:branchId')
  @ApiOperation({ summary: 'Current stock record' })
  @ApiParam({ name: 'variantId', description: 'Variant UUID' })
  @ApiParam({ name: 'branchId', description: 'Branch key' })
  @ApiOkResponse({ type: StockRecordResponseDto })
  @ApiNotFoundResponse({ description: 'No stock record', type: ApiErrorResponse })
  getRecord(
    @CurrentPrincipal() principal: Principal,
    @Param('variantId') variantId: string,
    @Param('branchId') branchId: string,
  ) {
    return this.dispatcher.execute('stock.read', principal, () => this.ledger.getRecord(variantId, branchId));
  }
}
