import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import {
  ApiBadRequestResponse,
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
import { StockRecordResponseDto } from '../stock/dto/stock-response.dto';
import { BranchSyncService } from './branch-sync.service';
import { InboundMovementsDto, InboundResultDto } from './dto/inbound-movements.dto';

@ApiTags('Sync')
@ApiSecurity('principal')
@Controller('sync')
export class SyncController {
  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly sync: BranchSyncService,
  ) {}

  @Post('inbound')
  @HttpCode(200)
  @ApiOperation({ summary: 'Apply movements published by another branch, in the order given' })
  @ApiOkResponse({ type: InboundResultDto })
  @ApiBadRequestResponse({ description: 'Validation failed', type: ApiErrorResponse })
  @ApiForbiddenResponse({ description: 'Role not allowed', type: ApiErrorResponse })
  inbound(@CurrentPrincipal() principal: Principal, @Body() dto: InboundMovementsDto): Promise<InboundResultDto> {
    return this.dispatcher.execute('sync.apply', principal, async (ctx) => {
      let applied = 0;
      for (const movement of dto.movements) {
        if (await this.sync.applyRemote(movement, dto.originBranchId)) applied++;
      }
      ctx.logger.info('sync_inbound', { originBranchId: dto.originBranchId, applied });
      return { applied, duplicates: dto.movements.length - applied };
    });
  }

  @Get('replicas/:variantId/:branchId')
  @ApiOperation({ summary: "This node's replica of another branch's stock record" })
  @ApiParam({ name: 'variantId', description: 'Variant UUID' })
  @ApiParam({ name: 'branchId', description: 'Origin branch key' })
  @ApiOkResponse({ type: StockRecordResponseDto })
  @ApiNotFoundResponse({ description: 'Nothing replicated for this pair', type: ApiErrorResponse })
  @ApiForbiddenResponse({ description: 'Role not allowed', type: ApiErrorResponse })
  replica(
    @CurrentPrincipal() principal: Principal,
    @Param('variantId') variantId: string,
    @Param('branchId') branchId: string,
  ) {
    return this.dispatcher.execute('stock.read', principal, () => this.sync.getReplica(variantId, branchId));
  }
}
