import { Body, Controller, Get, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';
import { CommandDispatcher } from '../commands/command-dispatcher.service';
import type { Principal } from '../commands/roles';
import { CurrentPrincipal } from '../common/decorators/principal.decorator';
import { ApiErrorResponse } from '../common/swagger/api-error-response.dto';
import { CatalogService } from './catalog.service';
import { ChangePriceDto, RegisterPartyDto, RegisterVariantDto } from './dto/catalog.dto';

@ApiTags('Catalog')
@ApiSecurity('principal')
@ApiForbiddenResponse({ description: 'Role not allowed', type: ApiErrorResponse })
@Controller('catalog')
export class CatalogController {
  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly catalog: CatalogService,
  ) {}

  @Post('variants')
  @ApiOperation({ summary: 'Register a sellable variant' })
  @ApiBadRequestResponse({ description: 'Validation failed', type: ApiErrorResponse })
  @ApiConflictResponse({ description: 'Id or SKU already registered', type: ApiErrorResponse })
  registerVariant(@CurrentPrincipal() principal: Principal, @Body() dto: RegisterVariantDto) {
    return this.dispatcher.execute('catalog.write', principal, (ctx) => this.catalog.registerVariant(ctx, dto));
  }

  @Post('variants/:id/price')
  @ApiOperation({ summary: 'Put a new price into effect' })
  @ApiParam({ name: 'id', description: 'Variant UUID' })
  @ApiNotFoundResponse({ description: 'Variant not found', type: ApiErrorResponse })
  changePrice(
    @CurrentPrincipal() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ChangePriceDto,
  ) {
    return this.dispatcher.execute('catalog.write', principal, (ctx) => this.catalog.changePrice(ctx, id, dto));
  }

  @Get('variants/:id/prices')
  @ApiOperation({ summary: 'Price history of a variant' })
  @ApiParam({ name: 'id', description: 'Variant UUID' })
  priceHistory(@CurrentPrincipal() principal: Principal, @Param('id', ParseUUIDPipe) id: string) {
    return this.dispatcher.execute('stock.read', principal, () => this.catalog.priceHistory(id));
  }

  @Post('customers')
  @ApiOperation({ summary: 'Register a customer' })
  registerCustomer(@CurrentPrincipal() principal: Principal, @Body() dto: RegisterPartyDto) {
    return this.dispatcher.execute('catalog.write', principal, (ctx) =>
      this.catalog.registerCustomer(ctx, dto.name, dto.id),
    );
  }

  @Post('suppliers')
  @ApiOperation({ summary: 'Register a supplier' })
  registerSupplier(@CurrentPrincipal() principal: Principal, @Body() dto: RegisterPartyDto) {
    return this.dispatcher.execute('catalog.write', principal, (ctx) =>
      this.catalog.registerSupplier(ctx, dto.name, dto.id),
    );
  }
}
