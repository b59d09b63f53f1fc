import { Body, Controller, Get, HttpCode, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import {
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
import { CommandDispatcher } from '../commands/command-dispatcher.service';
import type { Principal } from '../commands/roles';
import { CurrentPrincipal } from '../common/decorators/principal.decorator';
import { ApiErrorResponse } from '../common/swagger/api-error-response.dto';
import { DocumentResponseDto } from '../documents/dto/document-response.dto';
import { ApplyPaymentDto, LoyaltyBalanceResponseDto, PaymentResponseDto } from './dto/apply-payment.dto';
import { PaymentsService } from './payments.service';

@ApiTags('Payments')
@ApiSecurity('principal')
@ApiForbiddenResponse({ description: 'Role not allowed', type: ApiErrorResponse })
@Controller('payments')
export class PaymentsController {
  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly payments: PaymentsService,
  ) {}

  @Post()
  @HttpCode(200)
  @ApiOperation({ summary: 'Apply a payment to an invoice' })
  @ApiOkResponse({ description: 'Invoice after the payment', type: DocumentResponseDto })
  @ApiUnprocessableEntityResponse({ description: 'Amount out of range', type: ApiErrorResponse })
  @ApiConflictResponse({ description: 'Document is not payable', type: ApiErrorResponse })
  apply(@CurrentPrincipal() principal: Principal, @Body() dto: ApplyPaymentDto) {
    return this.dispatcher.execute('payments.apply', principal, (ctx) =>
      this.payments.applyPayment(ctx, dto.invoiceId, dto.amount, dto.method),
    );
  }

  @Get('loyalty/:customerId')
  @ApiOperation({ summary: 'Loyalty points of a customer' })
  @ApiParam({ name: 'customerId', description: 'Customer UUID' })
  @ApiOkResponse({ type: LoyaltyBalanceResponseDto })
  loyalty(@CurrentPrincipal() principal: Principal, @Param('customerId', ParseUUIDPipe) customerId: string) {
    return this.dispatcher.execute('payments.read', principal, () => this.payments.loyaltyBalance(customerId));
  }

  @Get(':invoiceId')
  @ApiOperation({ summary: 'Payments applied to an invoice, in order' })
  @ApiParam({ name: 'invoiceId', description: 'Document UUID' })
  @ApiOkResponse({ type: [PaymentResponseDto] })
  @ApiNotFoundResponse({ description: 'Document not found', type: ApiErrorResponse })
  list(@CurrentPrincipal() principal: Principal, @Param('invoiceId', ParseUUIDPipe) invoiceId: string) {
    return this.dispatcher.execute('payments.read', principal, () => this.payments.listPayments(invoiceId));
  }
}
