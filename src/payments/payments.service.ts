import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { OperationContext } from '../commands/operation-context';
import { InvalidStateTransitionError, PaymentMismatchError, ValidationError } from '../common/errors';
import { calculateLoyaltyPoints } from '../common/utils/money';
import ledgerConfig from '../config/ledger.config';
import { DocumentsService } from '../documents/documents.service';
import { DocumentStage, SalesDocument } from '../documents/documents.types';
import { StoreService } from '../store/store.service';
import { LoyaltyTransaction, PAYMENT_METHODS, Payment, PaymentMethod } from './payments.types';

export type LoyaltySettings = Pick<ConfigType<typeof ledgerConfig>, 'loyaltyRateBps' | 'currencyMinorDigits'>;

export type LoyaltyBalance = {
  customerId: string;
  points: number;
  transactions: number;
};

const PAYABLE_STAGES: readonly DocumentStage[] = ['INVOICED', 'PARTIALLY_PAID'];
const PAGE_SIZE = 500;

@Injectable()
export class PaymentsService {
  constructor(
    private readonly store: StoreService,
    private readonly documents: DocumentsService,
    @Inject(ledgerConfig.KEY) private readonly loyalty: LoyaltySettings,
  ) {}

  /**
   * Applies a payment to an invoice in submission order. The balance only
   * goes down; reaching 0 settles the invoice and posts loyalty points.
   */
  async applyPayment(
    ctx: OperationContext,
    invoiceId: string,
    amount: number,
    method: PaymentMethod,
  ): Promise<SalesDocument> {
    if (!PAYMENT_METHODS.includes(method)) {
      throw new ValidationError(`Unknown payment method ${method}`, [
        { field: 'method', message: `must be one of ${PAYMENT_METHODS.join(', ')}` },
      ]);
    }

    const invoice = await this.store.transaction(async (tx) => {
      const document = await this.documents.requireDocumentIn(tx, invoiceId);
      if (!PAYABLE_STAGES.includes(document.stage)) {
        throw new InvalidStateTransitionError('Document', document.stage, 'PARTIALLY_PAID');
      }
      if (!Number.isSafeInteger(amount) || amount <= 0) {
        throw new PaymentMismatchError(`Payment amount must be a positive integer, got ${amount}`);
      }
      if (amount > document.balance) {
        throw new PaymentMismatchError(
          `Payment of ${amount} exceeds outstanding balance ${document.balance}`,
        );
      }

      const payment = await tx.append('payment', invoiceId, (sequence) => ({
        id: uuidv4(),
        invoiceId,
        amount,
        method,
        actorId: ctx.principal.id,
        sequence,
        at: tx.now,
      }));

      const amountPaid = document.amountPaid + amount;
      const balance = document.balance - amount;
      if (balance > 0) {
        return this.documents.transitionIn(
          tx,
          ctx,
          document,
          'PARTIALLY_PAID',
          { amountPaid, balance },
          `payment:${payment.id}`,
        );
      }

      const settled = await this.documents.transitionIn(
        tx,
        ctx,
        document,
        'SETTLED',
        { amountPaid, balance: 0, settledAt: tx.now },
        `payment:${payment.id}`,
      );

      const points = calculateLoyaltyPoints(
        settled.totals.grandTotal,
        this.loyalty.loyaltyRateBps,
        this.loyalty.currencyMinorDigits,
      );
      if (points > 0) {
        await tx.append('loyalty', settled.customerId, () => ({
          id: uuidv4(),
          customerId: settled.customerId,
          invoiceId,
          points,
          at: tx.now,
        }));
      }
      return settled;
    });

    ctx.logger.info('payment_applied', {
      invoiceId,
      amount,
      method,
      balance: invoice.balance,
      stage: invoice.stage,
    });
    return invoice;
  }

  async listPayments(invoiceId: string): Promise<Payment[]> {
    await this.documents.get(invoiceId);
    const all: Payment[] = [];
    let after = 0;
    for (;;) {
      const page = await this.store.read((tx) => tx.readLog('payment', invoiceId, after, PAGE_SIZE));
      all.push(...page.map((e) => e.entry));
      if (page.length < PAGE_SIZE) return all;
      after = page[page.length - 1].sequence;
    }
  }

  async listLoyalty(customerId: string): Promise<LoyaltyTransaction[]> {
    const all: LoyaltyTransaction[] = [];
    let after = 0;
    for (;;) {
      const page = await this.store.read((tx) => tx.readLog('loyalty', customerId, after, PAGE_SIZE));
      all.push(...page.map((e) => e.entry));
      if (page.length < PAGE_SIZE) return all;
      after = page[page.length - 1].sequence;
    }
  }

  async loyaltyBalance(customerId: string): Promise<LoyaltyBalance> {
    const transactions = await this.listLoyalty(customerId);
    return {
      customerId,
      points: transactions.reduce((sum, t) => sum + t.points, 0),
      transactions: transactions.length,
    };
  }
}
