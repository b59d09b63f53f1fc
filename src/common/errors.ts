import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'INSUFFICIENT_STOCK'
  | 'INVALID_STATE_TRANSITION'
  | 'PAYMENT_MISMATCH'
  | 'CONCURRENCY_CONFLICT'
  | 'NOT_FOUND';

export type FieldError = { field: string; message: string };

export class ValidationError extends BadRequestException {
  readonly errorCode: ErrorCode = 'VALIDATION_ERROR';

  constructor(message: string, errors?: FieldError[]) {
    super({ message, errorCode: 'VALIDATION_ERROR', errors });
  }
}

export class InsufficientStockError extends UnprocessableEntityException {
  readonly errorCode: ErrorCode = 'INSUFFICIENT_STOCK';

  constructor(
    readonly variantId: string,
    readonly branchId: string,
    readonly available: number,
    readonly requested: number,
  ) {
    super({
      message: `Insufficient stock for variant ${variantId} at branch ${branchId}: available ${available}, requested ${requested}`,
      errorCode: 'INSUFFICIENT_STOCK',
    });
  }
}

export class InvalidStateTransitionError extends ConflictException {
  readonly errorCode: ErrorCode = 'INVALID_STATE_TRANSITION';

  constructor(entity: string, from: string, to: string) {
    super({
      message: `${entity} cannot move from ${from} to ${to}`,
      errorCode: 'INVALID_STATE_TRANSITION',
    });
  }
}

export class PaymentMismatchError extends UnprocessableEntityException {
  readonly errorCode: ErrorCode = 'PAYMENT_MISMATCH';

  constructor(message: string) {
    super({ message, errorCode: 'PAYMENT_MISMATCH' });
  }
}

/**
 * Optimistic-version race on a stored record. Transient: the store runner
 * retries these itself and only surfaces one once its retry budget is spent.
 */
export class ConcurrencyConflictError extends ConflictException {
  readonly errorCode: ErrorCode = 'CONCURRENCY_CONFLICT';
  readonly transient = true;

  constructor(message = 'Concurrent update detected, please retry') {
    super({ message, errorCode: 'CONCURRENCY_CONFLICT' });
  }
}

export class NotFoundError extends NotFoundException {
  readonly errorCode: ErrorCode = 'NOT_FOUND';

  constructor(message: string) {
    super({ message, errorCode: 'NOT_FOUND' });
  }
}

export function requirePositiveQuantity(field: string, value: number) {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer`, [
      { field, message: 'must be a positive integer' },
    ]);
  }
}
