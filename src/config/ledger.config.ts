import { registerAs } from '@nestjs/config';
import type { LowStockBasis } from '../alerts/alerts.types';

function parseBasis(value: string | undefined): LowStockBasis {
  return value === 'available' ? 'available' : 'on_hand';
}

export default registerAs('ledger', () => ({
  currencyMinorDigits: parseInt(process.env.CURRENCY_MINOR_DIGITS ?? '2', 10),
  loyaltyRateBps: parseInt(process.env.LOYALTY_RATE_BPS ?? '100', 10),
  reservationTtlMinutes: parseInt(process.env.RESERVATION_TTL_MINUTES ?? '0', 10),
  reservationSweepIntervalMs: parseInt(process.env.RESERVATION_SWEEP_INTERVAL_MS ?? '60000', 10),
  lowStockDefaultThreshold: parseInt(process.env.LOW_STOCK_DEFAULT_THRESHOLD ?? '0', 10),
  lowStockBasis: parseBasis(process.env.LOW_STOCK_BASIS),
}));
