import { registerAs } from '@nestjs/config';
import {
  DEFAULT_LEDGER_SETTINGS,
  type LedgerSettings,
  type StatusPrecedence,
} from '../stock/stock.types';

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  check: (n: number) => boolean,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new Error(`config.invalid_value: ${name}=${raw}`);
  }
  return value;
}

function readPrecedence(env: Env): StatusPrecedence {
  const raw = env.LEDGER_STATUS_PRECEDENCE;
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_LEDGER_SETTINGS.statusPrecedence;
  }
  if (raw === 'promotion' || raw === 'near-expiry') return raw;
  throw new Error(`config.invalid_value: LEDGER_STATUS_PRECEDENCE=${raw}`);
}

const isWholeDays = (n: number) => Number.isInteger(n) && n >= 0;

/**
 * Ledger thresholds, read once at startup. A malformed value stops the boot.
 */
export function loadLedgerSettings(env: Env = process.env): LedgerSettings {
  const defaults = DEFAULT_LEDGER_SETTINGS;
  return {
    nearExpiryWindowDays: readNumber(
      env,
      'LEDGER_NEAR_EXPIRY_DAYS',
      defaults.nearExpiryWindowDays,
      isWholeDays,
    ),
    promotionWindowDays: readNumber(
      env,
      'LEDGER_PROMOTION_DAYS',
      defaults.promotionWindowDays,
      isWholeDays,
    ),
    promotionMinQuantity: readNumber(
      env,
      'LEDGER_PROMOTION_MIN_QUANTITY',
      defaults.promotionMinQuantity,
      (n) => n >= 0,
    ),
    quantityPrecision: readNumber(
      env,
      'LEDGER_QUANTITY_PRECISION',
      defaults.quantityPrecision,
      (n) => Number.isInteger(n) && n >= 0 && n <= 10,
    ),
    statusPrecedence: readPrecedence(env),
    promotionDiscountRate: readNumber(
      env,
      'LEDGER_PROMOTION_DISCOUNT',
      defaults.promotionDiscountRate,
      (n) => n >= 0 && n <= 1,
    ),
  };
}

export default registerAs('ledger', (): LedgerSettings => loadLedgerSettings());
