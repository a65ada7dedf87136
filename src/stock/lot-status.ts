import { daysBetween } from '../common/utils/calendar-date';
import { LotStatus, type LedgerSettings } from './stock.types';

export interface LotTimeline {
  purchaseDate: string;
  expiryDate: string;
  quantity: number;
}

type StatusThresholds = Pick<
  LedgerSettings,
  | 'nearExpiryWindowDays'
  | 'promotionWindowDays'
  | 'promotionMinQuantity'
  | 'statusPrecedence'
>;

export function daysUntilExpiry(lot: LotTimeline, today: string): number {
  return daysBetween(today, lot.expiryDate);
}

export function isExpired(lot: LotTimeline, today: string): boolean {
  return daysUntilExpiry(lot, today) < 0;
}

export function isNearExpiry(
  lot: LotTimeline,
  today: string,
  warningDays: number,
): boolean {
  const days = daysUntilExpiry(lot, today);
  return days >= 0 && days <= warningDays;
}

export function isPromotionCandidate(
  lot: LotTimeline,
  today: string,
  thresholds: Pick<LedgerSettings, 'promotionWindowDays' | 'promotionMinQuantity'>,
): boolean {
  const days = daysUntilExpiry(lot, today);
  return (
    days >= 0 &&
    days <= thresholds.promotionWindowDays &&
    lot.quantity >= thresholds.promotionMinQuantity
  );
}

/**
 * Share of the shelf life still ahead of the lot, between 0 and 1.
 * A lot bought and expiring on the same day has none.
 */
export function shelfLifePercentage(lot: LotTimeline, today: string): number {
  const total = daysBetween(lot.purchaseDate, lot.expiryDate);
  if (total <= 0) return 0;
  const remaining = Math.max(0, daysUntilExpiry(lot, today));
  return Math.min(1, remaining / total);
}

/**
 * Status is never stored; it is derived from the date every time it is read.
 * Promotion and near-expiry windows may overlap, `statusPrecedence` decides
 * which label the single status carries.
 */
export function resolveLotStatus(
  lot: LotTimeline,
  today: string,
  thresholds: StatusThresholds,
): LotStatus {
  if (isExpired(lot, today)) return LotStatus.EXPIRED;

  const promotion = isPromotionCandidate(lot, today, thresholds);
  const nearExpiry = isNearExpiry(lot, today, thresholds.nearExpiryWindowDays);

  if (thresholds.statusPrecedence === 'near-expiry') {
    if (nearExpiry) return LotStatus.NEAR_EXPIRY;
    if (promotion) return LotStatus.PROMOTION;
  } else {
    if (promotion) return LotStatus.PROMOTION;
    if (nearExpiry) return LotStatus.NEAR_EXPIRY;
  }
  return LotStatus.FRESH;
}
