import { DEFAULT_LEDGER_SETTINGS } from '../stock/stock.types';
import { loadLedgerSettings } from './ledger.config';

describe('loadLedgerSettings', () => {
  it('should fall back to defaults for unset or blank variables', () => {
    expect(loadLedgerSettings({ LEDGER_NEAR_EXPIRY_DAYS: '  ' })).toEqual(
      DEFAULT_LEDGER_SETTINGS,
    );
  });

  it('should read every threshold from the environment', () => {
    expect(
      loadLedgerSettings({
        LEDGER_NEAR_EXPIRY_DAYS: '2',
        LEDGER_PROMOTION_DAYS: '4',
        LEDGER_PROMOTION_MIN_QUANTITY: '0.5',
        LEDGER_QUANTITY_PRECISION: '2',
        LEDGER_STATUS_PRECEDENCE: 'near-expiry',
        LEDGER_PROMOTION_DISCOUNT: '0.3',
      }),
    ).toEqual({
      nearExpiryWindowDays: 2,
      promotionWindowDays: 4,
      promotionMinQuantity: 0.5,
      quantityPrecision: 2,
      statusPrecedence: 'near-expiry',
      promotionDiscountRate: 0.3,
    });
  });

  it.each([
    ['LEDGER_NEAR_EXPIRY_DAYS', '1.5'],
    ['LEDGER_PROMOTION_DAYS', '-1'],
    ['LEDGER_QUANTITY_PRECISION', 'three'],
    ['LEDGER_PROMOTION_DISCOUNT', '1.2'],
    ['LEDGER_STATUS_PRECEDENCE', 'fresh'],
  ])('should reject %s=%s', (name, raw) => {
    expect(() => loadLedgerSettings({ [name]: raw })).toThrow(
      `config.invalid_value: ${name}=${raw}`,
    );
  });
});
