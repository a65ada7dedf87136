import { I18nService } from './i18n.service';

describe('I18nService', () => {
  const i18n = new I18nService();

  it('should resolve nested keys and interpolate variables', () => {
    expect(i18n.t('lot.not_found', 'en', { lotId: 'L-1' })).toBe('Lot L-1 not found');
    expect(i18n.t('lot.not_found', 'fr', { lotId: 'L-1' })).toBe('Lot L-1 introuvable');
  });

  it('should fall back to English for an unknown locale', () => {
    expect(i18n.t('stock.operation_failed', 'de')).toBe('Stock operation failed');
  });

  it('should return the key when no translation exists', () => {
    expect(i18n.t('stock.unknown_key')).toBe('stock.unknown_key');
  });

  it('should blank out missing variables', () => {
    expect(i18n.t('lot.invalid_cost', 'en')).toBe('Unit cost must be zero or more (got {{cost}})');
    expect(i18n.t('lot.invalid_cost', 'en', {})).toBe('Unit cost must be zero or more (got )');
  });
});
