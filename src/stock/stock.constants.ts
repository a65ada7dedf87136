export const LEDGER_SETTINGS = 'LEDGER_SETTINGS';
