export type ErrorVars = Record<string, string>;

export abstract class LedgerError extends Error {
  constructor(
    public readonly key: string,
    public readonly vars: ErrorVars = {},
  ) {
    super(key);
    this.name = new.target.name;
  }
}

/** Bad lot parameters; nothing was changed. */
export class LedgerValidationError extends LedgerError {}

/** The caller broke a precondition (non-positive request, day not advancing). */
export class LedgerContractError extends LedgerError {}
