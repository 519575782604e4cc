/**
 * Typed errors for @provrec/runtime
 *
 * These codes belong to the reference collaborators (ledger, config), not
 * to the record component itself.
 */

export type LedgerErrorCode = 'LEDGER_ALLOCATION_EXHAUSTED' | 'LEDGER_UNKNOWN_RECORD';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    Object.setPrototypeOf(this, LedgerError.prototype);
  }
}

export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID' as const;
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.variable = variable;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
