export type BankingErrorCode =
  | 'INVALID_AMOUNT'
  | 'INSUFFICIENT_FUNDS'
  | 'WITHDRAWAL_LIMIT_EXCEEDED'
  | 'INVALID_RATE'
  | 'IMMUTABLE_FIELD'
  | 'INVALID_ACCOUNT_NUMBER'
  | 'DUPLICATE_ACCOUNT_NUMBER'
  | 'INVALID_HOLDER_NAME'
  | 'UNSUPPORTED_FORMAT'
  | 'IMPORT_FAILED'
  | 'INVALID_IMPORTED_BALANCE'
  | 'NEGATIVE_BALANCE_AFTER_IMPORT'
  | 'INVALID_SORT_KEY'
  | 'EMPTY_HISTORY'
  | 'ACCOUNT_NOT_FOUND'
  | 'UNSUPPORTED_OPERATION';

export abstract class BankingError extends Error {
  abstract readonly code: BankingErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidAmountError extends BankingError {
  readonly code = 'INVALID_AMOUNT';

  constructor(readonly operation: string, readonly amount: number) {
    super(`Amount for ${operation} must be positive, got ${amount}`);
  }
}

export class InsufficientFundsError extends BankingError {
  readonly code = 'INSUFFICIENT_FUNDS';

  constructor(readonly balance: number, readonly requested: number) {
    super(`Insufficient funds: balance ${balance.toFixed(2)}, requested ${requested.toFixed(2)}`);
  }
}

export class WithdrawalLimitExceededError extends BankingError {
  readonly code = 'WITHDRAWAL_LIMIT_EXCEEDED';

  constructor(readonly limit: number, readonly requested: number) {
    super(`Cannot withdraw more than 50% of the balance. Maximum available: ${limit.toFixed(2)}`);
  }
}

export class InvalidRateError extends BankingError {
  readonly code = 'INVALID_RATE';

  constructor(readonly rate: number) {
    super(`Interest rate must be positive, got ${rate}`);
  }
}

export class ImmutableFieldError extends BankingError {
  readonly code = 'IMMUTABLE_FIELD';

  constructor(readonly field: 'holder' | 'accountNumber') {
    super(`Field ${field} cannot be changed once set`);
  }
}

export class InvalidAccountNumberError extends BankingError {
  readonly code = 'INVALID_ACCOUNT_NUMBER';

  constructor(readonly value: unknown) {
    super(`Invalid account number ${JSON.stringify(value)}: expected ACC-<integer>`);
  }
}

export class DuplicateAccountNumberError extends BankingError {
  readonly code = 'DUPLICATE_ACCOUNT_NUMBER';

  constructor(readonly accountNumber: string) {
    super(`Account number ${accountNumber} is already in use`);
  }
}

export class InvalidHolderNameError extends BankingError {
  readonly code = 'INVALID_HOLDER_NAME';

  constructor(readonly holder: string) {
    super(`Holder name "${holder}" must be "First Last" with capitalized Latin or Cyrillic words`);
  }
}

export class UnsupportedFormatError extends BankingError {
  readonly code = 'UNSUPPORTED_FORMAT';

  constructor(readonly fileName: string) {
    super(`Unsupported history file "${fileName}": only CSV and JSON files are supported`);
  }
}

export class ImportError extends BankingError {
  readonly code = 'IMPORT_FAILED';

  constructor(fileName: string, cause: unknown) {
    super(
      `Failed to load history file "${fileName}": ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class InvalidImportedBalanceError extends BankingError {
  readonly code = 'INVALID_IMPORTED_BALANCE';

  constructor(readonly value: number) {
    super(`Imported history ends with an invalid balance: ${value}`);
  }
}

export class NegativeBalanceAfterImportError extends BankingError {
  readonly code = 'NEGATIVE_BALANCE_AFTER_IMPORT';

  constructor(readonly value: number) {
    super(`Imported history ends with a negative balance: ${value}`);
  }
}

export class InvalidSortKeyError extends BankingError {
  readonly code = 'INVALID_SORT_KEY';

  constructor(readonly sortBy: string) {
    super(`sortBy must be 'amount' or 'date', got '${sortBy}'`);
  }
}

export class EmptyHistoryError extends BankingError {
  readonly code = 'EMPTY_HISTORY';

  constructor(readonly accountNumber: string) {
    super(`No operations to plot for ${accountNumber}. Perform some operations first.`);
  }
}

export class AccountNotFoundError extends BankingError {
  readonly code = 'ACCOUNT_NOT_FOUND';

  constructor(readonly accountNumber: string) {
    super(`Account ${accountNumber} not found`);
  }
}

export class UnsupportedOperationError extends BankingError {
  readonly code = 'UNSUPPORTED_OPERATION';

  constructor(readonly operation: string, readonly accountType: string) {
    super(`Operation ${operation} is not available for ${accountType} accounts`);
  }
}
