import {
  ImmutableFieldError,
  InsufficientFundsError,
  InvalidAmountError,
} from '../errors/BankingError.js';
import { accountNumberRegistry } from '../services/AccountNumberRegistry.js';
import { canonicalizeAccountNumber, validateHolderName } from '../services/AccountValidators.js';
import { OperationLedger } from '../services/OperationLedger.js';
import type { CleanedOperation } from './ImportedOperation.js';
import type { OperationKind, OperationRecord, OperationStatus } from './Operation.js';

export type AccountType = 'checking' | 'savings';

export interface AccountInfo {
  accountType: AccountType;
  holder: string;
  accountNumber: string;
  balance: number;
}

export interface OpenAccountParams {
  holder: string;
  balance?: number;
  accountNumber?: string | number;
}

export abstract class Account {
  abstract readonly accountType: AccountType;
  /** Operation kinds a history import may bring into this account. */
  abstract readonly allowedImportKinds: readonly OperationKind[];

  private _holder: string | undefined;
  private _accountNumber: string | undefined;
  private _balance = 0;
  private readonly ledger = new OperationLedger();

  constructor(params: OpenAccountParams) {
    const holder = validateHolderName(params.holder);
    const balance = params.balance ?? 0;
    if (!Number.isFinite(balance) || balance < 0) {
      throw new InvalidAmountError('opening balance', balance);
    }

    const accountNumber =
      params.accountNumber === undefined
        ? accountNumberRegistry.nextAvailable()
        : canonicalizeAccountNumber(params.accountNumber);

    this.accountNumber = accountNumberRegistry.claim(accountNumber);
    this.holder = holder;
    this._balance = balance;
  }

  get holder(): string {
    return this._holder ?? '';
  }

  set holder(value: string) {
    if (this._holder !== undefined) {
      throw new ImmutableFieldError('holder');
    }

    this._holder = validateHolderName(value);
  }

  get accountNumber(): string {
    return this._accountNumber ?? '';
  }

  set accountNumber(value: string) {
    if (this._accountNumber !== undefined) {
      throw new ImmutableFieldError('accountNumber');
    }

    this._accountNumber = value;
  }

  get balance(): number {
    return this._balance;
  }

  getBalance(): number {
    return this.balance;
  }

  getHistory(): OperationRecord[] {
    return this.ledger.all();
  }

  getAccountInfo(): AccountInfo {
    return {
      accountType: this.accountType,
      holder: this.holder,
      accountNumber: this.accountNumber,
      balance: this.balance,
    };
  }

  deposit(amount: number, kind: OperationKind = 'deposit'): void {
    this.executeOperation(kind, amount, (value) => this.adjustBalance(value));
  }

  withdraw(amount: number, kind: OperationKind = 'withdraw'): void {
    this.executeOperation(kind, amount, (value) => this.adjustBalance(-value));
  }

  /**
   * Commits already-cleaned history rows and takes over the balance of the
   * latest one. An empty set resets the balance to 0.
   */
  applyImportedOperations(operations: CleanedOperation[]): number {
    const finalBalance = this.ledger.commitImport(operations);
    this.setBalance(finalBalance);
    return finalBalance;
  }

  /**
   * Validates the amount, then runs `apply`. Every attempt past the amount
   * check lands in the ledger, failed ones with the unchanged balance.
   */
  protected executeOperation(kind: OperationKind, amount: number, apply: (amount: number) => void): void {
    if (!(amount > 0)) {
      throw new InvalidAmountError(kind, amount);
    }

    let status: OperationStatus = 'fail';
    try {
      apply(amount);
      status = 'success';
    } finally {
      this.ledger.append({
        kind,
        amount,
        timestamp: new Date(),
        balanceAfter: this._balance,
        status,
      });
    }
  }

  private adjustBalance(delta: number): void {
    this.setBalance(this._balance + delta);
  }

  private setBalance(value: number): void {
    if (value < 0) {
      throw new InsufficientFundsError(this._balance, this._balance - value);
    }

    this._balance = value;
  }
}
