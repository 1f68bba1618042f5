import { InvalidAmountError, InvalidRateError, WithdrawalLimitExceededError } from '../errors/BankingError.js';
import { Account } from './Account.js';
import type { OperationKind } from './Operation.js';

const WITHDRAWAL_LIMIT_RATIO = 0.5;

/**
 * Interest-bearing account. A single withdrawal may take at most half of the
 * current balance.
 */
export class SavingsAccount extends Account {
  readonly accountType = 'savings';
  readonly allowedImportKinds: readonly OperationKind[] = ['deposit', 'withdraw', 'interest'];

  applyInterest(rate: number): void {
    if (!(rate > 0)) {
      throw new InvalidRateError(rate);
    }

    const interest = this.balance * (rate / 100);
    if (interest > 0) {
      this.deposit(interest, 'interest');
    }
  }

  override withdraw(amount: number, kind: OperationKind = 'withdraw'): void {
    if (!(amount > 0)) {
      throw new InvalidAmountError(kind, amount);
    }

    // Like the amount check, the cap is a precondition: a refused withdrawal writes no ledger entry.
    const limit = this.balance * WITHDRAWAL_LIMIT_RATIO;
    if (amount > limit) {
      throw new WithdrawalLimitExceededError(limit, amount);
    }

    super.withdraw(amount, kind);
  }
}
