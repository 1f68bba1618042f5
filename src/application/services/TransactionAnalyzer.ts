import type { Account } from '../../domain/entities/Account.js';
import type { OperationKind, OperationRecord } from '../../domain/entities/Operation.js';
import { InvalidSortKeyError } from '../../domain/errors/BankingError.js';

export interface RankedOperation {
  kind: OperationKind;
  amount: number;
  timestamp: Date;
  balanceAfter: number;
}

const byAmountThenNewest = (a: OperationRecord, b: OperationRecord) =>
  b.amount - a.amount || b.timestamp.getTime() - a.timestamp.getTime();

const byNewest = (a: OperationRecord, b: OperationRecord) => b.timestamp.getTime() - a.timestamp.getTime();

export class TransactionAnalyzer {
  /**
   * Largest or most recent successful operations of an account.
   * Only entries whose status is exactly 'success' take part.
   */
  rank(account: Pick<Account, 'getHistory'>, count = 5, sortBy: string = 'amount'): RankedOperation[] {
    const successful = account.getHistory().filter((record) => record.status === 'success');
    if (successful.length === 0) {
      return [];
    }

    if (sortBy !== 'amount' && sortBy !== 'date') {
      throw new InvalidSortKeyError(sortBy);
    }

    return successful
      .sort(sortBy === 'amount' ? byAmountThenNewest : byNewest)
      .slice(0, Math.max(count, 0))
      .map((record) => ({
        kind: record.kind,
        amount: record.amount,
        timestamp: new Date(record.timestamp.getTime()),
        balanceAfter: record.balanceAfter,
      }));
  }
}
