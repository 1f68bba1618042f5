import type { CleanedOperation } from '../entities/ImportedOperation.js';
import type { OperationRecord } from '../entities/Operation.js';
import { InvalidImportedBalanceError, NegativeBalanceAfterImportError } from '../errors/BankingError.js';

const byTimestamp = (a: { timestamp: Date }, b: { timestamp: Date }) =>
  a.timestamp.getTime() - b.timestamp.getTime();

/**
 * Append-only audit trail of one account, failed attempts included.
 * Storage keeps insertion order; reads are always sorted by timestamp.
 */
export class OperationLedger {
  private readonly records: OperationRecord[] = [];

  get size(): number {
    return this.records.length;
  }

  append(record: OperationRecord): void {
    this.records.push(Object.freeze({ ...record, timestamp: new Date(record.timestamp.getTime()) }));
  }

  // Array#sort is stable, so equal timestamps keep insertion order.
  all(): OperationRecord[] {
    return [...this.records]
      .sort(byTimestamp)
      .map((record) => Object.freeze({ ...record, timestamp: new Date(record.timestamp.getTime()) }));
  }

  /**
   * Commits cleaned imported operations. The chronologically last row decides
   * the resulting balance; when it is unusable nothing is appended.
   */
  commitImport(operations: CleanedOperation[]): number {
    if (operations.length === 0) {
      return 0;
    }

    const ordered = [...operations].sort(byTimestamp);
    const finalBalance = ordered[ordered.length - 1].balanceAfter;

    if (!Number.isFinite(finalBalance)) {
      throw new InvalidImportedBalanceError(finalBalance);
    }

    if (finalBalance < 0) {
      throw new NegativeBalanceAfterImportError(finalBalance);
    }

    for (const operation of ordered) {
      this.append({
        kind: operation.kind,
        amount: operation.amount,
        timestamp: operation.timestamp,
        balanceAfter: operation.balanceAfter,
        status: operation.status,
      });
    }

    return finalBalance;
  }
}
