import { Account } from './Account.js';
import type { OperationKind } from './Operation.js';

/** Everyday account: deposits and withdrawals, no interest. */
export class CheckingAccount extends Account {
  readonly accountType = 'checking';
  readonly allowedImportKinds: readonly OperationKind[] = ['deposit', 'withdraw'];
}
