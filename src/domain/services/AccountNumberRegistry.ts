import { DuplicateAccountNumberError } from '../errors/BankingError.js';
import { canonicalizeAccountNumber } from './AccountValidators.js';

const COUNTER_SEED = 999;

/**
 * Process-wide record of issued account numbers. Lives as long as the process,
 * is never reset and only grows. Not safe for concurrent account creation.
 */
class AccountNumberRegistry {
  private counter = COUNTER_SEED;
  private readonly used = new Set<string>();

  claim(accountNumber: string): string {
    if (this.used.has(accountNumber)) {
      throw new DuplicateAccountNumberError(accountNumber);
    }

    this.used.add(accountNumber);
    return accountNumber;
  }

  // Pre-increment; numbers already claimed explicitly are skipped.
  nextAvailable(): string {
    let candidate: string;
    do {
      this.counter += 1;
      candidate = canonicalizeAccountNumber(this.counter);
    } while (this.used.has(candidate));

    return candidate;
  }
}

export const accountNumberRegistry = new AccountNumberRegistry();
