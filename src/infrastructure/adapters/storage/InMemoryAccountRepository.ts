import type { Account } from '../../../domain/entities/Account.js';
import type { AccountRepositoryPort } from '../../../application/ports/AccountRepositoryPort.js';

export class InMemoryAccountRepository implements AccountRepositoryPort {
  private readonly accounts = new Map<string, Account>();

  async save(account: Account): Promise<void> {
    this.accounts.set(account.accountNumber, account);
  }

  async findByNumber(accountNumber: string): Promise<Account | null> {
    return this.accounts.get(accountNumber) ?? null;
  }

  async list(): Promise<Account[]> {
    return Array.from(this.accounts.values()).sort((a, b) => a.accountNumber.localeCompare(b.accountNumber));
  }
}
