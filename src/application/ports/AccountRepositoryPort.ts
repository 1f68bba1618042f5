import type { Account } from '../../domain/entities/Account.js';

export interface AccountRepositoryPort {
  save(account: Account): Promise<void>;
  findByNumber(accountNumber: string): Promise<Account | null>;
  list(): Promise<Account[]>;
}
