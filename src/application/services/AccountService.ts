import { readFileSync } from 'node:fs';
import path from 'node:path';
import type { Account, AccountInfo } from '../../domain/entities/Account.js';
import { CheckingAccount } from '../../domain/entities/CheckingAccount.js';
import type { ImportReport } from '../../domain/entities/ImportedOperation.js';
import { SavingsAccount } from '../../domain/entities/SavingsAccount.js';
import { AccountNotFoundError, ImportError, UnsupportedOperationError } from '../../domain/errors/BankingError.js';
import type { OpenAccountDTO } from '../dto/AccountRequestDTO.js';
import type { BalanceChartDTO } from '../dto/BalanceChartDTO.js';
import type { ImportSourceDTO } from '../dto/ImportSourceDTO.js';
import { type LedgerEntryDTO, toLedgerEntryDTO } from '../dto/LedgerEntryDTO.js';
import type { AccountRepositoryPort } from '../ports/AccountRepositoryPort.js';
import type { BalanceChartService } from './BalanceChartService.js';
import type { HistoryImportService } from './HistoryImportService.js';
import type { RankedOperation, TransactionAnalyzer } from './TransactionAnalyzer.js';

export class AccountService {
  constructor(
    private readonly repository: AccountRepositoryPort,
    private readonly historyImport: HistoryImportService,
    private readonly analyzer: TransactionAnalyzer,
    private readonly chart: BalanceChartService,
  ) {}

  async openAccount(params: OpenAccountDTO): Promise<Account> {
    const account =
      params.type === 'savings'
        ? new SavingsAccount({ holder: params.holder, balance: params.balance, accountNumber: params.accountNumber })
        : new CheckingAccount({ holder: params.holder, balance: params.balance, accountNumber: params.accountNumber });

    await this.repository.save(account);
    console.log(`🏦 Opened ${account.accountType} account ${account.accountNumber} for ${account.holder}`);

    return account;
  }

  async getAccount(accountNumber: string): Promise<Account> {
    const account = await this.repository.findByNumber(accountNumber);
    if (!account) {
      throw new AccountNotFoundError(accountNumber);
    }

    return account;
  }

  async listAccounts(): Promise<AccountInfo[]> {
    const accounts = await this.repository.list();
    return accounts.map((account) => account.getAccountInfo());
  }

  async deposit(accountNumber: string, amount: number): Promise<AccountInfo> {
    const account = await this.getAccount(accountNumber);
    account.deposit(amount);
    return account.getAccountInfo();
  }

  async withdraw(accountNumber: string, amount: number): Promise<AccountInfo> {
    const account = await this.getAccount(accountNumber);
    account.withdraw(amount);
    return account.getAccountInfo();
  }

  async applyInterest(accountNumber: string, rate: number): Promise<AccountInfo> {
    const account = await this.getAccount(accountNumber);
    if (!(account instanceof SavingsAccount)) {
      throw new UnsupportedOperationError('interest', account.accountType);
    }

    account.applyInterest(rate);
    return account.getAccountInfo();
  }

  async importHistory(accountNumber: string, source: ImportSourceDTO): Promise<ImportReport> {
    const account = await this.getAccount(accountNumber);
    return this.historyImport.importInto(account, source);
  }

  async importHistoryFromFile(accountNumber: string, filePath: string): Promise<ImportReport> {
    const account = await this.getAccount(accountNumber);
    const fileName = path.basename(filePath);

    let content: Buffer;
    try {
      content = readFileSync(filePath);
    } catch (error) {
      throw new ImportError(fileName, error);
    }

    return this.historyImport.importInto(account, { fileName, content });
  }

  async history(accountNumber: string): Promise<LedgerEntryDTO[]> {
    const account = await this.getAccount(accountNumber);
    return account.getHistory().map(toLedgerEntryDTO);
  }

  async topOperations(accountNumber: string, count: number, sortBy: string): Promise<RankedOperation[]> {
    const account = await this.getAccount(accountNumber);
    return this.analyzer.rank(account, count, sortBy);
  }

  async balanceChart(accountNumber: string): Promise<BalanceChartDTO> {
    const account = await this.getAccount(accountNumber);
    return this.chart.build(account);
  }
}
