import { AccountService } from '../../application/services/AccountService.js';
import { BalanceChartService } from '../../application/services/BalanceChartService.js';
import { HistoryImportService } from '../../application/services/HistoryImportService.js';
import { TransactionAnalyzer } from '../../application/services/TransactionAnalyzer.js';
import type { AccountRepositoryPort } from '../../application/ports/AccountRepositoryPort.js';
import type { OperationSourcePort } from '../../application/ports/OperationSourcePort.js';
import { FileOperationSource } from '../adapters/source/FileOperationSource.js';
import { InMemoryAccountRepository } from '../adapters/storage/InMemoryAccountRepository.js';
import { type AppConfig, loadConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  repository?: AccountRepositoryPort;
  operationSource?: OperationSourcePort;
}

export class AppContainer {
  readonly config: AppConfig;

  readonly repository: AccountRepositoryPort;
  readonly operationSource: OperationSourcePort;
  readonly historyImport: HistoryImportService;
  readonly analyzer: TransactionAnalyzer;
  readonly chart: BalanceChartService;
  readonly accountService: AccountService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.repository = overrides.repository ?? new InMemoryAccountRepository();
    this.operationSource = overrides.operationSource ?? new FileOperationSource();

    this.historyImport = new HistoryImportService(this.operationSource);
    this.analyzer = new TransactionAnalyzer();
    this.chart = new BalanceChartService();
    this.accountService = new AccountService(this.repository, this.historyImport, this.analyzer, this.chart);
  }
}
