import type { Account } from '../../domain/entities/Account.js';
import type { ImportReport, RawOperationRow } from '../../domain/entities/ImportedOperation.js';
import { ImportError, UnsupportedFormatError } from '../../domain/errors/BankingError.js';
import { cleanImportedOperations } from '../../domain/services/OperationCleaner.js';
import { type ImportSourceDTO, ImportSourceSchema } from '../dto/ImportSourceDTO.js';
import type { OperationSourcePort } from '../ports/OperationSourcePort.js';

export class HistoryImportService {
  constructor(private readonly source: OperationSourcePort) {}

  /**
   * Load, filter, clean and commit an external history into `account`.
   * Bad rows are dropped; an unusable final balance aborts the whole import.
   */
  importInto(account: Account, input: ImportSourceDTO): ImportReport {
    const source = ImportSourceSchema.parse(input);
    const rows = this.loadRows(source);

    const { operations, rowsForAccount, dropped } = cleanImportedOperations(
      rows,
      account.accountNumber,
      account.allowedImportKinds,
    );

    const droppedTotal = rowsForAccount - operations.length;
    if (droppedTotal > 0) {
      const reasons = Object.entries(dropped)
        .filter(([, count]) => count > 0)
        .map(([reason, count]) => `${reason}=${count}`)
        .join(', ');
      console.warn(`⚠️ Dropped ${droppedTotal} of ${rowsForAccount} rows for ${account.accountNumber}: ${reasons}`);
    }

    const finalBalance = account.applyImportedOperations(operations);

    console.log('📥 History imported:', {
      accountNumber: account.accountNumber,
      fileName: source.fileName,
      rowsRead: rows.length,
      rowsImported: operations.length,
      finalBalance,
    });

    return {
      accountNumber: account.accountNumber,
      rowsRead: rows.length,
      rowsForAccount,
      rowsImported: operations.length,
      dropped,
      finalBalance,
    };
  }

  private loadRows(source: ImportSourceDTO): RawOperationRow[] {
    try {
      return this.source.load(source);
    } catch (error) {
      if (error instanceof UnsupportedFormatError) {
        throw error;
      }

      throw new ImportError(source.fileName, error);
    }
  }
}
