import path from 'node:path';
import Papa from 'papaparse';
import type { RawOperationRow } from '../../../domain/entities/ImportedOperation.js';
import { UnsupportedFormatError } from '../../../domain/errors/BankingError.js';
import { type ImportSourceDTO, JsonHistorySchema } from '../../../application/dto/ImportSourceDTO.js';
import type { OperationSourcePort } from '../../../application/ports/OperationSourcePort.js';

export const HISTORY_COLUMNS = ['account_number', 'operation', 'amount', 'balance_after', 'status', 'date'] as const;

export type HistoryFormat = 'csv' | 'json';

export const detectHistoryFormat = (fileName: string): HistoryFormat | null => {
  const extension = path.extname(fileName).toLowerCase();
  if (extension === '.csv') return 'csv';
  if (extension === '.json') return 'json';
  return null;
};

/** Reads operation histories from CSV (header row required) or JSON array content. */
export class FileOperationSource implements OperationSourcePort {
  load(source: ImportSourceDTO): RawOperationRow[] {
    const format = detectHistoryFormat(source.fileName);
    if (!format) {
      throw new UnsupportedFormatError(source.fileName);
    }

    const text = typeof source.content === 'string' ? source.content : source.content.toString('utf-8');

    return format === 'csv' ? this.parseCsv(text) : this.parseJson(text);
  }

  private parseCsv(text: string): RawOperationRow[] {
    const result = Papa.parse<Record<string, string>>(text, {
      header: true,
      skipEmptyLines: true,
      transformHeader: (header) => header.trim(),
    });

    const fields = result.meta.fields ?? [];
    const missing = HISTORY_COLUMNS.filter((column) => !fields.includes(column));
    if (missing.length > 0) {
      throw new Error(`CSV is missing columns: ${missing.join(', ')}`);
    }

    // Rows with too many or too few fields still reach cleaning, which drops what it cannot use.
    const fatal = result.errors.find((error) => error.type === 'Quotes');
    if (fatal) {
      throw new Error(`CSV parsing failed at row ${fatal.row ?? '?'}: ${fatal.message}`);
    }

    return result.data;
  }

  private parseJson(text: string): RawOperationRow[] {
    const data: unknown = JSON.parse(text);
    return JsonHistorySchema.parse(data);
  }
}
