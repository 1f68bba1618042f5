import type { RawOperationRow } from '../../domain/entities/ImportedOperation.js';
import type { ImportSourceDTO } from '../dto/ImportSourceDTO.js';

export interface OperationSourcePort {
  /** Reads every row of the source. Throws on an unknown format or unreadable content. */
  load(source: ImportSourceDTO): RawOperationRow[];
}
