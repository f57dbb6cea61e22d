import type { CellValue, DataRecord } from '../types/index.js';

/**
 * Cell of a column, read only from the row's own keys so column names such
 * as `constructor` or `toString` never resolve to Object.prototype members.
 */
export function getCell(record: DataRecord, column: string): CellValue | undefined {
    return Object.hasOwn(record, column) ? record[column] : undefined;
}

/**
 * Build a row from entries. Keys become own properties, `__proto__` included.
 */
export function toRecord(entries: Iterable<readonly [string, CellValue]>): DataRecord {
    return Object.fromEntries(entries);
}
