/**
 * A scalar cell value. Empty cells arrive as '' from readers;
 * transforms may introduce numbers, booleans or null.
 */
export type CellValue = string | number | boolean | null;

/**
 * One flat row: column name → cell value.
 * A column that is absent from the source row is simply not a key.
 */
export type DataRecord = Readonly<Record<string, CellValue>>;

/**
 * Ordered rows. Order is the source row order and is preserved by every
 * stage unless a transform filters or reorders on purpose.
 */
export type RecordSet = readonly DataRecord[];
