import type { RecordSet } from './record.js';

/**
 * Reader boundary. Implementations turn a source (a file path for the CSV
 * reader) into an ordered record set, and fail with SourceReadError on
 * malformed or unreadable input.
 */
export interface RecordReader<S = string> {
    /** Human-readable reader name, used in logs */
    readonly name: string;

    read(source: S): Promise<RecordSet>;
}
