import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { RecordReader, RecordSet } from '../types/index.js';
import { SourceReadError, toError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { toRecord } from '../utils/records.js';

/**
 * CSV parse options.
 */
export interface CsvOptions {
    /** Field delimiter (default ",") */
    delimiter?: string;
}

/**
 * Parse CSV text into rows of fields (RFC 4180).
 *
 * - Quoted fields may contain delimiters, newlines and doubled quotes
 * - LF, CRLF and CR line endings
 * - A leading byte-order mark is dropped
 * - Blank lines are skipped
 *
 * @throws Error on an unterminated quoted field
 */
export function parseCsv(text: string, options: CsvOptions = {}): string[][] {
    const delimiter = options.delimiter ?? ',';
    const input = text.startsWith('\uFEFF') ? text.slice(1) : text;

    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let inQuotes = false;
    let quoteLine = 0;
    let line = 1;

    const endRow = () => {
        row.push(field);
        field = '';
        // A lone empty field is a blank line
        if (!(row.length === 1 && row[0] === '')) rows.push(row);
        row = [];
    };

    for (let i = 0; i < input.length; i++) {
        const ch = input.charAt(i);

        if (inQuotes) {
            if (ch === '"') {
                if (input.charAt(i + 1) === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                if (ch === '\n') line++;
                field += ch;
            }
            continue;
        }

        if (ch === '"' && field === '') {
            inQuotes = true;
            quoteLine = line;
        } else if (ch === delimiter) {
            row.push(field);
            field = '';
        } else if (ch === '\r' || ch === '\n') {
            if (ch === '\r' && input.charAt(i + 1) === '\n') i++;
            endRow();
            line++;
        } else {
            field += ch;
        }
    }

    if (inQuotes) {
        throw new Error(`Unterminated quoted field starting on line ${quoteLine}`);
    }
    if (field !== '' || row.length > 0) endRow();

    return rows;
}

/**
 * Turn parsed CSV rows into records keyed by the header row.
 * Short rows leave trailing columns absent; long rows are rejected.
 */
export function csvToRecords(text: string, source: string, options: CsvOptions = {}): RecordSet {
    let rows: string[][];
    try {
        rows = parseCsv(text, options);
    } catch (error) {
        throw new SourceReadError(`Malformed CSV in '${source}': ${toError(error).message}`, source, { cause: error });
    }

    const [header, ...body] = rows;
    if (!header) return [];

    const columns = header.map((name) => name.trim());
    const seen = new Set<string>();
    for (const column of columns) {
        if (column === '') {
            throw new SourceReadError(`Malformed CSV in '${source}': empty column name in header`, source);
        }
        if (seen.has(column)) {
            throw new SourceReadError(`Malformed CSV in '${source}': duplicate column '${column}'`, source);
        }
        seen.add(column);
    }

    return body.map((fields, index) => {
        if (fields.length > columns.length) {
            throw new SourceReadError(
                `Malformed CSV in '${source}': data row ${index} has ${fields.length} fields, header has ${columns.length}`,
                source
            );
        }

        return toRecord(
            fields.flatMap((value, i) => {
                const column = columns[i];
                return column === undefined ? [] : [[column, value] as const];
            })
        );
    });
}

/**
 * Reads a CSV file from disk. The file handle is always closed,
 * whatever happens while reading.
 */
export class CsvReader implements RecordReader<string> {
    readonly name = 'csv';

    constructor(private readonly options: CsvOptions = {}) {}

    async read(source: string): Promise<RecordSet> {
        let handle: FileHandle | undefined;
        let text: string;

        try {
            handle = await open(source, 'r');
            text = await handle.readFile({ encoding: 'utf-8' });
        } catch (error) {
            throw new SourceReadError(`Cannot read '${source}': ${toError(error).message}`, source, { cause: error });
        } finally {
            await handle?.close();
        }

        const records = csvToRecords(text, source, this.options);
        getLogger().debug({ source, rows: records.length }, 'CSV read');
        return records;
    }
}
