import type { RecordReader, RecordSet } from '../types/index.js';

/**
 * Reader over records already in memory. The source is the record set
 * itself; rows are copied so later stages never share objects with the caller.
 */
export class MemoryReader implements RecordReader<RecordSet> {
    readonly name = 'memory';

    async read(source: RecordSet): Promise<RecordSet> {
        return source.map((record) => ({ ...record }));
    }
}
