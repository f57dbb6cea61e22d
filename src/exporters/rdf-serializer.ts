import { DataFactory, Writer } from 'n3';
import type { Quad } from 'n3';
import type { RdfFormat, Triple, Value } from '../types/index.js';

const { namedNode, literal, quad } = DataFactory;

// ─── Formats ─────────────────────────────────────────────

/**
 * Supported format identifiers, compared case-sensitively.
 */
export const SUPPORTED_FORMATS: readonly RdfFormat[] = ['turtle', 'trig', 'ntriples', 'nquads', 'n3'];

/** n3 Writer format names */
const WRITER_FORMATS: Readonly<Record<RdfFormat, string>> = {
    turtle: 'Turtle',
    trig: 'TriG',
    ntriples: 'N-Triples',
    nquads: 'N-Quads',
    n3: 'N3',
};

/** Line-based formats have no prefix declarations */
const LINE_FORMATS: ReadonlySet<RdfFormat> = new Set(['ntriples', 'nquads']);

/** File extension per format, for the CLI */
export const FORMAT_EXTENSIONS: Readonly<Record<RdfFormat, string>> = {
    turtle: '.ttl',
    trig: '.trig',
    ntriples: '.nt',
    nquads: '.nq',
    n3: '.n3',
};

export function isRdfFormat(value: string): value is RdfFormat {
    return (SUPPORTED_FORMATS as readonly string[]).includes(value);
}

/**
 * n3 parser format name for a supported format, used to read output back.
 */
export function parserFormat(format: RdfFormat): string {
    return WRITER_FORMATS[format];
}

// ─── Serialization ───────────────────────────────────────

function toObjectTerm(value: Value): Quad['object'] {
    if (value.kind === 'iri') return namedNode(value.id);
    if (value.language) return literal(value.value, value.language);
    if (value.datatype) return literal(value.value, namedNode(value.datatype));
    return literal(value.value);
}

export function toQuad(triple: Triple): Quad {
    return quad(namedNode(triple.subject), namedNode(triple.predicate), toObjectTerm(triple.object));
}

/**
 * Serialize triples into the requested format. Pure: returns the text,
 * never touches storage.
 */
export function serializeTriples(
    triples: readonly Triple[],
    format: RdfFormat,
    prefixes: Readonly<Record<string, string>> = {}
): Promise<string> {
    const writer = new Writer(
        LINE_FORMATS.has(format)
            ? { format: WRITER_FORMATS[format] }
            : { format: WRITER_FORMATS[format], prefixes: { ...prefixes } }
    );

    for (const triple of triples) {
        writer.addQuad(toQuad(triple));
    }

    return new Promise((resolve, reject) => {
        writer.end((error, result) => {
            if (error) {
                reject(error);
            } else {
                resolve(result);
            }
        });
    });
}
