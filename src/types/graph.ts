/**
 * Entity types the generator can emit.
 */
export type EntityType =
    | 'Catalog'
    | 'Dataset'
    | 'Distribution'
    | 'Agent'
    | 'ContactPoint'
    | 'TableSchema'
    | 'Column';

/**
 * Literal object value. `datatype` and `language` are mutually exclusive;
 * a literal with neither is a plain xsd:string.
 */
export interface LiteralValue {
    kind: 'literal';
    value: string;
    datatype?: string;
    language?: string;
}

/**
 * Reference to another node by IRI (object property).
 */
export interface IriValue {
    kind: 'iri';
    id: string;
}

export type Value = LiteralValue | IriValue;

/**
 * One edge of the output graph. Subject and predicate are full IRIs.
 */
export interface Triple {
    subject: string;
    predicate: string;
    object: Value;
}
