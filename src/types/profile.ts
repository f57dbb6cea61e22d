/**
 * Which entity a mapped field lands on.
 */
export type MappingTarget = 'dataset' | 'distribution' | 'publisher' | 'contact';

/**
 * How a cell is turned into an RDF object.
 *
 * - `literal`: plain string literal
 * - `iri`: always a node reference (invalid IRIs are dropped with a warning)
 * - `iriOrLiteral`: reference when the value looks like an absolute IRI
 * - `mailto`: e-mail address as a mailto: reference
 * - the rest: typed literals with the matching xsd datatype
 */
export type ValueKind =
    | 'literal'
    | 'iri'
    | 'iriOrLiteral'
    | 'mailto'
    | 'date'
    | 'dateTime'
    | 'integer'
    | 'nonNegativeInteger'
    | 'decimal'
    | 'boolean';

/**
 * Field → property mapping entry.
 */
export interface FieldMapping {
    /** Property as a CURIE (dct:title) or a full IRI */
    property: string;
    target: MappingTarget;
    kind: ValueKind;
    /** Split the cell on this separator into several values */
    separator?: string;
}

/**
 * Caller-supplied override for one field: either just the property, or a
 * partial mapping whose missing parts are taken from the profile default.
 */
export type MappingOverride = string | (Partial<FieldMapping> & { property: string });
