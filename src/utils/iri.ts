/**
 * IRI and identifier helpers.
 */

const ABSOLUTE_IRI = /^[a-zA-Z][a-zA-Z0-9+.-]*:[^\s<>"{}|\\^`]+$/;

/**
 * True for absolute IRIs such as `http://example.org/x` or `urn:isbn:123`.
 * Relative references and values containing spaces are rejected.
 */
export function isAbsoluteIri(value: string): boolean {
    return ABSOLUTE_IRI.test(value);
}

/**
 * Strip trailing `/` and `#` so identifiers can be appended with `/`.
 * "http://example.org/ds/" → "http://example.org/ds"
 */
export function normalizeBaseIri(base: string): string {
    return base.trim().replace(/[/#]+$/, '');
}

/**
 * Turn an arbitrary value into a lowercase, URL-safe path segment.
 * "Dataset A" → "dataset-a", "Ünïcode Ünits" → "unicode-units"
 */
export function slugify(value: string): string {
    return value
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '') // Drop combining marks
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}
