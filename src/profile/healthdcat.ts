import type { EntityType } from '../types/index.js';
import type { FieldMapping, MappingOverride } from '../types/index.js';

/**
 * Namespace prefixes used by the HealthDCAT application profile.
 * Also the prefix table handed to the serializer.
 */
export const NAMESPACES = {
    dcat: 'http://www.w3.org/ns/dcat#',
    dct: 'http://purl.org/dc/terms/',
    foaf: 'http://xmlns.com/foaf/0.1/',
    vcard: 'http://www.w3.org/2006/vcard/ns#',
    schema: 'http://schema.org/',
    rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
    rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
    csvw: 'http://www.w3.org/ns/csvw#',
    xsd: 'http://www.w3.org/2001/XMLSchema#',
    healthdcat: 'https://health.ec.europa.eu/healthdcat-ap/',
} as const;

export type Prefix = keyof typeof NAMESPACES;

export const RDF_TYPE = `${NAMESPACES.rdf}type`;

/**
 * Class IRI per entity type.
 */
export const ENTITY_CLASSES: Readonly<Record<EntityType, string>> = {
    Catalog: `${NAMESPACES.dcat}Catalog`,
    Dataset: `${NAMESPACES.dcat}Dataset`,
    Distribution: `${NAMESPACES.dcat}Distribution`,
    Agent: `${NAMESPACES.foaf}Agent`,
    ContactPoint: `${NAMESPACES.vcard}Kind`,
    TableSchema: `${NAMESPACES.csvw}TableSchema`,
    Column: `${NAMESPACES.csvw}Column`,
};

/**
 * Path segment used when minting identifiers for each entity type.
 * The catalog lives at the base IRI itself.
 */
export const ENTITY_SEGMENTS: Readonly<Record<Exclude<EntityType, 'Catalog'>, string>> = {
    Dataset: 'dataset',
    Distribution: 'distribution',
    Agent: 'agent',
    ContactPoint: 'contact',
    TableSchema: 'schema',
    Column: 'schema/column',
};

/**
 * Link properties between generated entities.
 */
export const LINKS = {
    catalogDataset: `${NAMESPACES.dcat}dataset`,
    distribution: `${NAMESPACES.dcat}distribution`,
    publisher: `${NAMESPACES.dct}publisher`,
    contactPoint: `${NAMESPACES.dcat}contactPoint`,
    tableSchema: `${NAMESPACES.csvw}tableSchema`,
    column: `${NAMESPACES.csvw}column`,
    numberOfItems: `${NAMESPACES.schema}numberOfItems`,
    agentName: `${NAMESPACES.foaf}name`,
    columnName: `${NAMESPACES.csvw}name`,
    columnTitle: `${NAMESPACES.csvw}title`,
    columnDatatype: `${NAMESPACES.csvw}datatype`,
    label: `${NAMESPACES.rdfs}label`,
    title: `${NAMESPACES.dct}title`,
} as const;

/**
 * Default column → property mapping of the profile.
 * Column names are matched exactly.
 */
export const DEFAULT_MAPPING: Readonly<Record<string, FieldMapping>> = {
    // Dataset
    title: { property: 'dct:title', target: 'dataset', kind: 'literal' },
    description: { property: 'dct:description', target: 'dataset', kind: 'literal' },
    identifier: { property: 'dct:identifier', target: 'dataset', kind: 'literal' },
    keywords: { property: 'dcat:keyword', target: 'dataset', kind: 'literal', separator: ';' },
    theme: { property: 'dcat:theme', target: 'dataset', kind: 'iriOrLiteral', separator: ';' },
    issued: { property: 'dct:issued', target: 'dataset', kind: 'date' },
    modified: { property: 'dct:modified', target: 'dataset', kind: 'date' },
    language: { property: 'dct:language', target: 'dataset', kind: 'iriOrLiteral', separator: ';' },
    landing_page: { property: 'dcat:landingPage', target: 'dataset', kind: 'iri' },
    access_rights: { property: 'dct:accessRights', target: 'dataset', kind: 'iriOrLiteral' },
    spatial: { property: 'dct:spatial', target: 'dataset', kind: 'iriOrLiteral' },
    version: { property: 'dcat:version', target: 'dataset', kind: 'literal' },
    health_category: { property: 'healthdcat:hasHealthCategory', target: 'dataset', kind: 'iriOrLiteral', separator: ';' },
    health_theme: { property: 'healthdcat:hasHealthTheme', target: 'dataset', kind: 'iriOrLiteral', separator: ';' },
    min_typical_age: { property: 'healthdcat:minTypicalAge', target: 'dataset', kind: 'nonNegativeInteger' },
    max_typical_age: { property: 'healthdcat:maxTypicalAge', target: 'dataset', kind: 'nonNegativeInteger' },
    number_of_records: { property: 'healthdcat:numberOfRecords', target: 'dataset', kind: 'nonNegativeInteger' },
    number_of_unique_individuals: {
        property: 'healthdcat:numberOfUniqueIndividuals',
        target: 'dataset',
        kind: 'nonNegativeInteger',
    },
    population_coverage: { property: 'healthdcat:populationCoverage', target: 'dataset', kind: 'literal' },

    // Publisher (agent)
    publisher: { property: 'foaf:name', target: 'publisher', kind: 'literal' },
    publisher_homepage: { property: 'foaf:homepage', target: 'publisher', kind: 'iri' },

    // Contact point
    contact_name: { property: 'vcard:fn', target: 'contact', kind: 'literal' },
    contact_email: { property: 'vcard:hasEmail', target: 'contact', kind: 'mailto' },

    // Distribution
    access_url: { property: 'dcat:accessURL', target: 'distribution', kind: 'iri' },
    download_url: { property: 'dcat:downloadURL', target: 'distribution', kind: 'iri' },
    media_type: { property: 'dcat:mediaType', target: 'distribution', kind: 'iriOrLiteral' },
    format: { property: 'dct:format', target: 'distribution', kind: 'iriOrLiteral' },
    byte_size: { property: 'dcat:byteSize', target: 'distribution', kind: 'nonNegativeInteger' },
    license: { property: 'dct:license', target: 'distribution', kind: 'iriOrLiteral' },
};

/**
 * Expand a CURIE (`dct:title`) into a full IRI. Full IRIs pass through.
 * Unknown prefixes are returned as-is so callers can reject them.
 */
export function expandCurie(term: string): string {
    const match = /^([A-Za-z][\w-]*):(.*)$/.exec(term);
    if (!match) return term;

    const [, prefix = '', local = ''] = match;
    if (local.startsWith('//')) return term;

    return isPrefix(prefix) ? `${NAMESPACES[prefix]}${local}` : term;
}

function isPrefix(value: string): value is Prefix {
    return Object.hasOwn(NAMESPACES, value);
}

/**
 * Merge the default profile mapping with caller overrides.
 * An override wins for its field; missing parts of a partial override are
 * taken from the default entry for that field, else from a dataset literal.
 */
export function resolveMapping(
    overrides: Readonly<Record<string, MappingOverride>> = {}
): Map<string, FieldMapping> {
    const mapping = new Map<string, FieldMapping>(Object.entries(DEFAULT_MAPPING));

    for (const [field, override] of Object.entries(overrides)) {
        const own = Object.hasOwn(DEFAULT_MAPPING, field) ? DEFAULT_MAPPING[field] : undefined;
        const base = own ?? findByProperty(typeof override === 'string' ? override : override.property);
        const fallback: FieldMapping = base ?? { property: '', target: 'dataset', kind: 'literal' };

        if (typeof override === 'string') {
            mapping.set(field, { ...fallback, property: override });
        } else {
            mapping.set(field, { ...fallback, ...override });
        }
    }

    return mapping;
}

/**
 * Find the default mapping entry that targets a given property, so an
 * override naming a known property inherits its target and value kind.
 */
function findByProperty(property: string): FieldMapping | undefined {
    const expanded = expandCurie(property);
    return Object.values(DEFAULT_MAPPING).find((m) => expandCurie(m.property) === expanded);
}
