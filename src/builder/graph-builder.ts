import type {
    CellValue,
    DataRecord,
    FieldMapping,
    MappingOverride,
    MappingTarget,
    RecordSet,
    Value,
} from '../types/index.js';
import { Entity, RdfGraph, iriValue, literalValue, mintIdentifier } from '../graph/rdf-graph.js';
import { LINKS, NAMESPACES, expandCurie, resolveMapping } from '../profile/healthdcat.js';
import { isAbsoluteIri, slugify } from '../utils/iri.js';
import { DECIMAL, DOUBLE, INTEGER, NON_NEGATIVE_INTEGER, isIsoDate, isIsoDateTime } from '../utils/lexical.js';
import { getCell } from '../utils/records.js';
import { getLogger } from '../utils/logger.js';

const XSD = NAMESPACES.xsd;
const FOAF_NAME = LINKS.agentName;

/**
 * Options of the graph builder (already checked by the generator stage).
 */
export interface GraphBuildOptions {
    datasetUri: string;
    mapping?: Readonly<Record<string, MappingOverride>>;
    naturalKey?: string;
    catalog?: boolean;
    tableSchema?: boolean;
}

/** Column datatypes recorded in the table schema */
export type ColumnDatatype = 'integer' | 'decimal' | 'double' | 'boolean' | 'string';

// ─── Main Build Function ─────────────────────────────────

/**
 * Build the metadata graph for a record set:
 *
 * 1. Catalog entity at the base IRI
 * 2. One Dataset per row, plus its Distribution, ContactPoint and
 *    (shared) publisher Agent when the row carries those fields
 * 3. CSVW table schema describing the columns
 *
 * Dataset entities follow row order.
 */
export function buildMetadataGraph(records: RecordSet, options: GraphBuildOptions): RdfGraph {
    const logger = getLogger();
    const graph = new RdfGraph();
    const mapping = resolveMapping(options.mapping);
    const base = options.datasetUri;

    const catalog = options.catalog === false ? undefined : graph.addEntity(mintIdentifier(base, 'Catalog'), 'Catalog');

    const keyOwners = new Map<string, number>();

    records.forEach((record, index) => {
        const key = datasetKey(record, index, options.naturalKey);
        const owner = keyOwners.get(key);
        if (owner !== undefined) {
            throw new Error(
                `Rows ${owner} and ${index} both map to dataset key '${key}'; deduplicate them with a transform first`
            );
        }
        keyOwners.set(key, index);

        const dataset = graph.addEntity(mintIdentifier(base, 'Dataset', key), 'Dataset');
        catalog?.add(LINKS.catalogDataset, iriValue(dataset.id));

        mapRecord(graph, dataset, record, index, key, mapping, base);
    });

    if (catalog) {
        catalog.add(LINKS.numberOfItems, literalValue(String(records.length), `${XSD}integer`));
    }

    if (options.tableSchema !== false && records.length > 0) {
        const schema = addTableSchema(graph, records, base);
        catalog?.add(LINKS.tableSchema, iriValue(schema.id));
    }

    logger.debug({ records: records.length, entities: graph.size }, 'Metadata graph built');
    return graph;
}

// ─── Row Mapping ─────────────────────────────────────────

/**
 * Identifier key of a row's dataset: the row index, or a slug of the
 * natural-key column when one is configured. A row whose natural key slugs
 * to nothing is keyed `_<index>`; slugs never contain `_`, so that key
 * cannot collide with another row's natural key.
 */
export function datasetKey(record: DataRecord, index: number, naturalKey?: string): string {
    if (!naturalKey) return String(index);

    const slug = slugify(cellText(getCell(record, naturalKey)));
    return slug || `_${index}`;
}

function mapRecord(
    graph: RdfGraph,
    dataset: Entity,
    record: DataRecord,
    index: number,
    key: string,
    mapping: Map<string, FieldMapping>,
    base: string
): void {
    const related = new Map<MappingTarget, Entity>([['dataset', dataset]]);

    const createRelated = (target: MappingTarget): Entity => {
        switch (target) {
            case 'dataset':
                return dataset;
            case 'distribution': {
                const entity = graph.addEntity(mintIdentifier(base, 'Distribution', key), 'Distribution');
                dataset.add(LINKS.distribution, iriValue(entity.id));
                return entity;
            }
            case 'contact': {
                const entity = graph.addEntity(mintIdentifier(base, 'ContactPoint', key), 'ContactPoint');
                dataset.add(LINKS.contactPoint, iriValue(entity.id));
                return entity;
            }
            case 'publisher': {
                const name = publisherName(record, mapping);
                const agentId = mintIdentifier(base, 'Agent', (name && slugify(name)) || key);
                const entity = graph.getEntity(agentId) ?? graph.addEntity(agentId, 'Agent');
                dataset.add(LINKS.publisher, iriValue(entity.id));
                return entity;
            }
        }
    };

    const entityFor = (target: MappingTarget): Entity => {
        const existing = related.get(target);
        if (existing) return existing;

        const entity = createRelated(target);
        related.set(target, entity);
        return entity;
    };

    for (const [field, cell] of Object.entries(record)) {
        const fieldMapping = mapping.get(field);
        if (!fieldMapping) continue;

        const values = toValues(cell, fieldMapping, field, index);
        if (values.length === 0) continue;

        const property = expandCurie(fieldMapping.property);
        if (!isAbsoluteIri(property)) {
            throw new Error(`Field '${field}' maps to '${fieldMapping.property}', which is neither a known CURIE nor an IRI`);
        }

        const target = entityFor(fieldMapping.target);
        for (const value of values) {
            target.add(property, value);
        }
    }
}

/**
 * Name used to key the publisher agent, so rows naming the same publisher
 * share one Agent entity.
 */
function publisherName(record: DataRecord, mapping: Map<string, FieldMapping>): string | undefined {
    for (const [field, cell] of Object.entries(record)) {
        const m = mapping.get(field);
        if (m?.target !== 'publisher' || expandCurie(m.property) !== FOAF_NAME) continue;

        const text = cellText(cell);
        if (text) return text;
    }
    return undefined;
}

function cellText(cell: CellValue | undefined): string {
    if (cell === null || cell === undefined) return '';
    return String(cell).trim();
}

// ─── Value Conversion ────────────────────────────────────

/**
 * Convert one cell into RDF values according to its mapping.
 * Empty cells produce no values.
 */
export function toValues(cell: CellValue | undefined, mapping: FieldMapping, field: string, row: number): Value[] {
    const text = cellText(cell);
    if (!text) return [];

    const parts = mapping.separator
        ? text.split(mapping.separator).map((p) => p.trim()).filter((p) => p.length > 0)
        : [text];

    const values: Value[] = [];
    for (const part of parts) {
        const value = convertPart(part, mapping);
        if (value) {
            values.push(value);
        } else {
            getLogger().warn({ row, field, value: part, kind: mapping.kind }, 'Value is not a valid IRI, skipped');
        }
    }
    return values;
}

function convertPart(part: string, mapping: FieldMapping): Value | null {
    switch (mapping.kind) {
        case 'literal':
            return literalValue(part);
        case 'iri':
            return isAbsoluteIri(part) ? iriValue(part) : null;
        case 'iriOrLiteral':
            return isAbsoluteIri(part) ? iriValue(part) : literalValue(part);
        case 'mailto': {
            const iri = part.startsWith('mailto:') ? part : `mailto:${part}`;
            return isAbsoluteIri(iri) ? iriValue(iri) : null;
        }
        case 'date':
            if (isIsoDate(part)) return literalValue(part, `${XSD}date`);
            return isIsoDateTime(part) ? literalValue(part, `${XSD}dateTime`) : literalValue(part);
        case 'dateTime':
            return isIsoDateTime(part) ? literalValue(part, `${XSD}dateTime`) : literalValue(part);
        case 'integer':
            return INTEGER.test(part) ? literalValue(part, `${XSD}integer`) : literalValue(part);
        case 'nonNegativeInteger':
            return NON_NEGATIVE_INTEGER.test(part) ? literalValue(part, `${XSD}nonNegativeInteger`) : literalValue(part);
        case 'decimal':
            if (DECIMAL.test(part)) return literalValue(part, `${XSD}decimal`);
            return DOUBLE.test(part) ? literalValue(part, `${XSD}double`) : literalValue(part);
        case 'boolean': {
            const lower = part.toLowerCase();
            if (lower === 'true' || lower === '1') return literalValue('true', `${XSD}boolean`);
            if (lower === 'false' || lower === '0') return literalValue('false', `${XSD}boolean`);
            return literalValue(part);
        }
    }
}

// ─── Table Schema ────────────────────────────────────────

/**
 * Infer a column datatype from its first non-empty value.
 */
export function inferDatatype(records: RecordSet, column: string): ColumnDatatype {
    for (const record of records) {
        const cell = getCell(record, column);
        if (cell === null || cell === undefined || cell === '') continue;

        if (typeof cell === 'boolean') return 'boolean';
        if (typeof cell === 'number') return Number.isInteger(cell) ? 'integer' : 'decimal';

        const text = cell.trim();
        if (INTEGER.test(text)) return 'integer';
        if (DECIMAL.test(text)) return 'decimal';
        if (DOUBLE.test(text)) return 'double';
        return 'string';
    }
    return 'string';
}

/**
 * Columns in first-seen order across all rows.
 */
export function collectColumns(records: RecordSet): string[] {
    const columns = new Set<string>();
    for (const record of records) {
        for (const column of Object.keys(record)) {
            columns.add(column);
        }
    }
    return [...columns];
}

function addTableSchema(graph: RdfGraph, records: RecordSet, base: string): Entity {
    const schema = graph.addEntity(mintIdentifier(base, 'TableSchema'), 'TableSchema');

    collectColumns(records).forEach((name, index) => {
        const column = graph.addEntity(mintIdentifier(base, 'Column', index), 'Column');
        schema.add(LINKS.column, iriValue(column.id));

        column
            .add(LINKS.columnName, literalValue(name))
            .add(LINKS.columnTitle, literalValue(name))
            .add(LINKS.label, literalValue(name))
            .add(LINKS.columnDatatype, literalValue(inferDatatype(records, name)));
    });

    return schema;
}
