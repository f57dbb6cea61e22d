import { describe, it, expect } from 'vitest';
import { Parser } from 'n3';
import type { Quad } from 'n3';
import { RdfGeneratorStage } from '../plugins/rdf-generator.js';
import { buildMetadataGraph, inferDatatype } from '../builder/graph-builder.js';
import { parserFormat, toQuad } from '../exporters/rdf-serializer.js';
import { LINKS, NAMESPACES } from '../profile/healthdcat.js';
import { MissingConfigurationError, UnsupportedFormatError } from '../utils/errors.js';
import type { RecordSet, Value } from '../types/index.js';

const BASE = 'http://example.org/ds/';

const RECORDS: RecordSet = [
    {
        title: 'Cancer registry',
        publisher: 'Health Institute',
        contact_email: 'info@hi.org',
        download_url: 'https://data.example.org/cr.csv',
    },
];

function termKey(term: Quad['subject'] | Quad['predicate'] | Quad['object']): string {
    if (term.termType === 'Literal') {
        return `"${term.value}"^^${term.datatype.value}@${term.language}`;
    }
    return `${term.termType}:${term.value}`;
}

function quadKey(quad: Quad): string {
    return [quad.subject, quad.predicate, quad.object].map(termKey).join(' ');
}

function iris(values: readonly Value[]): string[] {
    return values.flatMap((v) => (v.kind === 'iri' ? [v.id] : []));
}

function literals(values: readonly Value[]): string[] {
    return values.flatMap((v) => (v.kind === 'literal' ? [v.value] : []));
}

describe('RdfGeneratorStage', () => {
    const stage = new RdfGeneratorStage();

    it('should expose its kind and name', () => {
        expect(stage.kind).toBe('generator');
        expect(stage.getName()).toBe('rdf_generator');
    });

    it('should mint identifiers under the normalized base IRI', async () => {
        const doc = await stage.execute(RECORDS, { datasetUri: BASE });

        expect(doc.format).toBe('turtle');
        expect(doc.entityIds).toEqual([
            'http://example.org/ds',
            'http://example.org/ds/dataset/0',
            'http://example.org/ds/agent/health-institute',
            'http://example.org/ds/contact/0',
            'http://example.org/ds/distribution/0',
            'http://example.org/ds/schema',
            'http://example.org/ds/schema/column/0',
            'http://example.org/ds/schema/column/1',
            'http://example.org/ds/schema/column/2',
            'http://example.org/ds/schema/column/3',
        ]);
    });

    it('should produce identical output for identical input', async () => {
        const first = await stage.execute(RECORDS, { datasetUri: BASE });
        const second = await stage.execute(RECORDS, { datasetUri: BASE });

        expect(second.text).toBe(first.text);
        expect(second.entityIds).toEqual(first.entityIds);
    });

    it.each(['turtle', 'ntriples'] as const)('should round-trip %s output through the n3 parser', async (format) => {
        const doc = await stage.execute(RECORDS, { datasetUri: BASE, format });
        const parsed = new Parser({ format: parserFormat(format) }).parse(doc.text);

        const graph = buildMetadataGraph(RECORDS, { datasetUri: BASE });
        const expected = new Set(graph.triples().map((t) => quadKey(toQuad(t))));

        expect(new Set(parsed.map(quadKey))).toEqual(expected);
        expect(parsed).toHaveLength(doc.tripleCount);
    });

    it('should write prefix declarations for turtle', async () => {
        const doc = await stage.execute(RECORDS, { datasetUri: BASE });
        expect(doc.text).toContain(`@prefix dct: <${NAMESPACES.dct}>`);
    });

    it('should fail fast on an unsupported format', async () => {
        await expect(stage.execute(RECORDS, { datasetUri: BASE, format: 'csv' })).rejects.toThrow(
            "Unsupported format 'csv'. Supported formats: turtle, trig, ntriples, nquads, n3"
        );
    });

    it('should compare format names case-sensitively', async () => {
        await expect(stage.execute(RECORDS, { datasetUri: BASE, format: 'Turtle' })).rejects.toBeInstanceOf(
            UnsupportedFormatError
        );
    });

    it('should check the format before the dataset URI', async () => {
        await expect(stage.execute(RECORDS, { format: 'csv' })).rejects.toBeInstanceOf(UnsupportedFormatError);
    });

    it('should require a dataset URI', async () => {
        await expect(stage.execute(RECORDS, {})).rejects.toThrow("Missing required option 'datasetUri'");
        await expect(stage.execute(RECORDS, { datasetUri: '  ' })).rejects.toBeInstanceOf(MissingConfigurationError);
    });

    it('should reject a relative dataset URI', async () => {
        await expect(stage.execute(RECORDS, { datasetUri: 'ds/base' })).rejects.toThrow(
            "Option 'datasetUri' must be an absolute IRI, got 'ds/base'"
        );
    });

    it('should write every triple on its own line for ntriples', async () => {
        const doc = await stage.execute([{ title: 'A' }], {
            datasetUri: 'http://example.org/ds',
            format: 'ntriples',
            catalog: false,
            tableSchema: false,
        });

        expect(doc.text).toBe(
            '<http://example.org/ds/dataset/0> <http://www.w3.org/1999/02/22-rdf-syntax-ns#type> <http://www.w3.org/ns/dcat#Dataset> .\n' +
                '<http://example.org/ds/dataset/0> <http://purl.org/dc/terms/title> "A" .\n'
        );
    });
});

describe('buildMetadataGraph', () => {
    it('should preserve row order in dataset entities', () => {
        const records: RecordSet = [{ title: 'C' }, { title: 'A' }, { title: 'B' }];
        const graph = buildMetadataGraph(records, { datasetUri: BASE });

        const datasets = graph.entitiesOfType('Dataset');
        expect(datasets.map((d) => literals(d.get(LINKS.title)))).toEqual([['C'], ['A'], ['B']]);

        const catalog = graph.getEntity('http://example.org/ds');
        expect(iris(catalog?.get(LINKS.catalogDataset) ?? [])).toEqual([
            'http://example.org/ds/dataset/0',
            'http://example.org/ds/dataset/1',
            'http://example.org/ds/dataset/2',
        ]);
    });

    it('should record the number of rows on the catalog', () => {
        const graph = buildMetadataGraph([{ title: 'A' }, { title: 'B' }], { datasetUri: BASE });
        const catalog = graph.getEntity('http://example.org/ds');

        expect(catalog?.get(LINKS.numberOfItems)).toEqual([
            { kind: 'literal', value: '2', datatype: `${NAMESPACES.xsd}integer` },
        ]);
    });

    it('should key datasets by the natural key column', () => {
        const graph = buildMetadataGraph([{ identifier: 'CR 2024' }, { identifier: '' }], {
            datasetUri: BASE,
            naturalKey: 'identifier',
        });

        expect(graph.entitiesOfType('Dataset').map((d) => d.id)).toEqual([
            'http://example.org/ds/dataset/cr-2024',
            'http://example.org/ds/dataset/_1',
        ]);
    });

    it('should not let an empty natural key collide with a key equal to its row index', () => {
        const graph = buildMetadataGraph([{ identifier: '1' }, { identifier: '' }], {
            datasetUri: BASE,
            naturalKey: 'identifier',
        });

        expect(graph.entitiesOfType('Dataset').map((d) => d.id)).toEqual([
            'http://example.org/ds/dataset/1',
            'http://example.org/ds/dataset/_1',
        ]);
    });

    it('should reject two rows with the same natural key', () => {
        expect(() =>
            buildMetadataGraph([{ identifier: 'X' }, { identifier: 'x' }], { datasetUri: BASE, naturalKey: 'identifier' })
        ).toThrow("Rows 0 and 1 both map to dataset key 'x'; deduplicate them with a transform first");
    });

    it('should share one agent between rows naming the same publisher', () => {
        const graph = buildMetadataGraph(
            [
                { title: 'A', publisher: 'Health Institute' },
                { title: 'B', publisher: 'Health Institute' },
            ],
            { datasetUri: BASE }
        );

        const agents = graph.entitiesOfType('Agent');
        expect(agents.map((a) => a.id)).toEqual(['http://example.org/ds/agent/health-institute']);
        expect(literals(agents[0]?.get(`${NAMESPACES.foaf}name`) ?? [])).toEqual(['Health Institute']);

        for (const dataset of graph.entitiesOfType('Dataset')) {
            expect(iris(dataset.get(LINKS.publisher))).toEqual(['http://example.org/ds/agent/health-institute']);
        }
    });

    it('should split multi-valued fields on the separator', () => {
        const graph = buildMetadataGraph([{ keywords: 'cancer; registry;; oncology ' }], { datasetUri: BASE });
        const dataset = graph.getEntity('http://example.org/ds/dataset/0');

        expect(literals(dataset?.get(`${NAMESPACES.dcat}keyword`) ?? [])).toEqual(['cancer', 'registry', 'oncology']);
    });

    it('should type literals according to the mapping', () => {
        const graph = buildMetadataGraph(
            [{ issued: '2024-01-15', number_of_records: '1200', min_typical_age: '-1' }],
            { datasetUri: BASE }
        );
        const dataset = graph.getEntity('http://example.org/ds/dataset/0');

        expect(dataset?.get(`${NAMESPACES.dct}issued`)).toEqual([
            { kind: 'literal', value: '2024-01-15', datatype: `${NAMESPACES.xsd}date` },
        ]);
        expect(dataset?.get(`${NAMESPACES.healthdcat}numberOfRecords`)).toEqual([
            { kind: 'literal', value: '1200', datatype: `${NAMESPACES.xsd}nonNegativeInteger` },
        ]);
        expect(dataset?.get(`${NAMESPACES.healthdcat}minTypicalAge`)).toEqual([{ kind: 'literal', value: '-1' }]);
    });

    it('should turn contact emails into mailto IRIs', () => {
        const graph = buildMetadataGraph([{ contact_email: 'info@hi.org' }], { datasetUri: BASE });
        const contact = graph.getEntity('http://example.org/ds/contact/0');

        expect(iris(contact?.get(`${NAMESPACES.vcard}hasEmail`) ?? [])).toEqual(['mailto:info@hi.org']);
    });

    it('should skip values that are not valid IRIs', () => {
        const graph = buildMetadataGraph([{ landing_page: 'not a url' }], { datasetUri: BASE });
        const dataset = graph.getEntity('http://example.org/ds/dataset/0');

        expect(dataset?.get(`${NAMESPACES.dcat}landingPage`)).toEqual([]);
    });

    it('should ignore empty and unmapped cells', () => {
        const graph = buildMetadataGraph([{ title: '', internal_note: 'x', publisher: null }], {
            datasetUri: BASE,
            catalog: false,
            tableSchema: false,
        });

        expect(graph.entityIds()).toEqual(['http://example.org/ds/dataset/0']);
        expect(graph.triples()).toHaveLength(1);
    });

    it('should apply mapping overrides per field', () => {
        const graph = buildMetadataGraph([{ title: 'A', site: 'https://example.org/a' }], {
            datasetUri: BASE,
            mapping: { title: 'dct:alternative', site: { property: 'dcat:landingPage' } },
        });
        const dataset = graph.getEntity('http://example.org/ds/dataset/0');

        expect(literals(dataset?.get(`${NAMESPACES.dct}alternative`) ?? [])).toEqual(['A']);
        expect(dataset?.get(LINKS.title)).toEqual([]);
        expect(iris(dataset?.get(`${NAMESPACES.dcat}landingPage`) ?? [])).toEqual(['https://example.org/a']);
    });

    it('should map columns named after Object.prototype members', () => {
        const graph = buildMetadataGraph([{ toString: 'A' }], {
            datasetUri: BASE,
            catalog: false,
            tableSchema: false,
            mapping: { toString: 'dct:title' },
        });
        const dataset = graph.getEntity('http://example.org/ds/dataset/0');

        expect(literals(dataset?.get(LINKS.title) ?? [])).toEqual(['A']);
        expect(graph.triples()).toHaveLength(2);
    });

    it('should type decimal values as xsd:decimal and exponent values as xsd:double', () => {
        const graph = buildMetadataGraph([{ a: '1.5', b: '1e5' }], {
            datasetUri: BASE,
            catalog: false,
            tableSchema: false,
            mapping: {
                a: { property: 'healthdcat:minTypicalAge', kind: 'decimal' },
                b: { property: 'healthdcat:maxTypicalAge', kind: 'decimal' },
            },
        });
        const dataset = graph.getEntity('http://example.org/ds/dataset/0');

        expect(dataset?.get(`${NAMESPACES.healthdcat}minTypicalAge`)).toEqual([
            { kind: 'literal', value: '1.5', datatype: `${NAMESPACES.xsd}decimal` },
        ]);
        expect(dataset?.get(`${NAMESPACES.healthdcat}maxTypicalAge`)).toEqual([
            { kind: 'literal', value: '1e5', datatype: `${NAMESPACES.xsd}double` },
        ]);
    });

    it('should reject a mapping to a property that is not an IRI', () => {
        expect(() => buildMetadataGraph([{ title: 'A' }], { datasetUri: BASE, mapping: { title: 'title' } })).toThrow(
            "Field 'title' maps to 'title', which is neither a known CURIE nor an IRI"
        );
    });

    it('should describe columns in the table schema', () => {
        const graph = buildMetadataGraph([{ title: 'A', number_of_records: '10' }], { datasetUri: BASE });
        const column = graph.getEntity('http://example.org/ds/schema/column/1');

        expect(literals(column?.get(`${NAMESPACES.csvw}name`) ?? [])).toEqual(['number_of_records']);
        expect(literals(column?.get(`${NAMESPACES.csvw}datatype`) ?? [])).toEqual(['integer']);
        expect(iris(graph.getEntity('http://example.org/ds')?.get(LINKS.tableSchema) ?? [])).toEqual([
            'http://example.org/ds/schema',
        ]);
    });

    it('should leave out catalog and schema when disabled', () => {
        const graph = buildMetadataGraph([{ title: 'A' }], { datasetUri: BASE, catalog: false, tableSchema: false });
        expect(graph.entityIds()).toEqual(['http://example.org/ds/dataset/0']);
    });
});

describe('inferDatatype', () => {
    it('should use the first non-empty value', () => {
        expect(inferDatatype([{ n: '' }, { n: '7' }, { n: 'x' }], 'n')).toBe('integer');
    });

    it.each([
        [[{ v: '1.5' }], 'decimal'],
        [[{ v: '1e5' }], 'double'],
        [[{ v: true }], 'boolean'],
        [[{ v: 3 }], 'integer'],
        [[{ v: 2.5 }], 'decimal'],
        [[{ v: 'text' }], 'string'],
        [[{ v: null }], 'string'],
    ] as const)('should infer %j as %s', (records, expected) => {
        expect(inferDatatype(records, 'v')).toBe(expected);
    });
});
