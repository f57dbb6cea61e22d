import type { GeneratedDocument, GeneratorOptions, GeneratorPlugin, RecordSet } from '../types/index.js';
import { buildMetadataGraph } from '../builder/graph-builder.js';
import { SUPPORTED_FORMATS, isRdfFormat, serializeTriples } from '../exporters/rdf-serializer.js';
import { NAMESPACES } from '../profile/healthdcat.js';
import { MissingConfigurationError, UnsupportedFormatError } from '../utils/errors.js';
import { isAbsoluteIri } from '../utils/iri.js';
import { getLogger } from '../utils/logger.js';

/**
 * RDF generation stage: maps rows to HealthDCAT entities and serializes the
 * graph. Options are checked before any entity is built.
 */
export class RdfGeneratorStage implements GeneratorPlugin {
    readonly kind = 'generator';

    getName(): string {
        return 'rdf_generator';
    }

    async execute(input: RecordSet, options: GeneratorOptions): Promise<GeneratedDocument> {
        const format = options.format ?? 'turtle';
        if (!isRdfFormat(format)) {
            throw new UnsupportedFormatError(format, SUPPORTED_FORMATS);
        }

        const datasetUri = options.datasetUri?.trim();
        if (!datasetUri) {
            throw new MissingConfigurationError('datasetUri');
        }
        if (!isAbsoluteIri(datasetUri)) {
            throw new MissingConfigurationError(
                'datasetUri',
                `Option 'datasetUri' must be an absolute IRI, got '${datasetUri}'`
            );
        }

        const graph = buildMetadataGraph(input, {
            datasetUri,
            mapping: options.mapping,
            naturalKey: options.naturalKey,
            catalog: options.catalog,
            tableSchema: options.tableSchema,
        });
        graph.seal();

        const triples = graph.triples();
        const text = await serializeTriples(triples, format, NAMESPACES);

        getLogger().info({ format, entities: graph.size, triples: triples.length }, 'RDF generated');

        return {
            text,
            format,
            entityIds: graph.entityIds(),
            tripleCount: triples.length,
        };
    }
}
