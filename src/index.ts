/**
 * Library entry point.
 */
export * from './types/index.js';
export {
    ConversionError,
    SourceReadError,
    ValidationFailedError,
    UnknownPluginError,
    DuplicateNameError,
    UnsupportedFormatError,
    MissingConfigurationError,
    StageError,
} from './utils/errors.js';
export type { ErrorKind } from './utils/errors.js';
export { initLogger, getLogger } from './utils/logger.js';
export { resolveConfig, loadConfigFile } from './utils/config.js';
export { PluginRegistry, getRegistry } from './registry/plugin-registry.js';
export {
    builtinPlugins,
    registerBuiltinPlugins,
    createRegistry,
    ValidatorStage,
    validateRecords,
    RdfGeneratorStage,
    defineTransform,
    renameFields,
    filterRows,
    trimValues,
} from './plugins/index.js';
export { CsvReader, parseCsv, csvToRecords } from './sources/csv-reader.js';
export { MemoryReader } from './sources/memory-reader.js';
export { convert, convertFile, convertRecords } from './pipeline/orchestrator.js';
export type { ConvertDependencies } from './pipeline/orchestrator.js';
export { RdfGraph, Entity, mintIdentifier } from './graph/rdf-graph.js';
export { buildMetadataGraph } from './builder/graph-builder.js';
export { serializeTriples, SUPPORTED_FORMATS } from './exporters/rdf-serializer.js';
export { NAMESPACES, DEFAULT_MAPPING, expandCurie, resolveMapping } from './profile/healthdcat.js';
