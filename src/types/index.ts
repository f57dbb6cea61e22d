/**
 * Barrel export for all shared types.
 */
export type { CellValue, DataRecord, RecordSet } from './record.js';
export type { FieldType, FieldRule, ValidationRule, ValidationIssue } from './validation.js';
export type { EntityType, LiteralValue, IriValue, Value, Triple } from './graph.js';
export type { MappingTarget, ValueKind, FieldMapping, MappingOverride } from './profile.js';
export type {
    PluginKind,
    ValidatorOptions,
    ValidationReport,
    ValidatorPlugin,
    TransformOptions,
    TransformPlugin,
    RdfFormat,
    GeneratorOptions,
    GeneratedDocument,
    GeneratorPlugin,
    Plugin,
    PluginOfKind,
} from './plugin.js';
export { DEFAULT_CONFIG, DEFAULT_CONVERSION_OPTIONS } from './config.js';
export type { LogLevel, TransformStep, ConversionOptions, ConverterConfig } from './config.js';
export type { PipelineState, ConversionResult } from './conversion.js';
export type { RecordReader } from './reader.js';
