import type { FieldRule } from './validation.js';
import type { MappingOverride } from './profile.js';
import type { TransformOptions } from './plugin.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * A transform to run, by registered name, with its own options.
 */
export interface TransformStep {
    name: string;
    options?: TransformOptions;
}

/**
 * Options of a single conversion call.
 */
export interface ConversionOptions {
    // Generation
    format: string;
    datasetUri?: string;
    mapping?: Record<string, MappingOverride>;
    naturalKey?: string;
    catalog: boolean;
    tableSchema: boolean;

    // Validation
    validate: boolean;
    strict: boolean;
    rules: FieldRule[];
    requiredFields: string[];
    allowEmpty: boolean;
    dropInvalid: boolean;

    // Transforms, in execution order
    transforms: Array<string | TransformStep>;

    // Registry names of the fixed stages
    validator: string;
    generator: string;
}

/**
 * Full CLI configuration merged from flags, env vars, and config file.
 */
export interface ConverterConfig extends ConversionOptions {
    out?: string;
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default conversion options.
 */
export const DEFAULT_CONVERSION_OPTIONS: ConversionOptions = {
    format: 'turtle',
    catalog: true,
    tableSchema: true,
    validate: true,
    strict: false,
    rules: [],
    requiredFields: [],
    allowEmpty: false,
    dropInvalid: false,
    transforms: [],
    validator: 'validator',
    generator: 'rdf_generator',
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ConverterConfig = {
    ...DEFAULT_CONVERSION_OPTIONS,
    logLevel: 'info',
    jsonLogs: false,
};
