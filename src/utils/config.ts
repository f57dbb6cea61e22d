import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type ConverterConfig } from '../types/index.js';
import { getLogger, isLogLevel } from './logger.js';

const FieldRuleSchema = z.object({
    field: z.string().min(1),
    required: z.boolean().optional(),
    type: z.enum(['string', 'integer', 'decimal', 'boolean', 'date', 'datetime', 'uri', 'email']).optional(),
    pattern: z.string().optional(),
});

const MappingOverrideSchema = z.union([
    z.string().min(1),
    z.object({
        property: z.string().min(1),
        target: z.enum(['dataset', 'distribution', 'publisher', 'contact']).optional(),
        kind: z
            .enum(['literal', 'iri', 'iriOrLiteral', 'mailto', 'date', 'dateTime', 'integer', 'nonNegativeInteger', 'decimal', 'boolean'])
            .optional(),
        separator: z.string().min(1).optional(),
    }),
]);

const TransformStepSchema = z.union([
    z.string().min(1),
    z.object({
        name: z.string().min(1),
        options: z.record(z.string(), z.unknown()).optional(),
    }),
]);

/**
 * Shape of healthdcat.config.json. Every key is optional.
 */
export const FileConfigSchema = z
    .object({
        format: z.string().min(1),
        datasetUri: z.string().min(1),
        mapping: z.record(z.string(), MappingOverrideSchema),
        naturalKey: z.string().min(1),
        catalog: z.boolean(),
        tableSchema: z.boolean(),
        validate: z.boolean(),
        strict: z.boolean(),
        rules: z.array(FieldRuleSchema),
        requiredFields: z.array(z.string().min(1)),
        allowEmpty: z.boolean(),
        dropInvalid: z.boolean(),
        transforms: z.array(TransformStepSchema),
        validator: z.string().min(1),
        generator: z.string().min(1),
        out: z.string().min(1),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Load configuration from healthdcat.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 *
 * @throws Error when the file exists but does not match FileConfigSchema
 */
export async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('healthdcat', {
        searchPlaces: ['healthdcat.config.json'],
    });

    let raw: unknown;
    let filepath: string;
    try {
        const result = await explorer.search(searchFrom);
        if (!result || result.isEmpty) return null;
        raw = result.config;
        filepath = result.filepath;
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
        return null;
    }

    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const details = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        throw new Error(`Invalid config file ${filepath}: ${details}`);
    }

    getLogger().debug({ path: filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<ConverterConfig> {
    const config: Partial<ConverterConfig> = {};

    const datasetUri = env['HEALTHDCAT_DATASET_URI'];
    if (datasetUri) config.datasetUri = datasetUri;

    const format = env['HEALTHDCAT_FORMAT'];
    if (format) config.format = format;

    const logLevel = env['HEALTHDCAT_LOG_LEVEL'];
    if (isLogLevel(logLevel)) config.logLevel = logLevel;

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * CLI flags must leave unset options out rather than set them to undefined.
 */
export async function resolveConfig(
    cliFlags: Partial<ConverterConfig>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<ConverterConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        mapping: {
            ...fileConfig?.mapping,
            ...cliFlags.mapping,
        },
    };
}
