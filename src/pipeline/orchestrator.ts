import { z } from 'zod';
import type {
    ConversionOptions,
    ConversionResult,
    DataRecord,
    GeneratedDocument,
    GeneratorPlugin,
    PipelineState,
    RecordReader,
    RecordSet,
    TransformOptions,
    TransformPlugin,
    ValidationIssue,
    ValidatorPlugin,
} from '../types/index.js';
import { DEFAULT_CONVERSION_OPTIONS } from '../types/index.js';
import { PluginRegistry, getRegistry } from '../registry/plugin-registry.js';
import { CsvReader } from '../sources/csv-reader.js';
import { MemoryReader } from '../sources/memory-reader.js';
import { StageError, ValidationFailedError, toError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Shape every stage hands to the next one. Checked after each transform,
 * since transforms come from anywhere.
 */
const RecordSetSchema = z.array(z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()])));

export interface ConvertDependencies<S> {
    reader: RecordReader<S>;
    /** Defaults to the process-wide registry */
    registry?: PluginRegistry;
}

interface ResolvedTransform {
    label: string;
    plugin: TransformPlugin;
    options: TransformOptions;
}

interface ResolvedStages {
    validator: ValidatorPlugin | null;
    transforms: ResolvedTransform[];
    generator: GeneratorPlugin;
}

/**
 * Rows are frozen between stages so a stage that tries to mutate its input
 * in place fails instead of changing data the caller still holds.
 */
function freezeRecords(records: readonly DataRecord[]): RecordSet {
    return Object.freeze(records.map((record) => Object.freeze({ ...record })));
}

/**
 * Fill in defaults. An option passed as `undefined` takes its default, the
 * same as one left out.
 */
export function resolveOptions(options: Partial<ConversionOptions>): ConversionOptions {
    const defaults = DEFAULT_CONVERSION_OPTIONS;
    return {
        format: options.format ?? defaults.format,
        datasetUri: options.datasetUri,
        mapping: options.mapping,
        naturalKey: options.naturalKey,
        catalog: options.catalog ?? defaults.catalog,
        tableSchema: options.tableSchema ?? defaults.tableSchema,
        validate: options.validate ?? defaults.validate,
        strict: options.strict ?? defaults.strict,
        rules: options.rules ?? defaults.rules,
        requiredFields: options.requiredFields ?? defaults.requiredFields,
        allowEmpty: options.allowEmpty ?? defaults.allowEmpty,
        dropInvalid: options.dropInvalid ?? defaults.dropInvalid,
        transforms: options.transforms ?? defaults.transforms,
        validator: options.validator ?? defaults.validator,
        generator: options.generator ?? defaults.generator,
    };
}

/**
 * Resolve every stage up front so an unknown name fails before the source
 * is read. Each failure is labelled with the stage it would have run as.
 */
function resolveStages(registry: PluginRegistry, options: ConversionOptions): ResolvedStages {
    let label = 'validate';
    try {
        const validator = options.validate ? registry.resolve(options.validator, 'validator') : null;

        const transforms = options.transforms.map((step): ResolvedTransform => {
            const { name, options: stepOptions = {} } = typeof step === 'string' ? { name: step } : step;
            label = `transform:${name}`;
            return { label, plugin: registry.resolve(name, 'transform'), options: stepOptions };
        });

        label = 'generate';
        const generator = registry.resolve(options.generator, 'generator');

        return { validator, transforms, generator };
    } catch (error) {
        throw new StageError(label, toError(error));
    }
}

/**
 * Check a transform's output against the record set contract.
 */
function checkTransformOutput(transform: ResolvedTransform, input: RecordSet, output: unknown): RecordSet {
    // zod's parsed copy drops `__proto__` keys, so the rows handed on are the transform's own
    if (!isRecordSet(output)) {
        const parsed = RecordSetSchema.safeParse(output);
        const details = parsed.success
            ? ''
            : parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Transform returned an invalid record set: ${details}`);
    }

    if (output.length > input.length && !transform.plugin.expands) {
        throw new Error(
            `Transform returned ${output.length} rows from ${input.length} without declaring that it expands the record set`
        );
    }

    return freezeRecords(output);
}

function isRecordSet(value: unknown): value is RecordSet {
    return RecordSetSchema.safeParse(value).success;
}

// ─── Main Conversion Function ────────────────────────────

/**
 * Run one conversion:
 *
 *   init → read → validate → transform* → generate → done
 *
 * Any failure moves to `error`: later stages are not run, no text is
 * returned, and the result carries the StageError of the failing stage.
 */
export async function convert<S>(
    source: S,
    options: Partial<ConversionOptions>,
    dependencies: ConvertDependencies<S>
): Promise<ConversionResult> {
    const logger = getLogger();
    const opts = resolveOptions(options);
    const registry = dependencies.registry ?? getRegistry();

    let state: PipelineState = 'init';
    const stages: string[] = [];
    let issues: ValidationIssue[] = [];
    let recordCount = 0;

    const transition = (next: PipelineState): void => {
        logger.debug({ from: state, to: next }, 'Pipeline transition');
        state = next;
    };

    const fail = (stage: string, error: unknown): ConversionResult => {
        const stageError = error instanceof StageError ? error : new StageError(stage, toError(error));
        if (stageError.cause instanceof ValidationFailedError) {
            issues = [...stageError.cause.issues];
        }

        transition('error');
        logger.error(
            { stage: stageError.stage, kind: stageError.causeKind, error: stageError.cause.message },
            'Conversion failed'
        );

        return { success: false, issues, error: stageError, stages, recordCount, entityCount: 0 };
    };

    // ──────────────────────────────────────────────────
    // Init: resolve stages from the registry
    // ──────────────────────────────────────────────────
    let resolved: ResolvedStages;
    try {
        resolved = resolveStages(registry, opts);
    } catch (error) {
        return fail('init', error);
    }

    logger.info(
        {
            reader: dependencies.reader.name,
            validate: opts.validate,
            transforms: resolved.transforms.map((t) => t.label),
            format: opts.format,
        },
        'Starting conversion'
    );

    // ──────────────────────────────────────────────────
    // Read
    // ──────────────────────────────────────────────────
    transition('read');
    let records: RecordSet;
    try {
        records = freezeRecords(await dependencies.reader.read(source));
    } catch (error) {
        return fail('read', error);
    }
    recordCount = records.length;
    stages.push('read');

    // ──────────────────────────────────────────────────
    // Validate (optional)
    // ──────────────────────────────────────────────────
    if (resolved.validator) {
        transition('validate');
        try {
            const report = await resolved.validator.execute(records, {
                strict: opts.strict,
                rules: opts.rules,
                requiredFields: opts.requiredFields,
                allowEmpty: opts.allowEmpty,
                dropInvalid: opts.dropInvalid,
            });
            records = freezeRecords(report.records);
            issues = report.issues;
        } catch (error) {
            return fail('validate', error);
        }
        recordCount = records.length;
        stages.push('validate');
    }

    // ──────────────────────────────────────────────────
    // Transforms, in caller order
    // ──────────────────────────────────────────────────
    for (const transform of resolved.transforms) {
        transition('transform');
        try {
            const output: unknown = await transform.plugin.execute(records, transform.options);
            records = checkTransformOutput(transform, records, output);
        } catch (error) {
            return fail(transform.label, error);
        }
        recordCount = records.length;
        stages.push(transform.label);
    }

    // ──────────────────────────────────────────────────
    // Generate
    // ──────────────────────────────────────────────────
    transition('generate');
    let generated: GeneratedDocument;
    try {
        generated = await resolved.generator.execute(records, {
            format: opts.format,
            datasetUri: opts.datasetUri,
            mapping: opts.mapping,
            naturalKey: opts.naturalKey,
            catalog: opts.catalog,
            tableSchema: opts.tableSchema,
        });
    } catch (error) {
        return fail('generate', error);
    }
    stages.push('generate');

    transition('done');
    logger.info(
        { records: recordCount, entities: generated.entityIds.length, issues: issues.length },
        'Conversion complete'
    );

    return {
        success: true,
        text: generated.text,
        format: generated.format,
        issues,
        stages,
        recordCount,
        entityCount: generated.entityIds.length,
    };
}

/**
 * Convert a CSV file.
 */
export function convertFile(
    path: string,
    options: Partial<ConversionOptions>,
    registry?: PluginRegistry
): Promise<ConversionResult> {
    return convert(path, options, { reader: new CsvReader(), registry });
}

/**
 * Convert records already in memory.
 */
export function convertRecords(
    records: RecordSet,
    options: Partial<ConversionOptions>,
    registry?: PluginRegistry
): Promise<ConversionResult> {
    return convert(records, options, { reader: new MemoryReader(), registry });
}

