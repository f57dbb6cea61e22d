#!/usr/bin/env node
import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger, isLogLevel } from '../utils/logger.js';
import { convertFile } from '../pipeline/orchestrator.js';
import { registerBuiltinPlugins } from '../plugins/index.js';
import { getRegistry } from '../registry/plugin-registry.js';
import { SUPPORTED_FORMATS, FORMAT_EXTENSIONS } from '../exporters/rdf-serializer.js';
import type { ConverterConfig } from '../types/index.js';

const VERSION = '1.0.0';

interface ConvertFlags {
    datasetUri?: string;
    format?: string;
    out?: string;
    validate: boolean;
    strict?: boolean;
    required?: string[];
    transform?: string[];
    naturalKey?: string;
    allowEmpty?: boolean;
    dropInvalid?: boolean;
    catalog: boolean;
    tableSchema: boolean;
    logLevel?: string;
    jsonLogs?: boolean;
}

/**
 * Only flags the user actually passed end up in the config, so they do not
 * mask values from the config file or environment.
 */
function toCliConfig(flags: ConvertFlags): Partial<ConverterConfig> {
    const config: Partial<ConverterConfig> = {};

    if (flags.datasetUri) config.datasetUri = flags.datasetUri;
    if (flags.format) config.format = flags.format;
    if (flags.out) config.out = flags.out;
    if (!flags.validate) config.validate = false;
    if (flags.strict) config.strict = true;
    if (flags.required) config.requiredFields = flags.required;
    if (flags.transform) config.transforms = flags.transform;
    if (flags.naturalKey) config.naturalKey = flags.naturalKey;
    if (flags.allowEmpty) config.allowEmpty = true;
    if (flags.dropInvalid) config.dropInvalid = true;
    if (!flags.catalog) config.catalog = false;
    if (!flags.tableSchema) config.tableSchema = false;
    if (flags.jsonLogs) config.jsonLogs = true;

    if (flags.logLevel !== undefined) {
        if (!isLogLevel(flags.logLevel)) {
            throw new Error(`Invalid log level: ${flags.logLevel}. Valid: error, warn, info, debug, silent`);
        }
        config.logLevel = flags.logLevel;
    }

    return config;
}

const program = new Command();

program
    .name('healthdcat')
    .description('Convert tabular dataset descriptions into HealthDCAT-AP metadata.')
    .version(VERSION);

// ─── CONVERT command ──────────────────────────────────────

program
    .command('convert')
    .description('Convert a CSV file into RDF')
    .argument('<input>', 'Input CSV file')
    .option('-u, --dataset-uri <uri>', 'Base IRI for minted identifiers')
    .option('-f, --format <format>', `Output format: ${SUPPORTED_FORMATS.join(' | ')}`)
    .option('-o, --out <path>', 'Output file path (stdout when omitted)')
    .option('--no-validate', 'Skip the validation stage')
    .option('--strict', 'Fail on the first validation issue')
    .option('-r, --required <fields...>', 'Columns that must be present and non-empty')
    .option('-t, --transform <names...>', 'Transforms to run, in order')
    .option('--natural-key <column>', 'Column used to key dataset identifiers')
    .option('--allow-empty', 'Accept empty strings in required columns')
    .option('--drop-invalid', 'Drop rows with validation issues (lenient mode)')
    .option('--no-catalog', 'Do not emit the catalog entity')
    .option('--no-table-schema', 'Do not emit the CSVW table schema')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs')
    .action(async (input: string, flags: ConvertFlags) => {
        const config = await resolveConfig(toCliConfig(flags));
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const logger = getLogger();

        const registry = registerBuiltinPlugins(getRegistry());
        const result = await convertFile(input, config, registry);

        for (const issue of result.issues) {
            logger.warn({ row: issue.row, field: issue.field, rule: issue.rule }, issue.message);
        }

        if (!result.success || result.text === undefined) {
            logger.error(
                { stage: result.error?.stage, kind: result.error?.causeKind },
                result.error?.message ?? 'Conversion failed'
            );
            process.exitCode = 1;
            return;
        }

        if (config.out) {
            await writeFile(config.out, result.text, 'utf-8');
            logger.info({ out: config.out, entities: result.entityCount }, 'Written');
        } else {
            process.stdout.write(result.text);
        }
    });

// ─── PLUGINS command ──────────────────────────────────────

program
    .command('plugins')
    .description('List registered plugins')
    .action(() => {
        const registry = registerBuiltinPlugins(getRegistry());
        for (const name of registry.list()) {
            console.log(`  ${name.padEnd(16)} ${registry.get(name).kind}`);
        }
    });

// ─── FORMATS command ──────────────────────────────────────

program
    .command('formats')
    .description('List supported output formats')
    .action(() => {
        for (const format of SUPPORTED_FORMATS) {
            console.log(`  ${format.padEnd(10)} ${FORMAT_EXTENSIONS[format]}`);
        }
    });

try {
    await program.parseAsync();
} catch (error) {
    getLogger().error({ error }, 'Command failed');
    process.exitCode = 1;
}
