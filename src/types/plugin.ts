import type { RecordSet } from './record.js';
import type { FieldRule, ValidationIssue } from './validation.js';
import type { MappingOverride } from './profile.js';

/**
 * Stage kinds a plugin can implement.
 */
export type PluginKind = 'validator' | 'transform' | 'generator';

/**
 * Capability interface shared by every stage.
 * `execute` must not mutate `input`; it returns a new value.
 */
interface StagePlugin<K extends PluginKind, I, O, Opts> {
    readonly kind: K;
    getName(): string;
    execute(input: I, options: Opts): Promise<O>;
}

// ─── Validator ───────────────────────────────────────────

export interface ValidatorOptions {
    /** Abort on the first record set with any issue */
    strict?: boolean;
    rules?: readonly FieldRule[];
    /** Shorthand for `{ field, required: true }` rules */
    requiredFields?: readonly string[];
    /** Accept empty strings for required fields */
    allowEmpty?: boolean;
    /** In lenient mode, drop rows that have issues instead of passing them through */
    dropInvalid?: boolean;
}

export interface ValidationReport {
    records: RecordSet;
    issues: ValidationIssue[];
}

export type ValidatorPlugin = StagePlugin<'validator', RecordSet, ValidationReport, ValidatorOptions>;

// ─── Transform ───────────────────────────────────────────

export type TransformOptions = Readonly<Record<string, unknown>>;

export interface TransformPlugin extends StagePlugin<'transform', RecordSet, RecordSet, TransformOptions> {
    /** Set when the transform may emit more rows than it receives */
    readonly expands?: boolean;
}

// ─── Generator ───────────────────────────────────────────

export type RdfFormat = 'turtle' | 'trig' | 'ntriples' | 'nquads' | 'n3';

export interface GeneratorOptions {
    /** Serialization format; checked at runtime against the supported set */
    format?: string;
    /** Base IRI every identifier is minted under */
    datasetUri?: string;
    /** Per-field overrides of the default profile mapping */
    mapping?: Readonly<Record<string, MappingOverride>>;
    /** Column whose value keys dataset identifiers instead of the row index */
    naturalKey?: string;
    /** Emit the catalog entity (default true) */
    catalog?: boolean;
    /** Emit the CSVW table schema (default true) */
    tableSchema?: boolean;
}

export interface GeneratedDocument {
    text: string;
    format: RdfFormat;
    /** Entity identifiers in emission order */
    entityIds: string[];
    tripleCount: number;
}

export type GeneratorPlugin = StagePlugin<'generator', RecordSet, GeneratedDocument, GeneratorOptions>;

// ─── Union ───────────────────────────────────────────────

export type Plugin = ValidatorPlugin | TransformPlugin | GeneratorPlugin;

export type PluginOfKind<K extends PluginKind> = Extract<Plugin, { kind: K }>;
