import type { ValidationIssue } from './validation.js';
import type { RdfFormat } from './plugin.js';
import type { StageError } from '../utils/errors.js';

/**
 * Pipeline states, in order. `error` absorbs any failure.
 */
export type PipelineState =
    | 'init'
    | 'read'
    | 'validate'
    | 'transform'
    | 'generate'
    | 'done'
    | 'error';

/**
 * Terminal artifact of one conversion call.
 */
export interface ConversionResult {
    success: boolean;
    /** Serialized graph; only set when the run completed */
    text?: string;
    format?: RdfFormat;
    issues: ValidationIssue[];
    /** First failure, labelled with the stage it came from */
    error?: StageError;
    /** Stage labels that completed, in order (e.g. `read`, `transform:rename_fields`) */
    stages: string[];
    /** Rows handed to the generator (or read, when the run stopped earlier) */
    recordCount: number;
    entityCount: number;
}
