import type { ValidationIssue } from '../types/validation.js';

/**
 * Discriminant carried by every conversion error.
 */
export type ErrorKind =
    | 'SourceReadError'
    | 'ValidationFailed'
    | 'UnknownPluginError'
    | 'DuplicateNameError'
    | 'UnsupportedFormatError'
    | 'MissingConfigurationError'
    | 'StageError';

/**
 * Base class for all errors raised by the converter.
 */
export abstract class ConversionError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The reader could not open or parse its source.
 */
export class SourceReadError extends ConversionError {
    readonly kind = 'SourceReadError';

    constructor(
        message: string,
        public readonly source: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * Strict validation found at least one issue.
 */
export class ValidationFailedError extends ConversionError {
    readonly kind = 'ValidationFailed';

    constructor(public readonly issues: readonly ValidationIssue[]) {
        super(`Validation failed with ${issues.length} issue(s): ${issues.map((i) => i.message).join('; ')}`);
    }
}

export class UnknownPluginError extends ConversionError {
    readonly kind = 'UnknownPluginError';

    constructor(
        public readonly pluginName: string,
        reason?: string
    ) {
        super(reason ?? `No plugin registered under '${pluginName}'`);
    }
}

/**
 * A plugin name was registered twice. The first registration stays in effect.
 */
export class DuplicateNameError extends ConversionError {
    readonly kind = 'DuplicateNameError';

    constructor(public readonly pluginName: string) {
        super(`A plugin is already registered under '${pluginName}'`);
    }
}

export class UnsupportedFormatError extends ConversionError {
    readonly kind = 'UnsupportedFormatError';

    constructor(
        public readonly format: string,
        public readonly supported: readonly string[]
    ) {
        super(`Unsupported format '${format}'. Supported formats: ${supported.join(', ')}`);
    }
}

export class MissingConfigurationError extends ConversionError {
    readonly kind = 'MissingConfigurationError';

    constructor(
        public readonly option: string,
        message?: string
    ) {
        super(message ?? `Missing required option '${option}'`);
    }
}

/**
 * Wraps any failure that crosses a stage boundary, labelled with the stage.
 */
export class StageError extends ConversionError {
    readonly kind = 'StageError';
    declare readonly cause: Error;

    constructor(
        public readonly stage: string,
        cause: Error
    ) {
        super(`Stage '${stage}' failed: ${cause.message}`, { cause });
    }

    /** Kind of the underlying failure, or 'StageError' for unclassified ones */
    get causeKind(): ErrorKind {
        return this.cause instanceof ConversionError ? this.cause.kind : this.kind;
    }
}

/**
 * Normalize a thrown value into an Error instance.
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
