/**
 * Value types the validator can check a field against.
 */
export type FieldType =
    | 'string'
    | 'integer'
    | 'decimal'
    | 'boolean'
    | 'date'
    | 'datetime'
    | 'uri'
    | 'email';

/**
 * Rule kinds reported on a ValidationIssue.
 */
export type ValidationRule = 'required' | 'type' | 'pattern';

/**
 * Per-field rule. Rules are checked in declaration order.
 */
export interface FieldRule {
    field: string;
    required?: boolean;
    type?: FieldType;
    /** Regular expression source the (non-empty) value must match */
    pattern?: string;
}

/**
 * A single problem found in one cell.
 */
export interface ValidationIssue {
    /** Zero-based row index in the record set handed to the validator */
    row: number;
    field: string;
    rule: ValidationRule;
    message: string;
}
