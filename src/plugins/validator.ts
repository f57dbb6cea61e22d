import type {
    CellValue,
    DataRecord,
    FieldRule,
    FieldType,
    RecordSet,
    ValidationIssue,
    ValidationReport,
    ValidatorOptions,
    ValidatorPlugin,
} from '../types/index.js';
import { ValidationFailedError } from '../utils/errors.js';
import { isAbsoluteIri } from '../utils/iri.js';
import { DECIMAL, INTEGER, isIsoDate, isIsoDateTime } from '../utils/lexical.js';
import { getLogger } from '../utils/logger.js';
import { getCell } from '../utils/records.js';

/**
 * Type predicates over the trimmed, non-empty string form of a cell.
 */
const TYPE_CHECKS: Readonly<Record<FieldType, (value: string) => boolean>> = {
    string: () => true,
    integer: (v) => INTEGER.test(v),
    decimal: (v) => DECIMAL.test(v),
    boolean: (v) => /^(true|false|1|0)$/i.test(v),
    date: isIsoDate,
    datetime: isIsoDateTime,
    uri: (v) => isAbsoluteIri(v),
    email: (v) => /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(v),
};

/**
 * Merge explicit rules with the `requiredFields` shorthand, one rule per field.
 *
 * A field keeps the position of its first rule. Later rules for the same
 * field add to it: `required` if any rule asks for it, and the first
 * declared `type` and `pattern`. Shorthand fields not already declared are
 * appended as required.
 */
export function buildRules(options: ValidatorOptions): FieldRule[] {
    const byField = new Map<string, FieldRule>();

    for (const rule of options.rules ?? []) {
        const existing = byField.get(rule.field);
        if (!existing) {
            byField.set(rule.field, { ...rule });
            continue;
        }
        if (rule.required) existing.required = true;
        existing.type ??= rule.type;
        existing.pattern ??= rule.pattern;
    }

    for (const field of options.requiredFields ?? []) {
        const existing = byField.get(field);
        if (existing) {
            existing.required = true;
        } else {
            byField.set(field, { field, required: true });
        }
    }

    return [...byField.values()];
}

function isMissing(cell: CellValue | undefined, allowEmpty: boolean): boolean {
    if (cell === undefined || cell === null) return true;
    return !allowEmpty && typeof cell === 'string' && cell.trim() === '';
}

/**
 * Check one cell against its rule. Returns at most one issue.
 */
function checkField(record: DataRecord, row: number, rule: FieldRule, allowEmpty: boolean): ValidationIssue | null {
    const cell = getCell(record, rule.field);

    if (rule.required && isMissing(cell, allowEmpty)) {
        const reason = cell === undefined || cell === null ? 'missing' : 'empty';
        return {
            row,
            field: rule.field,
            rule: 'required',
            message: `Row ${row}: required field '${rule.field}' is ${reason}`,
        };
    }

    if (cell === undefined || cell === null) return null;

    const text = String(cell).trim();
    if (text === '') return null;

    if (rule.type && !TYPE_CHECKS[rule.type](text)) {
        return {
            row,
            field: rule.field,
            rule: 'type',
            message: `Row ${row}: field '${rule.field}' value '${text}' is not a valid ${rule.type}`,
        };
    }

    if (rule.pattern && !new RegExp(rule.pattern).test(text)) {
        return {
            row,
            field: rule.field,
            rule: 'pattern',
            message: `Row ${row}: field '${rule.field}' value '${text}' does not match /${rule.pattern}/`,
        };
    }

    return null;
}

/**
 * Validate a record set. Issues are ordered by row, then by rule declaration.
 */
export function validateRecords(records: RecordSet, options: ValidatorOptions = {}): ValidationReport {
    const rules = buildRules(options);
    const allowEmpty = options.allowEmpty ?? false;

    if (records.length === 0) {
        getLogger().warn('Record set is empty');
        return { records: [], issues: [] };
    }

    const issues: ValidationIssue[] = [];
    const cleanRows: DataRecord[] = [];

    records.forEach((record, row) => {
        const rowIssues = rules
            .map((rule) => checkField(record, row, rule, allowEmpty))
            .filter((issue): issue is ValidationIssue => issue !== null);

        issues.push(...rowIssues);
        if (rowIssues.length === 0) cleanRows.push(record);
    });

    if (issues.length > 0 && options.strict) {
        throw new ValidationFailedError(issues);
    }

    return {
        records: options.dropInvalid ? cleanRows : [...records],
        issues,
    };
}

/**
 * Validator stage. `strict` aborts with ValidationFailedError on any issue;
 * lenient mode returns the issues alongside the records.
 */
export class ValidatorStage implements ValidatorPlugin {
    readonly kind = 'validator';

    getName(): string {
        return 'validator';
    }

    async execute(input: RecordSet, options: ValidatorOptions): Promise<ValidationReport> {
        const report = validateRecords(input, options);

        if (report.issues.length > 0) {
            getLogger().warn(
                { issues: report.issues.length, kept: report.records.length, total: input.length },
                'Validation finished with issues'
            );
        }

        return report;
    }
}
