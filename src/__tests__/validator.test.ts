import { describe, it, expect } from 'vitest';
import { ValidatorStage, validateRecords, buildRules } from '../plugins/validator.js';
import { ValidationFailedError } from '../utils/errors.js';
import type { FieldRule, RecordSet } from '../types/index.js';

const RECORDS: RecordSet = [
    { title: 'Cancer registry', age: '12', email: 'info@registry.org' },
    { title: '', age: 'x', email: 'bad' },
    { age: '3' },
];

const RULES: FieldRule[] = [
    { field: 'title', required: true },
    { field: 'age', type: 'integer' },
    { field: 'email', type: 'email', pattern: '\\.org$' },
];

describe('validateRecords', () => {
    it('should report issues in row order, then rule order', () => {
        const { issues } = validateRecords(RECORDS, { rules: RULES });

        expect(issues).toEqual([
            { row: 1, field: 'title', rule: 'required', message: "Row 1: required field 'title' is empty" },
            { row: 1, field: 'age', rule: 'type', message: "Row 1: field 'age' value 'x' is not a valid integer" },
            { row: 1, field: 'email', rule: 'type', message: "Row 1: field 'email' value 'bad' is not a valid email" },
            { row: 2, field: 'title', rule: 'required', message: "Row 2: required field 'title' is missing" },
        ]);
    });

    it('should be deterministic', () => {
        expect(validateRecords(RECORDS, { rules: RULES })).toEqual(validateRecords(RECORDS, { rules: RULES }));
    });

    it('should pass every row through in lenient mode', () => {
        const { records } = validateRecords(RECORDS, { rules: RULES });
        expect(records).toEqual(RECORDS);
    });

    it('should keep only clean rows with dropInvalid', () => {
        const { records, issues } = validateRecords(RECORDS, { rules: RULES, dropInvalid: true });
        expect(records).toEqual([RECORDS[0]]);
        expect(issues).toHaveLength(4);
    });

    it('should throw ValidationFailedError carrying all issues in strict mode', () => {
        let caught: unknown;
        try {
            validateRecords(RECORDS, { rules: RULES, strict: true });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ValidationFailedError);
        if (caught instanceof ValidationFailedError) {
            expect(caught.kind).toBe('ValidationFailed');
            expect(caught.issues).toHaveLength(4);
        }
    });

    it('should not throw in strict mode when there are no issues', () => {
        const { records, issues } = validateRecords([RECORDS[0] ?? {}], { rules: RULES, strict: true });
        expect(issues).toEqual([]);
        expect(records).toHaveLength(1);
    });

    it('should check the pattern after the type', () => {
        const { issues } = validateRecords([{ email: 'info@registry.com' }], { rules: RULES.slice(2) });
        expect(issues).toEqual([
            {
                row: 0,
                field: 'email',
                rule: 'pattern',
                message: "Row 0: field 'email' value 'info@registry.com' does not match /\\.org$/",
            },
        ]);
    });

    it('should emit one required issue and skip other checks for that field', () => {
        const { issues } = validateRecords([{ age: ' ' }], {
            rules: [{ field: 'age', required: true, type: 'integer' }],
        });
        expect(issues).toHaveLength(1);
        expect(issues[0]?.rule).toBe('required');
    });

    it('should accept empty strings with allowEmpty but not null', () => {
        const rules: FieldRule[] = [{ field: 'title', required: true }];

        expect(validateRecords([{ title: '' }], { rules, allowEmpty: true }).issues).toEqual([]);
        expect(validateRecords([{ title: null }], { rules, allowEmpty: true }).issues).toEqual([
            { row: 0, field: 'title', rule: 'required', message: "Row 0: required field 'title' is missing" },
        ]);
    });

    it('should skip type checks for empty optional values', () => {
        const { issues } = validateRecords([{ age: '' }], { rules: [{ field: 'age', type: 'integer' }] });
        expect(issues).toEqual([]);
    });

    it('should check numbers and booleans through their string form', () => {
        const { issues } = validateRecords([{ age: 5, flag: true }], {
            rules: [
                { field: 'age', type: 'integer' },
                { field: 'flag', type: 'boolean' },
            ],
        });
        expect(issues).toEqual([]);
    });

    it.each([
        ['integer', '-42', true],
        ['integer', '4.2', false],
        ['decimal', '4.2', true],
        ['decimal', '1e3', false],
        ['decimal', '.5', true],
        ['decimal', 'abc', false],
        ['boolean', 'TRUE', true],
        ['boolean', 'yes', false],
        ['date', '2024-03-15', true],
        ['date', '2024-3-15', false],
        ['date', '2024-02-29', true],
        ['date', '2024-02-30', false],
        ['date', '2023-13-01', false],
        ['datetime', '2024-03-15T10:30:00Z', true],
        ['datetime', '2024-03-15T10:30:00+02:00', true],
        ['datetime', '2024-03-15', false],
        ['datetime', '2024-02-30T10:00:00Z', false],
        ['datetime', '2024-03-15T25:00:00Z', false],
        ['datetime', '2024-03-15T10:61:00Z', false],
        ['uri', 'https://example.org/x', true],
        ['uri', 'not a uri', false],
        ['email', 'a@b.org', true],
        ['email', 'a@b', false],
    ] as const)('type %s should accept %s: %s', (type, value, valid) => {
        const { issues } = validateRecords([{ value }], { rules: [{ field: 'value', type }] });
        expect(issues.length === 0).toBe(valid);
    });

    it('should report at most one issue per field when several rules name it', () => {
        const { issues } = validateRecords([{ age: 'x' }], {
            rules: [
                { field: 'age', type: 'integer' },
                { field: 'age', pattern: '^\\d$' },
            ],
        });

        expect(issues).toEqual([
            { row: 0, field: 'age', rule: 'type', message: "Row 0: field 'age' value 'x' is not a valid integer" },
        ]);
    });

    it('should return no issues for an empty record set', () => {
        expect(validateRecords([], { rules: RULES, strict: true })).toEqual({ records: [], issues: [] });
    });
});

describe('buildRules', () => {
    it('should append requiredFields not already declared', () => {
        const rules = buildRules({
            rules: [{ field: 'a', type: 'integer' }],
            requiredFields: ['a', 'b'],
        });

        expect(rules).toEqual([
            { field: 'a', type: 'integer', required: true },
            { field: 'b', required: true },
        ]);
    });

    it('should merge rules naming the same field into the first one', () => {
        const rules = buildRules({
            rules: [
                { field: 'a', type: 'integer' },
                { field: 'b', pattern: '^x' },
                { field: 'a', required: true, type: 'decimal', pattern: '^1' },
            ],
        });

        expect(rules).toEqual([
            { field: 'a', type: 'integer', required: true, pattern: '^1' },
            { field: 'b', pattern: '^x' },
        ]);
    });

    it('should not modify the caller rules', () => {
        const declared: FieldRule[] = [{ field: 'a' }];
        buildRules({ rules: declared, requiredFields: ['a'] });
        expect(declared).toEqual([{ field: 'a' }]);
    });
});

describe('ValidatorStage', () => {
    it('should expose its kind and name', () => {
        const stage = new ValidatorStage();
        expect(stage.kind).toBe('validator');
        expect(stage.getName()).toBe('validator');
    });

    it('should not mutate frozen input', async () => {
        const input = Object.freeze([Object.freeze({ title: ' ' })]);
        const report = await new ValidatorStage().execute(input, { requiredFields: ['title'] });

        expect(report.issues).toHaveLength(1);
        expect(input[0]).toEqual({ title: ' ' });
    });

    it('should reject in strict mode', async () => {
        await expect(
            new ValidatorStage().execute([{ publisher: '' }], { strict: true, requiredFields: ['publisher'] })
        ).rejects.toBeInstanceOf(ValidationFailedError);
    });
});
