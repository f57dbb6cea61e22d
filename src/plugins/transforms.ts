import { z } from 'zod';
import type { CellValue, RecordSet, TransformOptions, TransformPlugin } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { getCell, toRecord } from '../utils/records.js';

/**
 * Build a transform plugin whose options are checked against a zod schema
 * before the transform runs.
 */
export function defineTransform<S extends z.ZodTypeAny>(
    name: string,
    optionsSchema: S,
    apply: (records: RecordSet, options: z.infer<S>) => RecordSet,
    settings: { expands?: boolean } = {}
): TransformPlugin {
    return {
        kind: 'transform',
        expands: settings.expands ?? false,
        getName: () => name,
        async execute(input: RecordSet, options: TransformOptions): Promise<RecordSet> {
            const parsed = optionsSchema.safeParse(options);
            if (!parsed.success) {
                const details = parsed.error.issues
                    .map((i) => `${i.path.join('.') || '(options)'}: ${i.message}`)
                    .join('; ');
                throw new Error(`Invalid options for transform '${name}': ${details}`);
            }
            return apply(input, parsed.data);
        },
    };
}

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// ─── rename_fields ───────────────────────────────────────

/**
 * Rename columns while keeping their position in each row.
 */
export const renameFields = defineTransform(
    'rename_fields',
    z.object({ fields: z.record(z.string(), z.string().min(1)) }),
    (records, { fields }) => {
        const renamed = records.map((record) =>
            toRecord(
                Object.entries(record).map(([key, value]) => {
                    const target = Object.hasOwn(fields, key) ? fields[key] : undefined;
                    return [target ?? key, value] as const;
                })
            )
        );

        getLogger().debug({ fields: Object.keys(fields).length }, 'Fields renamed');
        return renamed;
    }
);

// ─── filter_rows ─────────────────────────────────────────

/**
 * Keep rows whose `field` equals one of the given values (compared as
 * trimmed strings), or drop them with `exclude`.
 */
export const filterRows = defineTransform(
    'filter_rows',
    z
        .object({
            field: z.string().min(1),
            value: CellSchema.optional(),
            values: z.array(CellSchema).optional(),
            exclude: z.boolean().default(false),
        })
        .refine((o) => o.value !== undefined || o.values !== undefined, {
            message: "filter_rows needs 'value' or 'values'",
        }),
    (records, { field, value, values, exclude }) => {
        const wanted = new Set([...(values ?? []), ...(value === undefined ? [] : [value])].map(normalizeCell));

        const filtered = records.filter((record) => wanted.has(normalizeCell(getCell(record, field))) !== exclude);

        getLogger().info({ field, before: records.length, after: filtered.length }, 'Rows filtered');
        return filtered;
    }
);

// ─── trim_values ─────────────────────────────────────────

/**
 * Trim whitespace from string cells, in all columns or the listed ones.
 */
export const trimValues = defineTransform(
    'trim_values',
    z.object({ fields: z.array(z.string()).optional() }),
    (records, { fields }) => {
        const only = fields ? new Set(fields) : null;

        return records.map((record) =>
            toRecord(
                Object.entries(record).map(([key, value]) => {
                    const trimmed = typeof value === 'string' && (!only || only.has(key)) ? value.trim() : value;
                    return [key, trimmed] as const;
                })
            )
        );
    }
);

function normalizeCell(cell: CellValue | undefined): string {
    if (cell === null || cell === undefined) return '';
    return String(cell).trim();
}

export const BUILTIN_TRANSFORMS: readonly TransformPlugin[] = [renameFields, filterRows, trimValues];
