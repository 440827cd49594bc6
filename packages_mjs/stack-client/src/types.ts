/**
 * Wire schemas and decoded models for the stack service.
 */
import { z } from 'zod';

export type OtherValueType = 'number' | 'boolean' | 'object' | 'array' | 'null';

/**
 * Output values are dynamically typed on the wire. Only strings are
 * converted for callers; everything else is kept as `other` with its tag.
 */
export type OutputValue =
    | { kind: 'string'; value: string }
    | { kind: 'other'; type: OtherValueType; raw: unknown };

export interface Output {
    value: OutputValue;
    deprecated: string;
    warning: string;
    sensitive: boolean;
}

export type Outputs = Record<string, Output>;

export interface StackReference {
    id: string;
    url: string;
    lastUsedAt: Date;
}

export interface Stack {
    id: string;
    name: string;
    url: string;
    usedBy: StackReference[];
}

export function classifyValue(value: unknown): OutputValue {
    if (typeof value === 'string') {
        return { kind: 'string', value };
    }
    if (value === null || value === undefined) {
        return { kind: 'other', type: 'null', raw: null };
    }
    if (Array.isArray(value)) {
        return { kind: 'other', type: 'array', raw: value };
    }
    switch (typeof value) {
        case 'number':
            return { kind: 'other', type: 'number', raw: value };
        case 'boolean':
            return { kind: 'other', type: 'boolean', raw: value };
        default:
            return { kind: 'other', type: 'object', raw: value };
    }
}

// The service sends null for unset advisory fields.
const advisory = z
    .string()
    .nullish()
    .transform((v) => v ?? '');

export const OutputSchema = z
    .object({
        value: z.unknown(),
        deprecated: advisory,
        warning: advisory,
        sensitive: z
            .boolean()
            .nullish()
            .transform((v) => v ?? false),
    })
    .transform(
        (raw): Output => ({
            value: classifyValue(raw.value),
            deprecated: raw.deprecated,
            warning: raw.warning,
            sensitive: raw.sensitive,
        })
    );

function isPlainRecord(data: unknown): data is Record<string, unknown> {
    return typeof data === 'object' && data !== null && !Array.isArray(data);
}

/**
 * Outputs keyed by name. Entries are decoded one by one and collected with
 * `Object.fromEntries`, so keys such as `__proto__` stay own properties.
 */
export const OutputsSchema = z
    .custom<Record<string, unknown>>(isPlainRecord, { message: 'expected an object of outputs' })
    .transform((data, ctx): Outputs => {
        const entries: Array<[string, Output]> = [];
        for (const [key, raw] of Object.entries(data)) {
            const parsed = OutputSchema.safeParse(raw);
            if (!parsed.success) {
                for (const issue of parsed.error.issues) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        path: [key, ...issue.path],
                        message: issue.message,
                    });
                }
                continue;
            }
            entries.push([key, parsed.data]);
        }
        return Object.fromEntries(entries);
    });

export const StackReferenceSchema = z
    .object({
        id: z.string(),
        url: z.string(),
        last_used_at: z.string().datetime({ offset: true }),
    })
    .transform(
        (raw): StackReference => ({
            id: raw.id,
            url: raw.url,
            lastUsedAt: new Date(raw.last_used_at),
        })
    );

export const StackSchema = z
    .object({
        id: z.string(),
        name: z.string(),
        url: z.string(),
        used_by: z.array(StackReferenceSchema).default([]),
    })
    .transform(
        (raw): Stack => ({
            id: raw.id,
            name: raw.name,
            url: raw.url,
            usedBy: raw.used_by,
        })
    );
