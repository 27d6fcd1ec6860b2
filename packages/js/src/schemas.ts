/**
 * Runtime validation schemas using Zod.
 */

import { z } from 'zod';
import { isAbsoluteIri } from './terms.js';

// ── Primitives & Helpers ──────────────────────────────────────────

const IriSchema = z.string().refine(isAbsoluteIri, { message: 'Expected an absolute IRI' });
const AttributeNameSchema = z.string().regex(/^\w+$/, 'Attribute names may only contain word characters');
const LanguageTagSchema = z.string().regex(/^[A-Za-z]{1,8}(-[A-Za-z0-9]{1,8})*$/, 'Invalid language tag');

// ── Model Definitions ─────────────────────────────────────────────

export const PropertyDefinitionSchema = z.object({
    predicate: IriSchema,
    kind: z.enum(['literal', 'reference']).optional(),
    datatype: IriSchema.optional(),
    lang: LanguageTagSchema.optional(),
}).refine((data) => !(data.datatype && data.lang), {
    message: 'A property cannot have both a datatype and a language tag',
}).refine((data) => data.kind !== 'reference' || (!data.datatype && !data.lang), {
    message: 'Reference properties take neither a datatype nor a language tag',
});

export const EmbeddedDefinitionSchema = z.object({
    predicate: IriSchema,
    properties: z.record(AttributeNameSchema, PropertyDefinitionSchema),
});

export const ModelDefinitionSchema = z.object({
    name: z.string().min(1),
    types: z.array(IriSchema).optional(),
    properties: z.record(AttributeNameSchema, PropertyDefinitionSchema).optional(),
    embedded: z.record(AttributeNameSchema, EmbeddedDefinitionSchema).optional(),
    headerMap: z.record(z.string().min(1), z.string().min(1)),
});

// ── Import Options ────────────────────────────────────────────────

export const ImportOptionsSchema = z.object({
    model: z.string().min(1),
    limit: z.number().int().positive().optional(),
    delimiter: z.string().length(1).optional(),
});

export type ImportOptionsInput = z.infer<typeof ImportOptionsSchema>;

// ── Validation Helper ─────────────────────────────────────────────

/**
 * Validates data against a Zod schema.
 * Throws a ZodError if validation fails.
 */
export function validate<T>(schema: z.ZodType<T>, data: unknown): T {
    return schema.parse(data);
}

/** Flatten zod issues into one line: `path: message; path: message`. */
export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
