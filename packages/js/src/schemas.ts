/**
 * Runtime validation schemas using Zod.
 */

import { z } from 'zod';

// ── Primitives & Helpers ──────────────────────────────────────────

/** `prefix:identifier`, split on the first colon. */
export const CurieSchema = z.string().regex(
    /^[A-Za-z_][A-Za-z0-9_.-]*:\S+$/,
    'Expected a CURIE of the form prefix:identifier',
);

export const IriSchema = z.string().url();

export const LanguageTagSchema = z.string().regex(/^[A-Za-z]{1,8}(-[A-Za-z0-9]{1,8})*$/, 'Invalid language tag');

export const CardinalitySchema = z.number().int().nonnegative();

// ── Prefix maps ───────────────────────────────────────────────────

export const PrefixSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, 'Invalid CURIE prefix');

export const PrefixMapSchema = z.record(PrefixSchema, z.string().min(1));

// ── Configuration ─────────────────────────────────────────────────

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);

export const LogFormatSchema = z.enum(['json', 'pretty']);

export const ConfigSchema = z.object({
    logLevel: LogLevelSchema.default('warn'),
    logFormat: LogFormatSchema.default('json'),
    iriBase: IriSchema.default('https://w3id.org/biopragmatics/resources'),
});

// ── Ontology metadata ─────────────────────────────────────────────

export const OntologyHeaderSchema = z.object({
    iri: IriSchema.optional(),
    versionIri: IriSchema.optional(),
    imports: z.array(IriSchema).default([]),
});

export const OboOntologyMetadataSchema = z.object({
    ontology: PrefixSchema,
    dataVersion: z.string().min(1).regex(/^\S+$/, 'Data versions may not contain whitespace').optional(),
    idspaces: PrefixMapSchema.default({}),
});

// ── Validation Helper ─────────────────────────────────────────────

/**
 * Validates data against a Zod schema.
 * Throws a ZodError if validation fails.
 */
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    return schema.parse(data);
}

/**
 * Safely validates data against a Zod schema.
 * Returns a SafeParseReturnType.
 */
export function safeValidate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown) {
    return schema.safeParse(data);
}
