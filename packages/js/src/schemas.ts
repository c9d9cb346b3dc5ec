/**
 * Runtime validation schemas using Zod.
 */

import { z } from 'zod';
import type { BlankNodeGenerator } from './blank-node.js';
import { ERROR_CODES } from './errors.js';
import type { Logger } from './logger.js';
import type { DocumentLoader } from './types.js';
import type { JsonValue } from './value.js';

// ── JSON ──────────────────────────────────────────────────────────

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.null(),
        z.boolean(),
        z.number(),
        z.string(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema),
    ]),
);

/** Parses JSON text into a {@link JsonValue}. */
export function parseJson(text: string): JsonValue {
    const parsed: unknown = JSON.parse(text);
    return validate(JsonValueSchema, parsed);
}

// ── Options ───────────────────────────────────────────────────────

export const ProcessingModeSchema = z.enum(['json-ld-1.0', 'json-ld-1.1']);

export const KeyPolicySchema = z.enum(['relaxed', 'standard', 'strict', 'strictest']);

const DocumentLoaderSchema = z.custom<DocumentLoader>(
    (value) => typeof value === 'function',
    { message: 'documentLoader must be a function' },
);

const LoggerSchema = z.custom<Logger>(
    (value) =>
        typeof value === 'object' &&
        value !== null &&
        'debug' in value &&
        'warn' in value &&
        typeof value.debug === 'function' &&
        typeof value.warn === 'function',
    { message: 'logger must provide debug and warn' },
);

const GeneratorSchema = z.custom<BlankNodeGenerator>(
    (value) =>
        typeof value === 'object' &&
        value !== null &&
        'next' in value &&
        'fork' in value &&
        typeof value.next === 'function' &&
        typeof value.fork === 'function',
    { message: 'generator must provide next() and fork()' },
);

export const ResourceLimitsSchema = z.object({
    maxContextDepth: z.number().int().nonnegative().optional(),
    maxGraphDepth: z.number().int().positive().optional(),
    maxDocumentSize: z.number().int().positive().optional(),
    maxExpansionTime: z.number().positive().optional(),
});

export const ContextAllowlistSchema = z.object({
    allowed: z.array(z.string()).optional(),
    patterns: z.array(z.union([z.string(), z.instanceof(RegExp)])).optional(),
    blockRemoteContexts: z.boolean().optional(),
});

export const JsonLdOptionsSchema = z.object({
    base: z.string().nullable().optional(),
    expandContext: JsonValueSchema.optional(),
    processingMode: ProcessingModeSchema.optional(),
    ordered: z.boolean().optional(),
    documentLoader: DocumentLoaderSchema.optional(),
    logger: LoggerSchema.optional(),
    resourceLimits: ResourceLimitsSchema.optional(),
});

export const ExpandOptionsSchema = JsonLdOptionsSchema.extend({
    policy: KeyPolicySchema.optional(),
    generator: GeneratorSchema.optional(),
});

export const CompactOptionsSchema = ExpandOptionsSchema.extend({
    compactArrays: z.boolean().optional(),
    compactToRelative: z.boolean().optional(),
    skipExpansion: z.boolean().optional(),
});

export const ProcessorOptionsSchema = z.object({
    resourceLimits: ResourceLimitsSchema.optional(),
    contextAllowlist: ContextAllowlistSchema.optional(),
    base: z.string().nullable().optional(),
    processingMode: ProcessingModeSchema.optional(),
    documentLoader: DocumentLoaderSchema.optional(),
    logger: LoggerSchema.optional(),
});

// ── Conformance Fixtures ──────────────────────────────────────────

export const FixtureOptionsSchema = z.object({
    base: z.string().optional(),
    expandContext: JsonValueSchema.optional(),
    processingMode: ProcessingModeSchema.optional(),
    ordered: z.boolean().optional(),
    compactArrays: z.boolean().optional(),
});

export const ConformanceFixtureSchema = z
    .object({
        id: z.string().min(1),
        kind: z.enum(['expand', 'compact']),
        input: JsonValueSchema,
        context: JsonValueSchema.optional(),
        expected: JsonValueSchema.optional(),
        expectedError: z.enum(ERROR_CODES).optional(),
        options: FixtureOptionsSchema.default({}),
    })
    .refine((fixture) => (fixture.expected === undefined) !== (fixture.expectedError === undefined), {
        message: 'A fixture declares either expected output or an expected error code',
    })
    .refine((fixture) => fixture.kind !== 'compact' || fixture.context !== undefined, {
        message: 'Compaction fixtures need a context',
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
