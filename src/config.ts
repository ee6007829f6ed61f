import { z } from 'zod';
import { ConfigurationError } from './errors';
import { logger, LogLevel } from './utils/Logger';

/**
 * Option schemas for everything in bitframe that takes a configuration
 * object. Options are validated once, at construction, and normalized with
 * their defaults filled in.
 */

export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;

const int32 = z.number().int().min(INT32_MIN).max(INT32_MAX);

export const RangeBoundsSchema = z
    .object({
        lowerBound: int32.default(INT32_MIN),
        upperBound: int32.default(INT32_MAX),
    })
    .refine((b) => b.lowerBound <= b.upperBound, {
        message: 'lowerBound must not exceed upperBound',
        path: ['lowerBound'],
    });

export const ArrayOptionsSchema = z
    .object({
        minCount: z.number().int().min(0).max(INT32_MAX).default(0),
        maxCount: z.number().int().min(0).max(INT32_MAX).default(65535),
    })
    .refine((o) => o.minCount <= o.maxCount, {
        message: 'minCount must not exceed maxCount',
        path: ['minCount'],
    });

export const BitStreamConfigSchema = z
    .object({
        /** Initial buffer size in bytes. */
        initialCapacity: z.number().int().positive().default(64),
        /** Hard ceiling on buffer growth, in bytes. */
        maxCapacity: z.number().int().positive().default(65536),
    })
    .refine((c) => c.initialCapacity <= c.maxCapacity, {
        message: 'initialCapacity must not exceed maxCapacity',
        path: ['initialCapacity'],
    });

export const LibraryConfigSchema = z.object({
    logLevel: z.nativeEnum(LogLevel).optional(),
    jsonLogs: z.boolean().optional(),
});

export type RangeBounds = z.output<typeof RangeBoundsSchema>;
export type ArrayOptions = z.input<typeof ArrayOptionsSchema>;
export type ResolvedArrayOptions = z.output<typeof ArrayOptionsSchema>;
export type BitStreamConfig = z.input<typeof BitStreamConfigSchema>;
export type ResolvedBitStreamConfig = z.output<typeof BitStreamConfigSchema>;
export type LibraryConfig = z.input<typeof LibraryConfigSchema>;

/**
 * Parses `input` against `schema`, turning validation failures into a
 * {@link ConfigurationError} that names every offending path.
 */
export function parseOptions<S extends z.ZodTypeAny>(
    schema: S,
    input: unknown,
    what: string
): z.output<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const errorMessages = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid ${what}: ${errorMessages}`);
    }
    return result.data;
}

/**
 * Applies library-wide settings to the shared logger.
 *
 * @example
 * ```typescript
 * configure({ logLevel: LogLevel.DEBUG, jsonLogs: true });
 * ```
 */
export function configure(config: LibraryConfig): void {
    const parsed = parseOptions(LibraryConfigSchema, config, 'library config');
    if (parsed.logLevel !== undefined) {
        logger.setLogLevel(parsed.logLevel);
    }
    if (parsed.jsonLogs !== undefined) {
        logger.setJson(parsed.jsonLogs);
    }
}
