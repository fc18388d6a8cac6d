import { z } from 'zod';
import { ParameterError } from './errors.js';
import { DEFAULT_EXCLUDE_TAGS, UNUSUAL_DELTA_MINUTES } from './types.js';
import type { CaptureLogger, IndependenceConfig } from './types.js';

export const IndependenceConfigSchema = z.object({
    minDeltaTime: z
        .number({ required_error: 'is required', invalid_type_error: 'must be a number of minutes' })
        .int('must be a whole number of minutes')
        .positive('must be greater than 0')
        .max(Number.MAX_SAFE_INTEGER, 'is too large'),
    policy: z.enum(['LastIndependentRecord', 'LastRecord']).default('LastIndependentRecord'),
    target: z.enum(['species', 'individual']).default('species'),
    noExclude: z.boolean().default(false),
    event: z.boolean().default(false),
    excludeTags: z.array(z.string()).default([...DEFAULT_EXCLUDE_TAGS]),
    deploymentLevel: z
        .number({ invalid_type_error: 'must be a number' })
        .int('must be a whole number')
        .min(1, 'must be 1 or greater')
        .max(Number.MAX_SAFE_INTEGER, 'is too large')
        .default(1),
});

export type IndependenceConfigInput = z.input<typeof IndependenceConfigSchema>;

/**
 * Validate a plain object into an IndependenceConfig.
 * The first failing field is reported as a ParameterError.
 */
export function parseIndependenceConfig(input: unknown): IndependenceConfig {
    const result = IndependenceConfigSchema.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue.path.length > 0 ? issue.path.join('.') : 'config';
        throw new ParameterError(field, issue.message);
    }
    return result.data;
}

/** Accepts either a validated config or raw input; always re-validates. */
export function resolveConfig(input: IndependenceConfig | IndependenceConfigInput, logger?: CaptureLogger | null): IndependenceConfig {
    const config = parseIndependenceConfig(input);
    if (config.minDeltaTime > UNUSUAL_DELTA_MINUTES) {
        logger?.warn?.(`Note: ${config.minDeltaTime} minutes is unusually large (> 1 week)`);
    }
    return config;
}
