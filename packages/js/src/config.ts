/**
 * Environment-driven configuration.
 */

import { z } from 'zod';
import { ConfigSchema, validate } from './schemas.js';

export type OwlBoxConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: OwlBoxConfig = validate(ConfigSchema, {});

/**
 * Read configuration from environment variables:
 * `LOG_LEVEL`, `LOG_FORMAT` and `OWLBOX_IRI_BASE`.
 * Unset variables fall back to {@link DEFAULT_CONFIG}.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OwlBoxConfig {
    return validate(ConfigSchema, {
        logLevel: env.LOG_LEVEL || undefined,
        logFormat: env.LOG_FORMAT || undefined,
        iriBase: env.OWLBOX_IRI_BASE || undefined,
    });
}
