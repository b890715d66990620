/**
 * env.ts
 * Runtime configuration from process.env (and .env when present).
 */

import 'dotenv/config';
import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const EnvSchema = z.object({
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    /** Upper bound on CSV text accepted by the HTTP handler */
    MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parse an env record. Invalid values throw with every issue listed.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
    const parsed = EnvSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid environment: ${issues}`);
    }
    return parsed.data;
}

export const env = loadEnv();
