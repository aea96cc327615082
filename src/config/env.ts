/**
 * Environment variables. Unknown values fall back to defaults instead of
 * failing the import.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const lowercase = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

export const envSchema = z.object({
    NODE_ENV: z.preprocess(lowercase, z.enum(['development', 'production', 'test'])).catch('development'),
    LOG_LEVEL: z
        .preprocess(lowercase, z.enum(['error', 'warn', 'info', 'debug']).optional())
        .catch(undefined),
    OFFERLENS_CONFIG: z.string().min(1).catch('config/config.json'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
    return envSchema.parse(source);
}

export const env = parseEnv(process.env);
