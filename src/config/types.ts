// src/config/types.ts
import { z } from 'zod';
import { type envSchema } from './schemas';

/**
 * Validated environment, as produced by `envSchema`.
 */
export type AppConfig = z.infer<typeof envSchema>;

// Specific structured config types for getters
export interface FetchRetryOptionsStruct {
    retries: number;
    minTimeout: number;
    factor: number;
}

export interface TranslationRateLimitStruct {
    points: number;
    durationSeconds: number;
    minDelayMs: number;
}
