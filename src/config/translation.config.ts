// src/config/translation.config.ts
import { AppConfig, TranslationRateLimitStruct } from './types';

export class TranslationConfig {
    public readonly enabled: boolean;
    public readonly targetLanguage: string;
    public readonly apiKey: string | undefined;
    public readonly modelName: string;
    public readonly rateLimitPoints: number;
    public readonly rateLimitDurationSeconds: number;
    public readonly minDelayMs: number;

    constructor(appConfig: AppConfig) {
        this.apiKey = appConfig.GEMINI_API_KEY?.trim() || undefined;
        // Without a key there is nothing to call; records are written untranslated.
        this.enabled = appConfig.TRANSLATION_ENABLED && this.apiKey !== undefined;
        this.targetLanguage = appConfig.TRANSLATION_TARGET_LANGUAGE;
        this.modelName = appConfig.GEMINI_TRANSLATION_MODEL;
        this.rateLimitPoints = appConfig.TRANSLATION_RATE_LIMIT_POINTS;
        this.rateLimitDurationSeconds = appConfig.TRANSLATION_RATE_LIMIT_DURATION_S;
        this.minDelayMs = appConfig.TRANSLATION_MIN_DELAY_MS;
    }

    public get rateLimit(): TranslationRateLimitStruct {
        return {
            points: this.rateLimitPoints,
            durationSeconds: this.rateLimitDurationSeconds,
            minDelayMs: this.minDelayMs,
        };
    }
}
