// src/services/translation/geminiTranslation.provider.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { GoogleGenAI, ApiError } from '@google/genai';
import { Logger } from 'pino';
import { ConfigService } from '../../config/config.service';
import { LoggingService } from '../logging.service';
import { ITranslationProvider } from './translationProvider';
import { TranslationError } from '../../types/errors';
import { getErrorMessageAndStack } from '../../utils/errorUtils';

const MARKDOWN_FENCE = /^```[a-z]*\s*\n?([\s\S]*?)\n?```$/i;

/**
 * English name of a BCP 47 language tag ("zh-CN" → "Chinese (China)").
 * @throws TranslationError for a malformed tag.
 */
export const describeLanguage = (targetLanguage: string): string => {
    try {
        return new Intl.DisplayNames(['en'], { type: 'language' }).of(targetLanguage) ?? targetLanguage;
    } catch (error: unknown) {
        const { message } = getErrorMessageAndStack(error);
        throw new TranslationError(`Unsupported target language "${targetLanguage}": ${message}`, { targetLanguage });
    }
};

export const buildTranslationPrompt = (text: string, targetLanguage: string): string =>
    [
        `Translate the following text from an academic call for papers into ${describeLanguage(targetLanguage)} (${targetLanguage}).`,
        'Keep proper nouns, acronyms and journal names as they are.',
        'Reply with the translation only, without quotes, notes or formatting.',
        '',
        text,
    ].join('\n');

/**
 * Removes a markdown code fence the model sometimes wraps its reply in.
 */
export const cleanModelReply = (reply: string): string => {
    const trimmed = reply.trim();
    const fenced = MARKDOWN_FENCE.exec(trimmed);
    return (fenced ? fenced[1] : trimmed).trim();
};

@singleton()
export class GeminiTranslationProvider implements ITranslationProvider {
    public readonly name = 'gemini';
    private readonly serviceLogger: Logger;
    private readonly apiKey: string | undefined;
    private readonly modelName: string;
    private client: GoogleGenAI | null = null;

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
    ) {
        this.serviceLogger = loggingService.getLogger({ service: 'GeminiTranslationProvider' });
        this.apiKey = configService.translationConfig.apiKey;
        this.modelName = configService.translationConfig.modelName;
    }

    public get enabled(): boolean {
        return this.apiKey !== undefined;
    }

    private getClient(): GoogleGenAI {
        if (!this.apiKey) {
            throw new TranslationError('GEMINI_API_KEY is not configured.', { provider: this.name });
        }
        if (!this.client) {
            this.client = new GoogleGenAI({ apiKey: this.apiKey });
            this.serviceLogger.info({ event: 'gemini_client_created', model: this.modelName }, 'Gemini client created.');
        }
        return this.client;
    }

    public async translate(text: string, targetLanguage: string, parentLogger: Logger = this.serviceLogger): Promise<string> {
        const logger = parentLogger.child({ function: 'translate', provider: this.name, model: this.modelName });
        const prompt = buildTranslationPrompt(text, targetLanguage);
        const client = this.getClient();

        let reply: string | undefined;
        try {
            const response = await client.models.generateContent({
                model: this.modelName,
                contents: prompt,
                config: { temperature: 0.2 },
            });
            reply = response.text;
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            const status = error instanceof ApiError ? error.status : undefined;
            logger.warn({ event: 'gemini_translate_failed', status, err: { message } }, 'Gemini call failed.');
            throw new TranslationError(
                status === 429 ? 'Gemini rate limit exceeded.' : `Gemini call failed: ${message}`,
                { provider: this.name, status, targetLanguage },
            );
        }

        const translated = cleanModelReply(reply ?? '');
        if (!translated) {
            throw new TranslationError('Gemini returned an empty translation.', { provider: this.name, targetLanguage });
        }
        logger.debug({ event: 'gemini_translate_success', inputLength: text.length, outputLength: translated.length });
        return translated;
    }
}
