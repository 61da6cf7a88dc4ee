// src/services/translation/translationProvider.ts
import { Logger } from 'pino';

/**
 * A machine translation backend.
 */
export interface ITranslationProvider {
    readonly name: string;
    /** False when the provider cannot be called (no key, turned off). */
    readonly enabled: boolean;
    /**
     * @throws TranslationError when the backend fails or returns nothing.
     */
    translate(text: string, targetLanguage: string, parentLogger: Logger): Promise<string>;
}
