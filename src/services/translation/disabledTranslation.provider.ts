// src/services/translation/disabledTranslation.provider.ts
import 'reflect-metadata';
import { singleton } from 'tsyringe';
import { Logger } from 'pino';
import { ITranslationProvider } from './translationProvider';
import { TranslationError } from '../../types/errors';

/**
 * Stand-in used when translation is turned off or no API key is configured.
 */
@singleton()
export class DisabledTranslationProvider implements ITranslationProvider {
    public readonly name = 'disabled';
    public readonly enabled = false;

    public async translate(_text: string, targetLanguage: string, _parentLogger: Logger): Promise<string> {
        throw new TranslationError('Translation is disabled.', { provider: this.name, targetLanguage });
    }
}
