// src/container.ts
import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';

import { ConfigService } from './config/config.service';
import { LoggingService } from './services/logging.service';
import { IPageFetcher, PageFetcherService } from './services/pageFetcher.service';
import { ITranslationProvider } from './services/translation/translationProvider';
import { GeminiTranslationProvider } from './services/translation/geminiTranslation.provider';
import { DisabledTranslationProvider } from './services/translation/disabledTranslation.provider';

/**
 * Registers the configuration and the interface tokens. Concrete `@singleton()`
 * services resolve themselves.
 * @throws ConfigurationError when the environment is invalid.
 */
export const configureContainer = (configService: ConfigService = ConfigService.fromProcessEnv()): void => {
    container.register(ConfigService, { useValue: configService });
    container.registerSingleton(LoggingService);

    container.registerSingleton<IPageFetcher>('IPageFetcher', PageFetcherService);
    container.register<ITranslationProvider>('ITranslationProvider', {
        useFactory: instanceCachingFactory<ITranslationProvider>(c =>
            c.resolve(ConfigService).translationConfig.enabled
                ? c.resolve(GeminiTranslationProvider)
                : c.resolve(DisabledTranslationProvider)
        ),
    });
};

export { container };
