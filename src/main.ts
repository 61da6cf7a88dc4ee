#!/usr/bin/env node
// src/main.ts
import 'reflect-metadata';
import fs from 'fs';
import { Logger } from 'pino';
import { configureContainer, container } from './container';
import { ConfigService } from './config/config.service';
import { LoggingService } from './services/logging.service';
import { PipelineOrchestratorService } from './services/pipelineOrchestrator.service';
import { RecordNormalizerService } from './services/recordNormalizer.service';
import { ParserRegistry } from './parsers/parserRegistry';
import { scheduleScrapeJob } from './jobs/scrapeSpecialIssues.job';
import { ConfigurationError, PipelineError } from './types/errors';
import { getErrorMessageAndStack } from './utils/errorUtils';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

const USAGE = [
    'Usage:',
    '  main run                                    Scrape all configured journals once and write the data file.',
    '  main schedule                               Run on SCRAPE_CRON_SCHEDULE until stopped.',
    '  main parse-local <file> <siteType> [baseUrl] Parse a saved listing page and print the records.',
].join('\n');

let logger: Logger | undefined;
let loggingService: LoggingService | undefined;

async function runOnce(): Promise<number> {
    const orchestrator = container.resolve(PipelineOrchestratorService);
    const report = await orchestrator.run();
    if (report.failedJournals.length > 0) {
        logger?.warn({ event: 'run_partial', failedJournals: report.failedJournals }, 'Data file written; some journals kept their previous data.');
    }
    return EXIT_OK;
}

function schedule(): Promise<number> {
    const task = scheduleScrapeJob();
    const stop = (signal: string) => {
        logger?.info({ event: 'shutdown', signal }, 'Stopping scheduler...');
        task.stop();
        loggingService?.flush();
        process.exit(EXIT_OK);
    };
    process.once('SIGINT', () => stop('SIGINT'));
    process.once('SIGTERM', () => stop('SIGTERM'));

    // Keeps running until a signal arrives.
    return new Promise<number>(() => undefined);
}

function parseLocal(args: string[]): number {
    const [file, siteType, baseUrl = 'https://www.sciencedirect.com/'] = args;
    if (!file || !siteType) {
        console.error(USAGE);
        return EXIT_USAGE;
    }
    const html = fs.readFileSync(file, 'utf8');
    const fragments = container.resolve(ParserRegistry).parse(siteType, html, baseUrl);
    const { records, dropped } = container.resolve(RecordNormalizerService).normalizeAll(fragments, baseUrl, logger);
    process.stdout.write(`${JSON.stringify({ records, droppedCount: dropped.length }, null, 2)}\n`);
    return EXIT_OK;
}

async function main(argv: string[]): Promise<number> {
    const [command = 'run', ...rest] = argv;
    if (!['run', 'schedule', 'parse-local'].includes(command)) {
        console.error(`Unknown command "${command}".\n${USAGE}`);
        return EXIT_USAGE;
    }

    try {
        configureContainer();
        loggingService = container.resolve(LoggingService);
        logger = loggingService.getLogger({ service: 'main' });
        logger.info({ event: 'startup', command, config: container.resolve(ConfigService).describe() }, 'Special issue tracker starting.');

        switch (command) {
            case 'schedule':
                return await schedule();
            case 'parse-local':
                return parseLocal(rest);
            default:
                return await runOnce();
        }
    } catch (error: unknown) {
        const { message, stack } = getErrorMessageAndStack(error);
        const details = error instanceof PipelineError ? error.details : undefined;
        if (logger) {
            logger.fatal({ event: 'fatal_error', errorName: error instanceof Error ? error.name : undefined, details, err: { message, stack } }, message);
        } else {
            console.error(`FATAL${error instanceof ConfigurationError ? ' (configuration)' : ''}: ${message}`, details ?? '');
        }
        return EXIT_FATAL;
    }
}

if (require.main === module) {
    main(process.argv.slice(2))
        .then(code => {
            loggingService?.flush();
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error('FATAL: unhandled error', error);
            process.exitCode = EXIT_FATAL;
        });
}

export { main };
