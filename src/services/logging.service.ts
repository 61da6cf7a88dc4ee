// src/services/logging.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import pino, { Logger, LoggerOptions, stdTimeFunctions, StreamEntry, DestinationStream } from 'pino';
import pretty from 'pino-pretty';
import fs from 'fs';
import { ConfigService } from '../config/config.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export type LoggerContext = { service?: string; journal?: string; [key: string]: unknown };

@singleton()
export class LoggingService {
    private readonly rootLogger: Logger;
    private fileStream: DestinationStream | null = null;

    constructor(@inject(ConfigService) private configService: ConfigService) {
        const pinoBaseOptions: LoggerOptions = {
            level: this.configService.logLevel,
            timestamp: stdTimeFunctions.isoTime,
            formatters: { level: (label) => ({ level: label }) },
            base: undefined, // no pid/hostname
        };

        const streams = this.createStreams();
        this.rootLogger = streams.length > 0
            ? pino(pinoBaseOptions, pino.multistream(streams))
            : pino({ ...pinoBaseOptions, enabled: false });
    }

    private createStreams(): StreamEntry[] {
        const streams: StreamEntry[] = [];
        const level = this.configService.logLevel;
        if (level === 'silent') {
            return streams;
        }

        if (this.configService.logToConsole) {
            if (!this.configService.isProduction) {
                streams.push({
                    level,
                    stream: pretty({
                        colorize: true, levelFirst: true, translateTime: 'SYS:standard', ignore: 'pid,hostname,service',
                        messageFormat: '{if service}({service}) {end}{msg}',
                    }),
                });
            } else {
                streams.push({ level, stream: process.stdout });
            }
        }

        if (this.configService.logToFile) {
            const logFilePath = this.configService.appLogFilePath;
            try {
                this.ensureDirectory(this.configService.logsDirectory);
                this.fileStream = pino.destination({ dest: logFilePath, mkdir: true, sync: false });
                streams.push({ level, stream: this.fileStream });
            } catch (err) {
                const { message: errMsg } = getErrorMessageAndStack(err);
                // Console logging keeps working; only the file sink is lost.
                console.error(`[LoggingService] Failed to open log file "${logFilePath}": "${errMsg}". File logging disabled.`);
            }
        }
        return streams;
    }

    private ensureDirectory(dirPath: string): void {
        if (!fs.existsSync(dirPath)) {
            fs.mkdirSync(dirPath, { recursive: true });
        }
        fs.accessSync(dirPath, fs.constants.W_OK);
    }

    public getLogger(context?: LoggerContext): Logger {
        return context ? this.rootLogger.child(context) : this.rootLogger;
    }

    /**
     * Flushes the asynchronous file destination. Called before the process exits.
     */
    public flush(): void {
        const stream = this.fileStream;
        if (!stream) return;
        try {
            if ('flushSync' in stream && typeof stream.flushSync === 'function') {
                stream.flushSync();
            }
        } catch (err) {
            const { message } = getErrorMessageAndStack(err);
            console.error(`[LoggingService] Failed to flush log file: "${message}".`);
        }
    }
}
