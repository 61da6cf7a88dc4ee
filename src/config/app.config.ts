// src/config/app.config.ts
import path from 'path';
import { LevelWithSilent } from 'pino';
import { AppConfig } from './types';

export class AppConfiguration {
    public readonly nodeEnv: 'development' | 'production' | 'test';

    public readonly logLevel: LevelWithSilent;
    public readonly logsDirectoryPath: string;
    public readonly appLogFileName: string;
    public readonly logToConsole: boolean;
    public readonly logToFile: boolean;

    public readonly dataFilePath: string;

    public readonly scrapeCronSchedule: string;
    public readonly cronTimezone: string;

    constructor(appConfig: AppConfig) {
        this.nodeEnv = appConfig.NODE_ENV;

        this.logLevel = appConfig.LOG_LEVEL;
        this.logsDirectoryPath = path.resolve(appConfig.LOGS_DIRECTORY);
        this.appLogFileName = appConfig.APP_LOG_FILE_NAME;
        this.logToConsole = appConfig.LOG_TO_CONSOLE;
        this.logToFile = appConfig.LOG_TO_FILE;

        this.dataFilePath = path.resolve(appConfig.DATA_FILE_PATH);

        this.scrapeCronSchedule = appConfig.SCRAPE_CRON_SCHEDULE;
        this.cronTimezone = appConfig.CRON_TIMEZONE;
    }

    public get appLogFilePath(): string {
        return path.join(this.logsDirectoryPath, this.appLogFileName);
    }
}
