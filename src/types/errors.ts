// src/types/errors.ts

/**
 * Base class for every error raised by the ingestion pipeline.
 * `details` carries structured context that is logged alongside the message.
 */
export class PipelineError extends Error {
    public readonly details: Record<string, unknown>;

    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message);
        this.name = 'PipelineError';
        this.details = details;
        // Needed for instanceof checks on subclasses of Error.
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Environment or journal list could not be loaded. Fatal. */
export class ConfigurationError extends PipelineError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, details);
        this.name = 'ConfigurationError';
    }
}

/**
 * Network failure, non-2xx status or timeout while fetching a page.
 * Retried by the fetcher, then surfaced as a journal-level failure.
 */
export class FetchError extends PipelineError {
    public readonly url: string;
    public readonly status?: number;

    constructor(message: string, url: string, status?: number, details: Record<string, unknown> = {}) {
        super(message, { ...details, url, status });
        this.name = 'FetchError';
        this.url = url;
        this.status = status;
    }

    /** 4xx responses other than 408/429 will not change on retry. */
    public get isRetryable(): boolean {
        if (this.status === undefined) return true;
        if (this.status === 408 || this.status === 429) return true;
        return this.status < 400 || this.status >= 500;
    }
}

/** No parsing strategy is registered for the journal's site type. */
export class UnsupportedSiteTypeError extends PipelineError {
    public readonly siteType: string;

    constructor(siteType: string, supported: string[]) {
        super(`No parser registered for site type "${siteType}". Supported: ${supported.join(', ')}`, { siteType, supported });
        this.name = 'UnsupportedSiteTypeError';
        this.siteType = siteType;
    }
}

/** The page did not contain the structure the strategy expects (template changed). */
export class ParseError extends PipelineError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, details);
        this.name = 'ParseError';
    }
}

/** A fragment lacks the minimum fields of a record. The fragment is dropped. */
export class NormalizationError extends PipelineError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, details);
        this.name = 'NormalizationError';
    }
}

/** A translation call failed. The translated fields stay empty. */
export class TranslationError extends PipelineError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, details);
        this.name = 'TranslationError';
    }
}

/** The data file could not be read back or written. Fatal. */
export class PersistenceError extends PipelineError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, details);
        this.name = 'PersistenceError';
    }
}
