// src/types/specialIssue.types.ts

/**
 * A journal whose call-for-papers page is tracked.
 * `siteType` selects the parsing strategy for the page's template family.
 */
export interface Journal {
    name: string;
    url: string;
    siteType: string;
}

/**
 * Raw special-issue block as extracted by a site parser.
 * Every field is optional: the normalizer decides what is usable.
 */
export interface RawIssueFragment {
    title?: string;
    deadline?: string;
    guestEditors?: string;
    description?: string;
    detailUrl?: string;
}

export interface SpecialIssueRecord {
    title: string;
    /** ISO `yyyy-MM-dd` when parseable, otherwise the original text. Empty when unknown. */
    deadline: string;
    guestEditors: string;
    description: string;
    /** Absolute URL of the special issue page. Empty when the listing had none. */
    detailUrl: string;
    translatedTitle: string;
    translatedDescription: string;
}

export interface JournalSnapshot {
    name: string;
    url: string;
    specialIssues: SpecialIssueRecord[];
}

export interface DataStore {
    lastUpdated: string;
    journals: JournalSnapshot[];
}

export type ExpiredIssuePolicy = 'retain' | 'drop';

// --- Pipeline state ---

export type JournalStage = 'PENDING' | 'FETCHED' | 'PARSED' | 'NORMALIZED' | 'TRANSLATED' | 'MERGED';

export type FailableStage = Exclude<JournalStage, 'MERGED'>;

export type JournalState =
    | { status: JournalStage }
    | { status: 'FAILED'; stage: FailableStage; reason: string; errorName: string };

export interface MergeStats {
    added: number;
    updated: number;
    retained: number;
    expired: number;
}

export interface JournalOutcome {
    journal: string;
    siteType: string;
    state: JournalState;
    fragmentCount: number;
    droppedCount: number;
    recordCount: number;
    translatedCount: number;
    merge?: MergeStats;
    durationMs: number;
}

export interface RunReport {
    startedAt: string;
    finishedAt: string;
    outcomes: JournalOutcome[];
    failedJournals: string[];
    droppedCount: number;
}
