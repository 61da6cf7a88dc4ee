// src/services/snapshotMerge.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { ConfigService } from '../config/config.service';
import { ExpiredIssuePolicy, MergeStats, SpecialIssueRecord } from '../types/specialIssue.types';
import { recordIdentityKey } from '../utils/identity.utils';
import { isDeadlineExpired } from '../utils/deadline.utils';

export interface MergeOptions {
    now: Date;
    expiredIssuePolicy: ExpiredIssuePolicy;
}

export interface MergeResult {
    records: SpecialIssueRecord[];
    stats: MergeStats;
}

type Origin = 'added' | 'updated' | 'unchanged' | 'retained';

const sameContent = (a: SpecialIssueRecord, b: SpecialIssueRecord): boolean =>
    a.title === b.title
    && a.deadline === b.deadline
    && a.guestEditors === b.guestEditors
    && a.description === b.description
    && a.detailUrl === b.detailUrl;

const withRetainedTranslation = (fresh: SpecialIssueRecord, previous: SpecialIssueRecord): SpecialIssueRecord => {
    const freshUntranslated = !fresh.translatedTitle && !fresh.translatedDescription;
    const sourceUnchanged = fresh.title === previous.title && fresh.description === previous.description;
    if (freshUntranslated && sourceUnchanged) {
        return { ...fresh, translatedTitle: previous.translatedTitle, translatedDescription: previous.translatedDescription };
    }
    return fresh;
};

/**
 * Folds freshly scraped records of one journal into its previous records.
 *
 * Fresh records come first in scrape order, followed by records only the
 * previous snapshot had, in their previous order. Each identity key appears
 * once; on a collision the fresh fields win, except that an existing
 * translation survives when the fresh record has none and its title and
 * description did not change.
 */
export const mergeSnapshot = (
    journalName: string,
    previous: SpecialIssueRecord[],
    fresh: SpecialIssueRecord[],
    options: MergeOptions
): MergeResult => {
    const stats: MergeStats = { added: 0, updated: 0, retained: 0, expired: 0 };

    const previousByKey = new Map<string, SpecialIssueRecord>();
    for (const record of previous) {
        const key = recordIdentityKey(journalName, record);
        if (!previousByKey.has(key)) previousByKey.set(key, record);
    }

    const merged = new Map<string, { record: SpecialIssueRecord; origin: Origin }>();
    for (const record of fresh) {
        const key = recordIdentityKey(journalName, record);
        if (merged.has(key)) continue;

        const old = previousByKey.get(key);
        if (!old) {
            merged.set(key, { record, origin: 'added' });
            continue;
        }
        const next = withRetainedTranslation(record, old);
        merged.set(key, { record: next, origin: sameContent(next, old) ? 'unchanged' : 'updated' });
    }

    for (const [key, record] of previousByKey) {
        if (!merged.has(key)) merged.set(key, { record, origin: 'retained' });
    }

    const records: SpecialIssueRecord[] = [];
    for (const { record, origin } of merged.values()) {
        if (options.expiredIssuePolicy === 'drop' && isDeadlineExpired(record.deadline, options.now)) {
            stats.expired++;
            continue;
        }
        if (origin !== 'unchanged') stats[origin]++;
        records.push(record);
    }

    return { records, stats };
};

@singleton()
export class SnapshotMergeService {
    private readonly expiredIssuePolicy: ExpiredIssuePolicy;

    constructor(@inject(ConfigService) configService: ConfigService) {
        this.expiredIssuePolicy = configService.scraperConfig.expiredIssuePolicy;
    }

    public merge(journalName: string, previous: SpecialIssueRecord[], fresh: SpecialIssueRecord[], now: Date): MergeResult {
        return mergeSnapshot(journalName, previous, fresh, { now, expiredIssuePolicy: this.expiredIssuePolicy });
    }
}
