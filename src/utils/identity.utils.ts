// src/utils/identity.utils.ts
import crypto from 'crypto';
import { SpecialIssueRecord } from '../types/specialIssue.types';
import { collapseWhitespace } from './text.utils';

const normalizeKeyPart = (value: string): string => collapseWhitespace(value).toLowerCase();

/**
 * Identity of a special issue inside a journal: the detail URL when there is one,
 * otherwise a hash of the normalized title and deadline.
 */
export const recordIdentityKey = (
    journalName: string,
    record: Pick<SpecialIssueRecord, 'title' | 'deadline' | 'detailUrl'>
): string => {
    const journalPart = normalizeKeyPart(journalName);
    if (record.detailUrl) {
        return `${journalPart}|url|${record.detailUrl}`;
    }
    const digest = crypto
        .createHash('sha1')
        .update(`${normalizeKeyPart(record.title)}|${normalizeKeyPart(record.deadline)}`)
        .digest('hex');
    return `${journalPart}|sha1|${digest}`;
};
