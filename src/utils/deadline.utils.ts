// src/utils/deadline.utils.ts
import { format, isValid, parse } from 'date-fns';
import { collapseWhitespace } from './text.utils';

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';

// Tried in order; the first full match wins.
const DEADLINE_FORMATS = [
    'yyyy-MM-dd',
    'd MMMM yyyy',
    'd MMM yyyy',
    'MMMM d, yyyy',
    'MMM d, yyyy',
    'MMMM d yyyy',
    'dd/MM/yyyy',
    'd.M.yyyy',
];

// Substrings that look like a date inside a longer sentence.
const DATE_CANDIDATE_PATTERNS = [
    /\d{4}-\d{2}-\d{2}/,
    /\d{1,2}\s+[A-Za-z]{3,}\s+\d{4}/,
    /[A-Za-z]{3,}\s+\d{1,2},?\s+\d{4}/,
    /\d{1,2}[/.]\d{1,2}[/.]\d{4}/,
];

const PLACEHOLDER_DEADLINES = new Set(['check link', 'unknown', 'see website', 'n/a', 'tbd', 'tba']);

const MIN_YEAR = 1900;
const MAX_YEAR = 2200;

// A fixed reference keeps parsing independent of the current day.
const REFERENCE_DATE = new Date(2000, 0, 1);

const isIsoDate = (text: string): boolean => /^\d{4}-\d{2}-\d{2}$/.test(text);

const stripLabel = (text: string): string =>
    text
        .replace(/^(?:[a-z ]*?)(?:deadline|due date|due)(?:[a-z ]*?)\s*:\s*/i, '')
        .replace(/^(?:submission deadline|deadline)\s+/i, '');

const cleanDateText = (text: string): string =>
    text
        .replace(/(\d{1,2})(?:st|nd|rd|th)\b/gi, '$1')
        .replace(/\b([A-Za-z]{3,})\./g, '$1')
        .replace(/\s*,\s*/g, ', ')
        .trim();

const parseWithFormats = (text: string): Date | undefined => {
    for (const dateFormat of DEADLINE_FORMATS) {
        const parsed = parse(text, dateFormat, REFERENCE_DATE);
        if (isValid(parsed) && parsed.getFullYear() >= MIN_YEAR && parsed.getFullYear() <= MAX_YEAR) {
            return parsed;
        }
    }
    return undefined;
};

/**
 * Normalizes a scraped deadline to `yyyy-MM-dd`.
 *
 * Labels ("Submission deadline:") and ordinal suffixes are stripped first.
 * Text that cannot be read as a date is returned verbatim (trimmed), never
 * replaced by a guessed date. Empty input and placeholders such as
 * "Check Link" yield ''.
 */
export const normalizeDeadline = (raw: string | undefined | null): string => {
    const text = collapseWhitespace(raw);
    if (!text) return '';

    const unlabeled = stripLabel(text);
    if (!unlabeled || PLACEHOLDER_DEADLINES.has(unlabeled.toLowerCase())) return '';

    const cleaned = cleanDateText(unlabeled);
    const direct = parseWithFormats(cleaned);
    if (direct) return format(direct, ISO_DATE_FORMAT);

    for (const pattern of DATE_CANDIDATE_PATTERNS) {
        const match = pattern.exec(cleaned);
        if (!match) continue;
        const parsed = parseWithFormats(cleanDateText(match[0]));
        if (parsed) return format(parsed, ISO_DATE_FORMAT);
    }

    return unlabeled;
};

/**
 * True when `deadline` is an ISO date strictly before the calendar date of `now`.
 * Opaque (unparsed) deadlines are never considered expired.
 */
export const isDeadlineExpired = (deadline: string, now: Date): boolean => {
    if (!isIsoDate(deadline)) return false;
    return deadline < format(now, ISO_DATE_FORMAT);
};

export { isIsoDate };
