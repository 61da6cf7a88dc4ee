// src/utils/text.utils.ts

/** Collapses runs of whitespace (non-breaking spaces included) and trims. */
export const collapseWhitespace = (text: string | undefined | null): string =>
    (text ?? '').replace(/\s+/g, ' ').trim();

/**
 * Trims every paragraph and joins the non-empty ones with a blank line.
 */
export const joinParagraphs = (paragraphs: string[]): string =>
    paragraphs.map(p => collapseWhitespace(p)).filter(p => p.length > 0).join('\n\n');

/**
 * Resolves `href` against `baseUrl` and drops the fragment.
 * Returns undefined for empty, `javascript:`/`mailto:` or malformed links.
 */
export const resolveUrl = (href: string | undefined, baseUrl: string): string | undefined => {
    const trimmed = collapseWhitespace(href);
    if (!trimmed || /^(javascript|mailto|tel):/i.test(trimmed) || trimmed.startsWith('#')) {
        return undefined;
    }
    try {
        const resolved = new URL(trimmed, baseUrl);
        resolved.hash = '';
        return resolved.toString();
    } catch {
        return undefined;
    }
};

// Words that start the affiliation part of an editor line.
const AFFILIATION_MARKERS = [
    'department', 'university', 'school', 'institute', 'center', 'centre',
    'college', 'faculty', 'lead', 'principal', 'chair', 'lecturer', 'reader',
    'email', ' at ', ' of ', 'head', 'affiliation', 'areas', 'expertise', 'interests',
];

/**
 * Reduces an editor line ("Dr. Jane Doe, Department of X, University of Y")
 * to the person's name ("Jane Doe"). Returns '' when the line starts with an
 * affiliation rather than a name.
 */
export const extractPureName = (line: string): string => {
    let text = collapseWhitespace(line.replace(/&nbsp;/g, ' '));

    for (const marker of AFFILIATION_MARKERS) {
        const idx = text.toLowerCase().indexOf(marker);
        if (idx !== -1) {
            if (idx < 3) return '';
            text = text.substring(0, idx);
        }
    }

    if (text.includes(',')) {
        text = text.split(',')[0];
    }

    text = text
        .replace(/\b(Dr|Prof|Professor|Associate|Assistant)\b\.?/gi, '')
        .replace(/\s+(Professor|Prof|Lecturer|Reader|Chair)\b/gi, '')
        .replace(/[\w.-]+@[\w.-]+\.\w+/g, '');

    return collapseWhitespace(text).replace(/^[\s,.:-]+|[\s,.:-]+$/g, '');
};

/**
 * Short lines that only repeat a deadline or a date are page metadata, not description.
 */
export const isMetadataLine = (text: string): boolean => {
    const lower = text.toLowerCase();
    if (lower.includes('submission deadline') && text.length < 100) return true;
    return text.length < 30 && /\d{1,2}\s+[A-Za-z]+\s+\d{4}/.test(text);
};

/** Keeps the first occurrence of each value, in order. */
export const uniqueValues = (values: string[]): string[] => Array.from(new Set(values));
