import {
    collapseWhitespace, extractPureName, isMetadataLine, joinParagraphs, resolveUrl, uniqueValues,
} from './text.utils';

describe('collapseWhitespace', () => {
    it('collapses runs of whitespace including non-breaking spaces', () => {
        expect(collapseWhitespace('  Call for \n\t papers  ')).toBe('Call for papers');
    });

    it('returns an empty string for missing input', () => {
        expect(collapseWhitespace(undefined)).toBe('');
        expect(collapseWhitespace(null)).toBe('');
    });
});

describe('joinParagraphs', () => {
    it('joins non-empty trimmed paragraphs with a blank line', () => {
        expect(joinParagraphs([' First  paragraph ', '', '   ', 'Second'])).toBe('First paragraph\n\nSecond');
    });
});

describe('resolveUrl', () => {
    const base = 'https://www.sciencedirect.com/journal/cities/about/call-for-papers';

    it('resolves relative links against the base URL', () => {
        expect(resolveUrl('/si/x', base)).toBe('https://www.sciencedirect.com/si/x');
        expect(resolveUrl('special-issue/1', base)).toBe('https://www.sciencedirect.com/journal/cities/about/special-issue/1');
    });

    it('drops the fragment', () => {
        expect(resolveUrl('https://example.org/si/1#editors', base)).toBe('https://example.org/si/1');
    });

    it('ignores links that do not lead to a page', () => {
        expect(resolveUrl('#top', base)).toBeUndefined();
        expect(resolveUrl('javascript:void(0)', base)).toBeUndefined();
        expect(resolveUrl('mailto:editor@example.org', base)).toBeUndefined();
        expect(resolveUrl('  ', base)).toBeUndefined();
        expect(resolveUrl(undefined, base)).toBeUndefined();
    });
});

describe('extractPureName', () => {
    it('cuts affiliations and honorifics', () => {
        expect(extractPureName('Prof. Jane Doe, Department of Geography, University of Somewhere')).toBe('Jane Doe');
        expect(extractPureName('Dr. John Smith, Institute of Urban Studies')).toBe('John Smith');
    });

    it('removes e-mail addresses', () => {
        expect(extractPureName('Alice Green alice.green@example.org')).toBe('Alice Green');
    });

    it('returns an empty string for lines that start with an affiliation', () => {
        expect(extractPureName('University of Somewhere')).toBe('');
    });
});

describe('isMetadataLine', () => {
    it('recognizes deadline and date lines', () => {
        expect(isMetadataLine('Submission deadline: 15 January 2027')).toBe(true);
        expect(isMetadataLine('Published 3 May 2025')).toBe(true);
    });

    it('keeps ordinary sentences', () => {
        expect(isMetadataLine('Cities face increasing heat stress as climate change intensifies.')).toBe(false);
    });
});

describe('uniqueValues', () => {
    it('keeps the first occurrence in order', () => {
        expect(uniqueValues(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
    });
});
