// src/parsers/types.ts
import { RawIssueFragment } from '../types/specialIssue.types';

/**
 * Extracts candidate special-issue blocks from a journal's listing page.
 * One implementation per template family, registered under its site type.
 */
export interface SiteParser {
    readonly siteType: string;
    /**
     * @throws ParseError when the page has none of the blocks the template defines.
     */
    parse(html: string, baseUrl: string): RawIssueFragment[];
}

/**
 * Reads the fields a listing omits from a single special-issue page.
 */
export interface DetailParser {
    readonly siteType: string;
    parse(html: string): RawIssueFragment;
}
