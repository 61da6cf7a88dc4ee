// src/parsers/detail/elsevier.detail.ts
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { Element } from 'domhandler';
import { DetailParser } from '../types';
import { buildFragment, spacedText, textOf } from '../parser.utils';
import { RawIssueFragment } from '../../types/specialIssue.types';
import { extractPureName, isMetadataLine, joinParagraphs, uniqueValues } from '../../utils/text.utils';

const DEADLINE_PATTERN = /(?:submission deadline|deadline)\s*:?\s*(\d{1,2}\s+[A-Za-z]+\s+\d{4}|\d{4}-\d{2}-\d{2})/i;
const NOISE = 'header, footer, nav, script, style, noscript, .banner, .cookie-notice';
const SCANNED = 'p, div, ul, ol, h2, h3, h4';
const NESTED_BLOCKS = 'p, div, ul, ol';

const MAX_SECTION_HEADING_LENGTH = 100;
const MAX_EDITOR_LINE_LENGTH = 300;
const MIN_DIV_PARAGRAPH_LENGTH = 30;
const MAX_OUTLINE_NAME_LENGTH = 40;

type Section = 'description' | 'editors';

/**
 * ScienceDirect special-issue page.
 *
 * The content container is scanned in document order. "Guest editors"
 * switches to collecting names, "Special issue information" or "Aims and
 * scope" switches back to the description, and "Manuscript submission" or
 * "Keywords:" ends the scan.
 */
export class ElsevierDetailParser implements DetailParser {
    public readonly siteType = 'elsevier';

    public parse(html: string): RawIssueFragment {
        const $ = cheerio.load(html);
        $(NOISE).remove();

        const deadline = DEADLINE_PATTERN.exec(textOf($.root()))?.[1];

        const container = this.findContainer($);
        const { editors, paragraphs } = container ? this.scan($, container) : { editors: [], paragraphs: [] };
        const names = editors.length > 0 ? editors : this.outlineEditors($);

        return buildFragment({
            deadline,
            guestEditors: uniqueValues(names).join('; '),
            description: joinParagraphs(paragraphs),
        }) ?? {};
    }

    private findContainer($: CheerioAPI): Element | undefined {
        return $('div.inner').get(0) ?? $('main').get(0) ?? $('body').get(0);
    }

    private scan($: CheerioAPI, container: Element): { editors: string[]; paragraphs: string[] } {
        const editors: string[] = [];
        const paragraphs: string[] = [];
        let section: Section = 'description';

        for (const tag of $(container).find(SCANNED).toArray()) {
            if ($(tag).find(NESTED_BLOCKS).length > 0) continue;

            const text = spacedText(tag);
            const lower = text.toLowerCase();
            if (text.length < 3) continue;

            if (lower.includes('manuscript submission') || lower.includes('keywords:')) break;

            if (lower.includes('guest editors') && text.length < MAX_SECTION_HEADING_LENGTH) {
                section = 'editors';
                continue;
            }
            if ((lower.includes('special issue info') || lower.includes('aims and scope')) && text.length < MAX_SECTION_HEADING_LENGTH) {
                section = 'description';
                continue;
            }
            if (lower.includes('science direct') || lower.includes('sciencedirect')) continue;

            if (section === 'editors') {
                if (text.length < MAX_EDITOR_LINE_LENGTH) {
                    const name = extractPureName(text);
                    if (name.length > 2 && !name.includes('@')) editors.push(name);
                }
                continue;
            }

            if (isMetadataLine(text) || /^h[2-4]$/.test(tag.name) || $(tag).is('.OutlineElement')) continue;
            if (tag.name === 'div' && text.length < MIN_DIV_PARAGRAPH_LENGTH) continue;

            if (tag.name === 'ul' || tag.name === 'ol') {
                paragraphs.push(...$(tag).find('li').toArray().map(spacedText));
            } else {
                paragraphs.push(text);
            }
        }
        return { editors, paragraphs };
    }

    // Older pages list each editor in its own outline element.
    private outlineEditors($: CheerioAPI): string[] {
        return $('div.OutlineElement').toArray()
            .map(spacedText)
            .filter(text => {
                const lower = text.toLowerCase();
                return text.length > 2 && !lower.includes('guest editors') && !lower.includes('submit') && !lower.includes('guide');
            })
            .map(extractPureName)
            .filter(name => name.length > 2 && name.length < MAX_OUTLINE_NAME_LENGTH);
    }
}
