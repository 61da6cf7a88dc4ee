// src/parsers/strategies/generic.parser.ts
import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { Element } from 'domhandler';
import { SiteParser } from '../types';
import {
    buildFragment, DEADLINE_LABEL, EDITORS_LABEL, firstSubstantialParagraph,
    hrefOf, innermost, isFragment, labeledValue, textOf,
} from '../parser.utils';
import { ParseError } from '../../types/errors';
import { RawIssueFragment } from '../../types/specialIssue.types';

const HEADINGS = 'h2, h3, h4';
const MIN_TITLE_LENGTH = 10;
const GENERIC_TITLES = new Set(['special issues', 'call for papers', 'about']);

/**
 * Fallback for pages without a known template.
 *
 * Sections whose class mentions "special" or "call" are read as issues; when
 * there are none, each h2/h3/h4 heading together with the siblings up to the
 * next heading is. Short or generic headings are page chrome and skipped.
 */
export class GenericSiteParser implements SiteParser {
    public readonly siteType = 'generic';

    constructor(private readonly maxSections: number) { }

    public parse(html: string, baseUrl: string): RawIssueFragment[] {
        const $ = cheerio.load(html);
        const scopes = this.selectScopes($).slice(0, this.maxSections);
        if (scopes.length === 0) {
            throw new ParseError('Page has neither special-issue sections nor headings.', {
                siteType: this.siteType,
                baseUrl,
                htmlLength: html.length,
            });
        }
        return scopes.map(({ heading, scope }) => this.extractFragment($, heading, scope)).filter(isFragment);
    }

    private selectScopes($: CheerioAPI): Array<{ heading: Cheerio<Element>; scope: Cheerio<Element> }> {
        const sections = $('div, section').filter((_, el) => /special|call/i.test($(el).attr('class') ?? ''));
        const leaves = innermost($, sections);
        if (leaves.length > 0) {
            return leaves.map(section => ({
                heading: $(section).find(HEADINGS).first(),
                scope: $(section),
            }));
        }
        return $(HEADINGS).toArray().map(heading => ({
            heading: $(heading),
            scope: $(heading).add($(heading).nextUntil(HEADINGS)),
        }));
    }

    private extractFragment($: CheerioAPI, heading: Cheerio<Element>, scope: Cheerio<Element>): RawIssueFragment | undefined {
        const title = textOf(heading);
        if (title.length < MIN_TITLE_LENGTH || GENERIC_TITLES.has(title.toLowerCase())) {
            return undefined;
        }

        const headingLink = heading.find('a[href]').first();
        const link = headingLink.length > 0 ? headingLink : scope.find('a[href]').first();

        return buildFragment({
            title,
            deadline: labeledValue($, scope.not(heading), DEADLINE_LABEL),
            guestEditors: labeledValue($, scope.not(heading), EDITORS_LABEL),
            description: firstSubstantialParagraph(scope, [DEADLINE_LABEL, EDITORS_LABEL]),
            detailUrl: hrefOf(link),
        });
    }
}
