// src/parsers/strategies/mdpi.parser.ts
import type { CheerioAPI } from 'cheerio';
import { Element } from 'domhandler';
import { BlockSiteParser } from './blockSiteParser';
import {
    buildFragment, DEADLINE_LABEL, EDITORS_LABEL, firstSubstantialParagraph,
    hrefOf, labeledValue, listText, outermost, textOf,
} from '../parser.utils';
import { RawIssueFragment } from '../../types/specialIssue.types';

/**
 * MDPI journal "special issues" listings: one row per issue.
 */
export class MdpiSiteParser extends BlockSiteParser {
    public readonly siteType = 'mdpi';

    protected selectBlocks($: CheerioAPI): Element[] {
        return outermost($, $('.special-issue-item, .article-item'));
    }

    protected extractFragment($: CheerioAPI, block: Element): RawIssueFragment | undefined {
        const $block = $(block);
        const titleElement = $block.find('.title').first();
        const titleLink = titleElement.find('a[href]').first();
        const link = titleLink.length > 0 ? titleLink : $block.find('a[href]').first();
        const title = textOf(titleElement) || textOf($block.find('h2, h3, h4').first()) || textOf(link);

        const deadlineElement = $block.find('.deadline').first();
        const deadline = deadlineElement.length > 0 ? textOf(deadlineElement) : labeledValue($, $block, DEADLINE_LABEL);

        const editorsElement = $block.find('.editors').first();
        const guestEditors = editorsElement.length > 0
            ? listText(editorsElement).replace(EDITORS_LABEL, '')
            : labeledValue($, $block, EDITORS_LABEL);

        const description = firstSubstantialParagraph($block, [DEADLINE_LABEL, EDITORS_LABEL]);

        return buildFragment({ title, deadline, guestEditors, description, detailUrl: hrefOf(link) });
    }
}
