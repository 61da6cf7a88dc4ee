// src/parsers/strategies/springer.parser.ts
import type { CheerioAPI } from 'cheerio';
import { Element } from 'domhandler';
import { BlockSiteParser } from './blockSiteParser';
import {
    buildFragment, EDITORS_LABEL, firstSubstantialParagraph,
    hrefOf, labeledValue, listText, outermost, textOf, truncateDescription,
} from '../parser.utils';
import { RawIssueFragment } from '../../types/specialIssue.types';

const SUBMISSION_DEADLINE_LABEL = /^submission\s+deadline\s*:?/i;

/**
 * Springer / Nature "call for papers" collection pages built from cards.
 */
export class SpringerSiteParser extends BlockSiteParser {
    public readonly siteType = 'springer';

    protected selectBlocks($: CheerioAPI): Element[] {
        return outermost($, $('article, .c-card'));
    }

    protected extractFragment($: CheerioAPI, block: Element): RawIssueFragment | undefined {
        const $block = $(block);
        const titleElement = $block.find('.c-card__title, h2, h3').first();
        const titleLink = titleElement.find('a[href]').first();
        const link = titleLink.length > 0 ? titleLink : $block.find('a[href]').first();
        const title = textOf(titleElement) || textOf(link);

        const deadline = labeledValue($, $block, SUBMISSION_DEADLINE_LABEL)
            ?? $block.find('time[datetime]').first().attr('datetime');

        const editorsElement = $block.find('.c-card__editors').first();
        const guestEditors = editorsElement.length > 0
            ? listText(editorsElement).replace(EDITORS_LABEL, '')
            : labeledValue($, $block, EDITORS_LABEL);

        const summary = $block.find('.c-card__summary').first();
        const description = summary.length > 0
            ? truncateDescription(textOf(summary))
            : firstSubstantialParagraph($block, [SUBMISSION_DEADLINE_LABEL, EDITORS_LABEL]);

        return buildFragment({ title, deadline, guestEditors, description, detailUrl: hrefOf(link) });
    }
}
