// src/parsers/strategies/elsevier.parser.ts
import type { CheerioAPI } from 'cheerio';
import { Element, isTag } from 'domhandler';
import { BlockSiteParser } from './blockSiteParser';
import {
    buildFragment, DEADLINE_LABEL, EDITORS_LABEL, firstSubstantialParagraph,
    hrefOf, labeledValue, listText, outermost, textOf, truncateDescription,
} from '../parser.utils';
import { RawIssueFragment } from '../../types/specialIssue.types';

const BLOCK_SELECTOR = '.special-issue, [data-special-issue], li.js-special-issue';
const SPECIAL_ISSUE_LINK = 'a[href*="/special-issue/"]';

/**
 * ScienceDirect "call for papers" listings.
 *
 * Issues are marked-up blocks on the current template; older pages only
 * carry a list of links to `/special-issue/` pages, in which case the
 * nearest list item or article around each link is the block. A container
 * shared by several such links is not a block; each link stands alone.
 */
export class ElsevierSiteParser extends BlockSiteParser {
    public readonly siteType = 'elsevier';

    protected selectBlocks($: CheerioAPI): Element[] {
        const blocks = outermost($, $(BLOCK_SELECTOR));
        if (blocks.length > 0) return blocks;

        const seen = new Set<Element>();
        const fromLinks: Element[] = [];
        $(SPECIAL_ISSUE_LINK).each((_, anchor) => {
            const candidates = [$(anchor).closest('li, article').get(0), $(anchor).parent().get(0)];
            const container = candidates.find((node): node is Element =>
                node !== undefined && isTag(node) && $(node).find(SPECIAL_ISSUE_LINK).length === 1
            ) ?? anchor;
            if (!seen.has(container)) {
                seen.add(container);
                fromLinks.push(container);
            }
        });
        return fromLinks;
    }

    protected extractFragment($: CheerioAPI, block: Element): RawIssueFragment | undefined {
        const $block = $(block);
        const heading = $block.find('h2, h3, h4, .special-issue__title').first();
        const issueLink = $block.is('a') ? $block : $block.find(SPECIAL_ISSUE_LINK).first();
        const link = issueLink.length > 0 ? issueLink : $block.find('a[href]').first();

        const title = textOf(heading) || textOf(link);

        const deadlineElement = $block.find('.submission-deadline, .deadline').first();
        const deadline = deadlineElement.length > 0 ? textOf(deadlineElement) : labeledValue($, $block, DEADLINE_LABEL);

        const editorsElement = $block.find('.guest-editors').first();
        const guestEditors = editorsElement.length > 0
            ? listText(editorsElement).replace(EDITORS_LABEL, '')
            : labeledValue($, $block, EDITORS_LABEL);

        const descriptionElement = $block.find('.special-issue__description, .description').first();
        const description = descriptionElement.length > 0
            ? truncateDescription(textOf(descriptionElement))
            : firstSubstantialParagraph($block, [DEADLINE_LABEL, EDITORS_LABEL]);

        return buildFragment({ title, deadline, guestEditors, description, detailUrl: hrefOf(link) });
    }
}
