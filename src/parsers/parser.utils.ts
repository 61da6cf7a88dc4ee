// src/parsers/parser.utils.ts
import type { Cheerio, CheerioAPI } from 'cheerio';
import { AnyNode, Element, hasChildren, isTag, isText } from 'domhandler';
import { RawIssueFragment } from '../types/specialIssue.types';
import { collapseWhitespace } from '../utils/text.utils';

export const MIN_DESCRIPTION_LENGTH = 50;
export const MAX_DESCRIPTION_LENGTH = 500;

// Elements that start a new line when rendered; inline markup joins its text directly.
const BLOCK_TAGS = new Set([
    'address', 'article', 'aside', 'blockquote', 'br', 'dd', 'div', 'dl', 'dt', 'figcaption',
    'footer', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr', 'li', 'main', 'nav', 'ol',
    'p', 'section', 'table', 'td', 'th', 'tr', 'ul',
]);

const collectText = (node: AnyNode, parts: string[]): void => {
    if (isText(node)) {
        parts.push(node.data);
        return;
    }
    const block = isTag(node) && BLOCK_TAGS.has(node.name);
    if (block) parts.push(' ');
    if (hasChildren(node)) {
        node.children.forEach(child => collectText(child, parts));
    }
    if (block) parts.push(' ');
};

/**
 * Text of a node with block elements separated by spaces, so that
 * `<p>a</p><p>b</p>` reads "a b" while `Pa<em>pers</em>` stays "Papers".
 */
export const spacedText = (node: AnyNode): string => {
    const parts: string[] = [];
    collectText(node, parts);
    return collapseWhitespace(parts.join(''));
};

export const textOf = <T extends AnyNode>(selection: Cheerio<T>): string =>
    collapseWhitespace(selection.toArray().map(spacedText).join(' '));

/**
 * Keeps only the elements of `blocks` that are not nested inside another one.
 */
export const outermost = ($: CheerioAPI, blocks: Cheerio<Element>): Element[] => {
    const all = new Set(blocks.toArray());
    return blocks.toArray().filter(el => !$(el).parents().toArray().some(parent => all.has(parent)));
};

/**
 * Keeps only the elements of `blocks` that contain no other one.
 */
export const innermost = ($: CheerioAPI, blocks: Cheerio<Element>): Element[] => {
    const all = blocks.toArray();
    return all.filter(el => !$(el).find('*').toArray().some(child => all.includes(child)));
};

// A label without a colon only counts when a date-like value follows it.
const DATE_SHAPED_VALUE = /^\d/;

/**
 * Finds the value following `label` (e.g. "Submission deadline:") inside `scope`.
 * The label must open the element's text; prose that merely mentions it is ignored.
 * The innermost element carrying the label is preferred; when the label sits
 * alone in its own element, the next sibling element holds the value.
 */
export const labeledValue = ($: CheerioAPI, scope: Cheerio<Element>, label: RegExp): string | undefined => {
    const candidates = scope.find('*').addBack().toArray()
        .map(el => ({ el, text: spacedText(el) }))
        .filter(candidate => label.test(candidate.text))
        .sort((a, b) => a.text.length - b.text.length);

    for (const { el, text } of candidates) {
        const match = label.exec(text);
        if (!match || match.index !== 0) continue;

        const value = collapseWhitespace(text.slice(match[0].length));
        if (!value) {
            const sibling = textOf($(el).next());
            if (sibling) return sibling;
            continue;
        }
        if (match[0].includes(':') || DATE_SHAPED_VALUE.test(value)) return value;
    }
    return undefined;
};

/**
 * Text of a list-like element: its `li` items joined with "; ", or its plain text.
 */
export const listText = (element: Cheerio<Element>): string => {
    const items = element.find('li').toArray().map(spacedText).filter(item => item.length > 0);
    return items.length > 0 ? items.join('; ') : textOf(element);
};

export const truncateDescription = (text: string): string =>
    text.length > MAX_DESCRIPTION_LENGTH ? `${text.slice(0, MAX_DESCRIPTION_LENGTH - 3)}...` : text;

/**
 * First paragraph in (or of) `scope` long enough to be a description and not a label line.
 */
export const firstSubstantialParagraph = (
    scope: Cheerio<Element>,
    skip: RegExp[] = []
): string | undefined => {
    const paragraph = scope.find('p').addBack('p').toArray()
        .map(spacedText)
        .find(text => text.length >= MIN_DESCRIPTION_LENGTH && !skip.some(pattern => pattern.test(text)));
    return paragraph ? truncateDescription(paragraph) : undefined;
};

export const hrefOf = (element: Cheerio<Element>): string | undefined => {
    const href = element.attr('href');
    return href && href.trim().length > 0 ? href.trim() : undefined;
};

const optional = (value: string | undefined): string | undefined => {
    const text = collapseWhitespace(value);
    return text.length > 0 ? text : undefined;
};

/**
 * Builds a fragment, leaving out empty fields. Returns undefined when nothing was found.
 */
export const buildFragment = (fields: RawIssueFragment): RawIssueFragment | undefined => {
    const fragment: RawIssueFragment = {};
    const title = optional(fields.title);
    const deadline = optional(fields.deadline);
    const guestEditors = optional(fields.guestEditors);
    const detailUrl = optional(fields.detailUrl);
    const description = fields.description?.trim();

    if (title) fragment.title = title;
    if (deadline) fragment.deadline = deadline;
    if (guestEditors) fragment.guestEditors = guestEditors;
    if (description) fragment.description = description;
    if (detailUrl) fragment.detailUrl = detailUrl;

    return Object.keys(fragment).length > 0 ? fragment : undefined;
};

export const isFragment = (fragment: RawIssueFragment | undefined): fragment is RawIssueFragment =>
    fragment !== undefined;

// Labels shared by the listing templates. They match at the start of a text only.
export const DEADLINE_LABEL = /^(?:submission\s+)?deadline(?:\s+for\s+manuscript\s+submissions)?\s*:?/i;
export const EDITORS_LABEL = /^guest\s+editors?(?:\s*\(s\))?\s*:?/i;
