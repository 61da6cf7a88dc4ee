// src/parsers/strategies/blockSiteParser.ts
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { Element } from 'domhandler';
import { SiteParser } from '../types';
import { isFragment } from '../parser.utils';
import { ParseError } from '../../types/errors';
import { RawIssueFragment } from '../../types/specialIssue.types';

/**
 * Listing parser that locates one element per special issue and reads each independently.
 */
export abstract class BlockSiteParser implements SiteParser {
    public abstract readonly siteType: string;

    protected abstract selectBlocks($: CheerioAPI): Element[];

    protected abstract extractFragment($: CheerioAPI, block: Element): RawIssueFragment | undefined;

    public parse(html: string, baseUrl: string): RawIssueFragment[] {
        const $ = cheerio.load(html);
        const blocks = this.selectBlocks($);
        if (blocks.length === 0) {
            throw new ParseError(`No special-issue blocks found for site type "${this.siteType}".`, {
                siteType: this.siteType,
                baseUrl,
                htmlLength: html.length,
            });
        }
        return blocks.map(block => this.extractFragment($, block)).filter(isFragment);
    }
}
