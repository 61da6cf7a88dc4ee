// src/parsers/parserRegistry.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { DetailParser, SiteParser } from './types';
import { ElsevierSiteParser } from './strategies/elsevier.parser';
import { MdpiSiteParser } from './strategies/mdpi.parser';
import { SpringerSiteParser } from './strategies/springer.parser';
import { GenericSiteParser } from './strategies/generic.parser';
import { ElsevierDetailParser } from './detail/elsevier.detail';
import { ConfigService } from '../config/config.service';
import { UnsupportedSiteTypeError } from '../types/errors';
import { RawIssueFragment } from '../types/specialIssue.types';

/**
 * Site type → parsing strategy. New templates are supported by registering
 * another `SiteParser`; existing strategies are never touched.
 */
@singleton()
export class ParserRegistry {
    private readonly siteParsers = new Map<string, SiteParser>();
    private readonly detailParsers = new Map<string, DetailParser>();

    constructor(@inject(ConfigService) configService: ConfigService) {
        this.register(new ElsevierSiteParser());
        this.register(new MdpiSiteParser());
        this.register(new SpringerSiteParser());
        this.register(new GenericSiteParser(configService.scraperConfig.genericMaxSections));
        this.registerDetail(new ElsevierDetailParser());
    }

    /** Registers (or replaces) the listing parser of `parser.siteType`. */
    public register(parser: SiteParser): void {
        this.siteParsers.set(parser.siteType, parser);
    }

    public registerDetail(parser: DetailParser): void {
        this.detailParsers.set(parser.siteType, parser);
    }

    public get supportedSiteTypes(): string[] {
        return Array.from(this.siteParsers.keys());
    }

    /**
     * @throws UnsupportedSiteTypeError for an unregistered site type.
     */
    public get(siteType: string): SiteParser {
        const parser = this.siteParsers.get(siteType);
        if (!parser) {
            throw new UnsupportedSiteTypeError(siteType, this.supportedSiteTypes);
        }
        return parser;
    }

    public getDetail(siteType: string): DetailParser | undefined {
        return this.detailParsers.get(siteType);
    }

    /**
     * @throws UnsupportedSiteTypeError | ParseError
     */
    public parse(siteType: string, html: string, baseUrl: string): RawIssueFragment[] {
        return this.get(siteType).parse(html, baseUrl);
    }
}
