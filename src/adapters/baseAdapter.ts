import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { extractSameOriginLinks } from '../crawler/extractor';
import type { SearchSiteAdapter } from '../types';
import { canonicalizeUrl } from '../utils/url';

export abstract class BaseAdapter implements SearchSiteAdapter {
  abstract domain: string;
  abstract whitelistPatterns: RegExp[];

  protected abstract readonly baseUrl: string;

  abstract searchPageUrls(keyword: string, maxPages: number): string[];

  /** True for URLs that list search results instead of an article. */
  abstract isSearchPage(url: string): boolean;

  extractResultLinks(html: string, pageUrl: string, keyword: string): string[] {
    const dom = cheerio.load(html);
    const normalizedKeyword = keyword.toLowerCase();

    return this.collectAllowedLinks(dom, pageUrl, anchorText =>
      normalizedKeyword.length > 0 && anchorText.toLowerCase().includes(normalizedKeyword)
    );
  }

  protected collectAllowedLinks(
    dom: CheerioAPI,
    pageUrl: string,
    acceptAnchor: (anchorText: string) => boolean = () => true
  ): string[] {
    return extractSameOriginLinks(dom, dom.root(), pageUrl, (anchorText, resolvedUrl) => {
      if (!anchorText || !acceptAnchor(anchorText)) return false;
      if (this.isSearchPage(resolvedUrl)) return false;
      return this.whitelistPatterns.some(pattern => pattern.test(resolvedUrl));
    });
  }

  protected buildUrl(path: string, query: Record<string, string | number>): string {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query)) url.searchParams.set(key, String(value));
    return canonicalizeUrl(url.toString());
  }
}
