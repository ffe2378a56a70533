import { BaseAdapter } from './baseAdapter';
import { CRAWLER_CONFIG } from '../config';

function buildWhitelistPatterns(baseUrl: string): RegExp[] {
  const host = new URL(baseUrl).hostname.replace(/^www\./, '').replace(/\./g, '\\.');
  return [new RegExp(`^https?:\\/\\/(www\\.)?${host}\\/.+`, 'i')];
}

/**
 * Drimble's search lives at `/zoeken.html?q=<keyword>&page=<n>`.
 * Result anchors carry the article headline, so only links whose text mentions the keyword count as hits.
 */
export class DrimbleSearchAdapter extends BaseAdapter {
  domain: string;
  whitelistPatterns: RegExp[];

  protected readonly baseUrl: string;
  private readonly searchPath: string;

  constructor(baseUrl: string = CRAWLER_CONFIG.baseUrl, searchPath: string = CRAWLER_CONFIG.searchPath) {
    super();
    this.baseUrl = baseUrl;
    this.searchPath = searchPath;
    this.domain = new URL(baseUrl).hostname;
    this.whitelistPatterns = buildWhitelistPatterns(baseUrl);
  }

  searchPageUrls(keyword: string, maxPages: number): string[] {
    return Array.from({ length: Math.max(0, maxPages) }, (_, index) =>
      this.buildUrl(this.searchPath, { q: keyword, page: index + 1 })
    );
  }

  isSearchPage(url: string): boolean {
    try {
      return new URL(url).pathname === new URL(this.searchPath, this.baseUrl).pathname;
    } catch {
      return false;
    }
  }
}
