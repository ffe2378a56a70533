import 'dotenv/config';

export type EntityBackendName = 'compromise' | 'none';

export function parseBoolean(input: string | undefined, fallback: boolean): boolean {
  if (input === undefined) return fallback;
  const normalized = input.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

export function parseNonNegativeInt(input: string | undefined, fallback: number): number {
  if (input === undefined || !input.trim()) return fallback;
  const value = Number(input.trim());
  if (!Number.isInteger(value) || value < 0) return fallback;
  return value;
}

export function parseNonNegativeNumber(input: string | undefined, fallback: number): number {
  if (input === undefined || !input.trim()) return fallback;
  const value = Number(input.trim());
  if (Number.isNaN(value) || value < 0) return fallback;
  return value;
}

const normalizedEntityBackend = (process.env.ENTITY_BACKEND ?? 'compromise').toLowerCase();
const entityBackend: EntityBackendName = normalizedEntityBackend === 'none' ? 'none' : 'compromise';

export const CRAWLER_CONFIG = {
  baseUrl: process.env.DRIMBLE_BASE_URL ?? 'https://drimble.nl',
  searchPath: process.env.DRIMBLE_SEARCH_PATH ?? '/zoeken.html',
  keyword: (process.env.KEYWORD ?? 'vuurwerk').trim(),
  maxPages: parseNonNegativeInt(process.env.MAX_PAGES, 1),
  followLinks: parseBoolean(process.env.FOLLOW_LINKS, false),
  maxLinkDepth: parseNonNegativeInt(process.env.MAX_LINK_DEPTH, 2),
  maxLinksPerArticle: parseNonNegativeInt(process.env.MAX_LINKS_PER_ARTICLE, 5),
  maxTotalArticles: parseNonNegativeInt(process.env.MAX_TOTAL_ARTICLES, 200),
  saveJsonAll: parseBoolean(process.env.SAVE_JSON_ALL, false),
  delaySeconds: parseNonNegativeNumber(process.env.DELAY_SECONDS, 1),
  requestTimeoutMs: parseNonNegativeInt(process.env.REQUEST_TIMEOUT_MS, 15000),
  respectRobots: parseBoolean(process.env.RESPECT_ROBOTS, true),
  userAgentHeader: process.env.CRAWLER_USER_AGENT ?? 'DrimbleKeywordCrawler/1.0',
  acceptHeader: 'text/html,application/xhtml+xml',
  languageHeader: 'nl-NL,nl;q=0.9,en-US;q=0.8,en;q=0.7',
  output: {
    dir: process.env.OUTPUT_DIR ?? 'output_scrapers',
    csvFileName: 'drimble_vuurwerk.csv',
    articlesDirName: 'articles',
    debugDirName: 'debug',
    reportFileName: 'run-report.json'
  },
  analysis: {
    contextRadius: parseNonNegativeInt(process.env.CONTEXT_RADIUS, 80),
    signalRadius: parseNonNegativeInt(process.env.SIGNAL_RADIUS, 120),
    minTokenLength: 3,
    topTermsLimit: 10
  },
  entityBackend
};

export const ANALYSIS_CONFIG = CRAWLER_CONFIG.analysis;
