export type TaskOrigin = 'seed' | 'discovered';

export interface CrawlTask {
  readonly url: string;
  readonly depth: number;
  readonly origin: TaskOrigin;
}

export interface ArticleRecord {
  url: string;
  title?: string;
  publishedDate?: string;
  author?: string;
  tags: string[];
  mainImageUrl?: string;
  fullText: string;
  /** Unique same-origin links, in document order. */
  outboundLinks: string[];
}

export interface KeywordMatch {
  occurrenceIndex: number;
  charOffset: number;
  contextWindow: string;
  containingSentence: string;
}

export interface ContextualSignals {
  nearbyNumbers: string[];
  nearbyDates: string[];
}

export type KeywordAnalysis =
  | { matched: false }
  | { matched: true; matches: KeywordMatch[]; signals: ContextualSignals };

export type EntityLabel = 'PER' | 'LOC' | 'ORG';

export interface Entity {
  text: string;
  label: EntityLabel;
  /** Half-open [start, end) offsets into the analysed text. */
  charSpan: [number, number];
}

export interface LexicalTopTerm {
  term: string;
  frequency: number;
}

export interface LexicalSummary {
  wordCount: number;
  topTerms: LexicalTopTerm[];
}

export interface OutputArtifact {
  index: number;
  keyword: string;
  fetchedAt: string;
  record: ArticleRecord;
  matches: KeywordMatch[];
  signals: ContextualSignals;
  entities: Entity[];
  lexical: LexicalSummary;
}

export type SkipReason =
  | 'already_visited'
  | 'depth_exceeded'
  | 'fetch_error'
  | 'no_keyword_match'
  | 'persist_error'
  | 'search_exhausted';

export type StopReason = 'frontier_empty' | 'max_total_articles' | 'search_unreachable' | 'fatal_persist_error';

export interface RunReport {
  startedAt: string;
  finishedAt: string;
  attempted: number;
  matched: number;
  persisted: number;
  skipped: Record<SkipReason, number>;
  stopReason: StopReason;
}

export interface RunOptions {
  keyword: string;
  maxPages: number;
  followLinks: boolean;
  maxLinkDepth: number;
  maxLinksPerArticle: number;
  maxTotalArticles: number;
  saveJsonAll: boolean;
}

export interface HtmlFetcher {
  fetch(url: string): Promise<string>;
}

export interface ArticleSink {
  persist(artifact: OutputArtifact): Promise<void>;
  dump(record: ArticleRecord, index: number): Promise<void>;
}

export interface SearchSiteAdapter {
  readonly domain: string;
  searchPageUrls(keyword: string, maxPages: number): string[];
  extractResultLinks(html: string, pageUrl: string, keyword: string): string[];
}
