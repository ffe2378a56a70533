import { analyzeKeyword, type KeywordAnalyzerOptions } from '../analysis/keywordAnalyzer';
import type { EntityEnricher } from '../analysis/entityEnricher';
import { summarizeText } from '../analysis/textProcessing';
import { CrawlRunError, FetchError, PersistError, describeError } from '../errors';
import type {
  ArticleRecord,
  ArticleSink,
  CrawlTask,
  HtmlFetcher,
  OutputArtifact,
  RunOptions,
  RunReport,
  SearchSiteAdapter,
  SkipReason,
  StopReason
} from '../types';
import { extractArticle } from './extractor';
import { CrawlFrontier } from './frontier';

export interface CrawlControllerDependencies {
  fetcher: HtmlFetcher;
  adapter: SearchSiteAdapter;
  enricher: EntityEnricher;
  sink: ArticleSink;
  analyzerOptions?: KeywordAnalyzerOptions;
  now?: () => Date;
}

function emptySkipCounters(): Record<SkipReason, number> {
  return {
    already_visited: 0,
    depth_exceeded: 0,
    fetch_error: 0,
    no_keyword_match: 0,
    persist_error: 0,
    search_exhausted: 0
  };
}

/**
 * Breadth-first crawl over search-result pages and the articles they lead to.
 * One URL at a time goes through fetch, extract, analyze, enrich and persist.
 * All mutable crawl state lives in a per-run {@link CrawlRun}, so one controller can run repeatedly.
 */
export class CrawlController {
  private readonly deps: CrawlControllerDependencies;

  constructor(deps: CrawlControllerDependencies) {
    this.deps = deps;
  }

  async run(options: RunOptions): Promise<RunReport> {
    return new CrawlRun(this.deps, options).execute();
  }
}

class CrawlRun {
  private readonly frontier: CrawlFrontier;
  private readonly skipped = emptySkipCounters();
  private readonly startedAt: Date;
  private attempted = 0;
  private matched = 0;
  private persisted = 0;
  private firstSeedUrl: string | undefined;

  constructor(
    private readonly deps: CrawlControllerDependencies,
    private readonly options: RunOptions
  ) {
    this.frontier = new CrawlFrontier();
    this.startedAt = this.now();
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private skip(reason: SkipReason, count = 1): void {
    this.skipped[reason] += count;
  }

  private budgetLeft(): boolean {
    return this.persisted < this.options.maxTotalArticles;
  }

  async execute(): Promise<RunReport> {
    const seeds = this.deps.adapter.searchPageUrls(this.options.keyword, this.options.maxPages);
    for (const seed of seeds) {
      this.frontier.push({ url: seed, depth: 0, origin: 'seed' });
    }
    this.firstSeedUrl = seeds[0];

    console.log({ keyword: this.options.keyword, seeds: seeds.length }, 'Starting crawl');

    let stopReason: StopReason = 'frontier_empty';
    while (true) {
      if (!this.budgetLeft()) {
        stopReason = 'max_total_articles';
        break;
      }

      const task = this.frontier.pop();
      if (!task) break;

      try {
        await this.processTask(task);
      } catch (error) {
        if (!(error instanceof CrawlRunError)) throw error;
        console.error({ url: task.url, stopReason: error.stopReason, err: error.message }, 'Crawl aborted');
        throw new CrawlRunError(error.message, error.stopReason, {
          cause: error.cause,
          report: this.buildReport(error.stopReason)
        });
      }
    }

    return this.buildReport(stopReason);
  }

  private async processTask(task: CrawlTask): Promise<void> {
    if (this.frontier.isVisited(task.url)) {
      this.skip('already_visited');
      return;
    }
    if (task.depth > this.options.maxLinkDepth) {
      this.skip('depth_exceeded');
      return;
    }
    this.frontier.markVisited(task.url);
    this.attempted++;

    console.log({ url: task.url, depth: task.depth, origin: task.origin, persisted: this.persisted }, 'Processing');

    let html: string;
    try {
      html = await this.deps.fetcher.fetch(task.url);
    } catch (error) {
      if (task.origin === 'seed' && task.url === this.firstSeedUrl) {
        throw new CrawlRunError(`Search endpoint unreachable: ${describeError(error)}`, 'search_unreachable', {
          cause: error
        });
      }
      const statusCode = error instanceof FetchError ? error.statusCode : undefined;
      console.log({ url: task.url, status: statusCode, err: describeError(error) }, 'Fetch failed, task dropped');
      this.skip('fetch_error');
      return;
    }

    if (task.origin === 'seed') {
      this.processSearchPage(task, html);
      return;
    }

    await this.processArticle(task, html);
  }

  private processSearchPage(task: CrawlTask, html: string): void {
    const resultLinks = this.deps.adapter.extractResultLinks(html, task.url, this.options.keyword);

    if (resultLinks.length === 0) {
      const remainingSeeds = this.frontier.discard(queued => queued.origin === 'seed');
      this.skip('search_exhausted', remainingSeeds);
      console.log({ url: task.url, remainingSeeds }, 'No search results, pagination stopped');
      return;
    }

    let enqueued = 0;
    for (const link of resultLinks) {
      if (!this.budgetLeft()) break;
      if (this.frontier.pushIfAbsent({ url: link, depth: task.depth + 1, origin: 'discovered' })) enqueued++;
    }
    console.log({ url: task.url, results: resultLinks.length, enqueued }, 'Search page processed');
  }

  private async processArticle(task: CrawlTask, html: string): Promise<void> {
    const record = extractArticle(html, task.url);
    const analysis = analyzeKeyword(record, this.options.keyword, this.deps.analyzerOptions);

    if (!analysis.matched) {
      this.skip('no_keyword_match');
      console.log({ url: task.url }, 'Keyword not in text, skipped');
      if (this.options.saveJsonAll) await this.guardPersist(task, () => this.deps.sink.dump(record, this.attempted));
      return;
    }

    this.matched++;
    const artifact: OutputArtifact = {
      index: this.persisted + 1,
      keyword: this.options.keyword,
      fetchedAt: this.now().toISOString(),
      record,
      matches: analysis.matches,
      signals: analysis.signals,
      entities: this.deps.enricher.enrich(record.fullText),
      lexical: summarizeText(record.fullText)
    };

    const saved = await this.guardPersist(task, () => this.deps.sink.persist(artifact));
    if (!saved) return;

    this.persisted++;
    console.log({ url: task.url, index: artifact.index, occurrences: analysis.matches.length }, 'Article persisted');

    this.enqueueArticleLinks(task, record);
  }

  private enqueueArticleLinks(task: CrawlTask, record: ArticleRecord): void {
    if (!this.options.followLinks || !this.budgetLeft()) return;
    const nextDepth = task.depth + 1;

    const newLinks = record.outboundLinks
      .filter(link => !this.frontier.has(link))
      .slice(0, this.options.maxLinksPerArticle);

    for (const link of newLinks) {
      this.frontier.pushIfAbsent({ url: link, depth: nextDepth, origin: 'discovered' });
    }
  }

  private async guardPersist(task: CrawlTask, write: () => Promise<void>): Promise<boolean> {
    try {
      await write();
      return true;
    } catch (error) {
      if (error instanceof PersistError && error.fatal) {
        throw new CrawlRunError(error.message, 'fatal_persist_error', { cause: error });
      }
      console.error({ url: task.url, err: describeError(error) }, 'Persist failed, article skipped');
      this.skip('persist_error');
      return false;
    }
  }

  private buildReport(stopReason: StopReason): RunReport {
    return {
      startedAt: this.startedAt.toISOString(),
      finishedAt: this.now().toISOString(),
      attempted: this.attempted,
      matched: this.matched,
      persisted: this.persisted,
      skipped: { ...this.skipped },
      stopReason
    };
  }
}
