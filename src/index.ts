import { pathToFileURL } from 'url';
import { DrimbleSearchAdapter } from './adapters/drimbleSearch';
import { EntityEnricher, resolveEntityBackend } from './analysis/entityEnricher';
import { CRAWLER_CONFIG, type EntityBackendName } from './config';
import { CrawlController } from './crawler/controller';
import { PoliteFetcher, fetcherOptionsFromConfig } from './crawler/fetcher';
import { CrawlRunError, describeError } from './errors';
import { FileSink } from './pipelines/sink';
import type { RunOptions, RunReport } from './types';
import { saveRunReport } from './utils/metrics';

export interface CrawlSettings extends RunOptions {
  delaySeconds: number;
  outputDir: string;
  entityBackend: EntityBackendName;
}

export function defaultCrawlSettings(): CrawlSettings {
  return {
    keyword: CRAWLER_CONFIG.keyword,
    maxPages: CRAWLER_CONFIG.maxPages,
    followLinks: CRAWLER_CONFIG.followLinks,
    maxLinkDepth: CRAWLER_CONFIG.maxLinkDepth,
    maxLinksPerArticle: CRAWLER_CONFIG.maxLinksPerArticle,
    maxTotalArticles: CRAWLER_CONFIG.maxTotalArticles,
    saveJsonAll: CRAWLER_CONFIG.saveJsonAll,
    delaySeconds: CRAWLER_CONFIG.delaySeconds,
    outputDir: CRAWLER_CONFIG.output.dir,
    entityBackend: CRAWLER_CONFIG.entityBackend
  };
}

/** Wires the production collaborators together and runs one crawl. */
export async function runCrawl(overrides: Partial<CrawlSettings> = {}): Promise<RunReport> {
  const settings: CrawlSettings = { ...defaultCrawlSettings(), ...overrides };
  if (!settings.keyword) {
    throw new Error('No keyword configured; set KEYWORD');
  }

  const sink = new FileSink({ outputDir: settings.outputDir });
  // a zero budget never writes an article, so the previous run's CSV is left alone
  if (settings.maxTotalArticles > 0) await sink.open();

  const controller = new CrawlController({
    fetcher: new PoliteFetcher({ ...fetcherOptionsFromConfig(), delaySeconds: settings.delaySeconds }),
    adapter: new DrimbleSearchAdapter(),
    enricher: new EntityEnricher(await resolveEntityBackend(settings.entityBackend)),
    sink
  });

  try {
    const report = await controller.run(settings);
    saveRunReport(settings.outputDir, CRAWLER_CONFIG.output.reportFileName, report);
    return report;
  } catch (error) {
    if (error instanceof CrawlRunError && error.report) {
      console.log({ ...error.report }, 'Partial run report');
      try {
        saveRunReport(settings.outputDir, CRAWLER_CONFIG.output.reportFileName, error.report);
      } catch (reportError) {
        console.error({ err: describeError(reportError) }, 'Could not save run report');
      }
    }
    throw error;
  }
}

async function main() {
  const report = await runCrawl();
  console.log({ ...report, outputDir: CRAWLER_CONFIG.output.dir }, 'Crawler finished');
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  main().catch(err => {
    console.error({ err: describeError(err) }, 'Fatal error');
    process.exit(1);
  });
}
