import got, { type Response } from 'got';
import Bottleneck from 'bottleneck';
import robotsParser from 'robots-parser';
import { CookieJar } from 'tough-cookie';
import { CRAWLER_CONFIG } from '../config';
import { FetchError, describeError } from '../errors';
import type { HtmlFetcher } from '../types';

type RobotsTxt = ReturnType<typeof robotsParser>;

export interface HtmlFetcherOptions {
  /** Pause taken before every request, robots.txt lookups included. */
  delaySeconds: number;
  requestTimeoutMs: number;
  respectRobots: boolean;
  userAgent: string;
  acceptHeader?: string;
  languageHeader?: string;
  sleep?: (ms: number) => Promise<void>;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

const SOFT_404_MARKERS = [
  'pagina niet gevonden',
  'deze pagina bestaat niet',
  'error 404',
  'fout 404',
  '404 - not found'
];

export function isSoft404Response(html: string): boolean {
  const normalizedTitle = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html)?.[1]?.toLowerCase() ?? '';
  return SOFT_404_MARKERS.some(marker => normalizedTitle.includes(marker));
}

export function fetcherOptionsFromConfig(): HtmlFetcherOptions {
  return {
    delaySeconds: CRAWLER_CONFIG.delaySeconds,
    requestTimeoutMs: CRAWLER_CONFIG.requestTimeoutMs,
    respectRobots: CRAWLER_CONFIG.respectRobots,
    userAgent: CRAWLER_CONFIG.userAgentHeader,
    acceptHeader: CRAWLER_CONFIG.acceptHeader,
    languageHeader: CRAWLER_CONFIG.languageHeader
  };
}

/**
 * Sequential HTTP client. Every request waits out the politeness delay first,
 * so a string of failures is throttled exactly like a string of successes.
 */
export class PoliteFetcher implements HtmlFetcher {
  private readonly options: HtmlFetcherOptions;
  private readonly rateLimiter = new Bottleneck({ maxConcurrent: 1 });
  private readonly cookieJar = new CookieJar();
  private readonly robotsTxtParsers = new Map<string, RobotsTxt>();
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: HtmlFetcherOptions = fetcherOptionsFromConfig()) {
    this.options = options;
    this.sleep = options.sleep ?? sleep;
  }

  async fetch(url: string): Promise<string> {
    let parsedUrl: URL;
    try {
      parsedUrl = new URL(url);
    } catch (error) {
      throw new FetchError(url, `Invalid URL: ${url}`, { cause: error });
    }

    if (this.options.respectRobots) {
      const robotsTxt = await this.loadRobotsParserForOrigin(parsedUrl.origin);
      if (robotsTxt.isAllowed(url, this.options.userAgent) === false) {
        throw new FetchError(url, 'Blocked by robots.txt');
      }
    }

    return this.rateLimiter.schedule(() => this.politeGet(url));
  }

  private async politeGet(url: string): Promise<string> {
    await this.sleep(this.options.delaySeconds * 1000);

    let response: Response<string>;
    try {
      response = await got(url, {
        headers: {
          'user-agent': this.options.userAgent,
          accept: this.options.acceptHeader ?? CRAWLER_CONFIG.acceptHeader,
          'accept-language': this.options.languageHeader ?? CRAWLER_CONFIG.languageHeader
        },
        cookieJar: this.cookieJar,
        timeout: { request: this.options.requestTimeoutMs },
        retry: { limit: 0 },
        decompress: true,
        throwHttpErrors: false,
        followRedirect: true
      });
    } catch (error) {
      throw new FetchError(url, `Request failed: ${describeError(error)}`, { cause: error });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new FetchError(url, `Unexpected status ${response.statusCode}`, { statusCode: response.statusCode });
    }

    if (isSoft404Response(response.body)) {
      throw new FetchError(url, 'Soft 404 page', { statusCode: response.statusCode });
    }

    return response.body.normalize('NFC');
  }

  private async loadRobotsParserForOrigin(origin: string): Promise<RobotsTxt> {
    const cached = this.robotsTxtParsers.get(origin);
    if (cached) return cached;

    const robotsUrl = `${origin}/robots.txt`;
    let robotsTxtParser: RobotsTxt;
    try {
      const body = await this.rateLimiter.schedule(async () => {
        await this.sleep(this.options.delaySeconds * 1000);
        const response = await got(robotsUrl, {
          headers: { 'user-agent': this.options.userAgent },
          timeout: { request: Math.min(5000, this.options.requestTimeoutMs) },
          retry: { limit: 0 },
          throwHttpErrors: false
        });
        return response.statusCode >= 400 ? '' : response.body;
      });
      robotsTxtParser = robotsParser(robotsUrl, body);
    } catch (error) {
      console.warn({ origin, err: describeError(error) }, 'robots.txt unavailable, assuming allowed');
      robotsTxtParser = robotsParser(robotsUrl, '');
    }

    this.robotsTxtParsers.set(origin, robotsTxtParser);
    return robotsTxtParser;
  }
}
