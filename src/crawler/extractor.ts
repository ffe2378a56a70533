import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { hasChildren, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import { ParseError, describeError } from '../errors';
import type { ArticleRecord } from '../types';
import { normalizePublishedDate } from '../utils/datetime';
import { canonicalizeUrl, haveSameOrigin, isHttpOrHttpsUrl, resolveHref } from '../utils/url';
import { isBlockedUrl } from '../utils/urlFilters';

const BOILERPLATE_SELECTOR = 'nav, header, footer, aside, script, style, noscript, iframe, form, template, svg';

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function nonEmpty(value: string | undefined): string | undefined {
  const collapsed = value === undefined ? '' : collapseWhitespace(value);
  return collapsed || undefined;
}

function classContains($: CheerioAPI, tagNames: string, fragments: string[]): Cheerio<Element> {
  return $<Element, string>(tagNames).filter((_, element) => {
    const className = ($(element).attr('class') ?? '').toLowerCase();
    return fragments.some(fragment => className.includes(fragment));
  });
}

function metaContent($: CheerioAPI, selectors: string[]): string | undefined {
  for (const selector of selectors) {
    const content = nonEmpty($(selector).first().attr('content'));
    if (content) return content;
  }
  return undefined;
}

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    parts.push(node.data);
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) collectText(child, parts);
  }
}

function findContentRegion($: CheerioAPI): Cheerio<Element> | undefined {
  const candidates: Array<() => Cheerio<Element>> = [
    () => $('article').first(),
    () => $('[itemprop="articleBody"]').first(),
    () => $('main').first(),
    () => classContains($, 'div', ['article']).first(),
    () => $('div[id]').filter((_, element) => ($(element).attr('id') ?? '').toLowerCase().includes('content')).first()
  ];

  for (const candidate of candidates) {
    const region = candidate();
    if (region.length > 0) return region;
  }
  return undefined;
}

function extractTitle($: CheerioAPI): string | undefined {
  return (
    nonEmpty($('h1').first().text()) ??
    metaContent($, ['meta[property="og:title"]', 'meta[name="twitter:title"]']) ??
    nonEmpty($('title').first().text())
  );
}

function extractPublishedDate($: CheerioAPI): string | undefined {
  const timeElement = $('time').first();
  const rawDate =
    nonEmpty(timeElement.attr('datetime')) ??
    nonEmpty(timeElement.text()) ??
    metaContent($, ['meta[property="article:published_time"]', 'meta[name="date"]', 'meta[itemprop="datePublished"]']) ??
    nonEmpty(classContains($, 'span, div, p', ['datum', 'date']).first().text());

  if (!rawDate) return undefined;
  return normalizePublishedDate(rawDate) ?? rawDate;
}

function extractAuthor($: CheerioAPI): string | undefined {
  const fromMeta = metaContent($, [
    'meta[name="author"]',
    'meta[property="author"]',
    'meta[property="article:author"]'
  ]);
  if (fromMeta) return fromMeta;

  const fromLink = nonEmpty($('link[rel="author"]').first().attr('href'));
  if (fromLink) return fromLink;

  return nonEmpty(classContains($, 'span, div, p, a', ['author', 'auteur']).first().text());
}

function extractTags($: CheerioAPI): string[] {
  const candidates: string[] = [];
  const keywordsMeta = $('meta[name="keywords"]').first().attr('content');

  if (keywordsMeta?.trim()) {
    candidates.push(...keywordsMeta.split(','));
  } else {
    $('a, span')
      .filter((_, element) => {
        const node = $(element);
        const className = (node.attr('class') ?? '').toLowerCase();
        return node.attr('rel') === 'tag' || className.includes('tag') || className.includes('keyword');
      })
      .each((_, element) => {
        candidates.push($(element).text());
      });
  }

  const seenTags = new Set<string>();
  const tags: string[] = [];
  for (const candidate of candidates) {
    const tag = collapseWhitespace(candidate);
    if (!tag || seenTags.has(tag)) continue;
    seenTags.add(tag);
    tags.push(tag);
  }
  return tags;
}

function extractMainImage($: CheerioAPI, region: Cheerio<Element> | undefined, sourceUrl: string): string | undefined {
  const rawImage =
    metaContent($, ['meta[property="og:image"]', 'meta[name="og:image"]', 'meta[name="twitter:image"]']) ??
    nonEmpty((region ?? $('body')).find('img[src]').first().attr('src'));
  if (!rawImage) return undefined;

  const resolvedImage = resolveHref(rawImage, sourceUrl);
  if (!resolvedImage || !isHttpOrHttpsUrl(resolvedImage)) {
    throw new ParseError('mainImageUrl', `Unusable image URL: ${rawImage}`);
  }
  return resolvedImage;
}

function extractFullText(region: Cheerio<Element> | undefined): string {
  if (!region) return '';
  const clone = region.clone();
  clone.find(BOILERPLATE_SELECTOR).remove();

  const parts: string[] = [];
  for (const node of clone.toArray()) collectText(node, parts);
  return collapseWhitespace(parts.join(' '));
}

export function extractSameOriginLinks(
  $: CheerioAPI,
  scope: Cheerio<AnyNode>,
  sourceUrl: string,
  accept: (anchorText: string, resolvedUrl: string) => boolean = () => true
): string[] {
  let canonicalSourceUrl: string;
  try {
    canonicalSourceUrl = canonicalizeUrl(sourceUrl);
  } catch (error) {
    throw new ParseError('outboundLinks', `Invalid source URL ${sourceUrl}`, { cause: error });
  }

  const uniqueLinks = new Set<string>();
  scope.find('a[href]').each((_, anchor) => {
    const resolvedHref = resolveHref($(anchor).attr('href'), sourceUrl);
    if (!resolvedHref || !isHttpOrHttpsUrl(resolvedHref)) return;
    if (!haveSameOrigin(resolvedHref, sourceUrl)) return;

    const normalizedHref = canonicalizeUrl(resolvedHref);
    if (normalizedHref === canonicalSourceUrl || isBlockedUrl(normalizedHref)) return;
    if (!accept(collapseWhitespace($(anchor).text()), normalizedHref)) return;

    uniqueLinks.add(normalizedHref);
  });
  return [...uniqueLinks];
}

function readField<T>(field: keyof ArticleRecord, sourceUrl: string, read: () => T, fallback: T): T {
  try {
    return read();
  } catch (error) {
    if (!(error instanceof ParseError)) {
      console.warn({ url: sourceUrl, field, err: describeError(error) }, 'Unexpected extraction failure');
      return fallback;
    }
    console.warn({ url: sourceUrl, field: error.field, err: error.message }, 'Field left empty');
    return fallback;
  }
}

/**
 * Builds an article record from one page. Every field is read independently:
 * a broken field is logged and left empty while the others are still filled in.
 */
export function extractArticle(html: string, sourceUrl: string, dom?: CheerioAPI): ArticleRecord {
  const $ = dom ?? cheerio.load(html);
  const region = findContentRegion($);

  return {
    url: sourceUrl,
    title: readField('title', sourceUrl, () => extractTitle($), undefined),
    publishedDate: readField('publishedDate', sourceUrl, () => extractPublishedDate($), undefined),
    author: readField('author', sourceUrl, () => extractAuthor($), undefined),
    tags: readField('tags', sourceUrl, () => extractTags($), []),
    mainImageUrl: readField('mainImageUrl', sourceUrl, () => extractMainImage($, region, sourceUrl), undefined),
    fullText: readField('fullText', sourceUrl, () => extractFullText(region), ''),
    outboundLinks: readField(
      'outboundLinks',
      sourceUrl,
      () => extractSameOriginLinks($, region ?? $.root(), sourceUrl),
      []
    )
  };
}
