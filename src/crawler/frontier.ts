import { canonicalizeUrl } from '../utils/url';
import { isBlockedUrl } from '../utils/urlFilters';
import type { CrawlTask } from '../types';

/**
 * FIFO frontier with the run's visited set.
 * A URL is known from the moment it is enqueued, so link cycles never grow the queue
 * and a popped URL is marked visited before anyone fetches it.
 */
export class CrawlFrontier {
  private queue: CrawlTask[] = [];
  private queueHead = 0;
  private queuedUrls = new Set<string>();
  private visitedUrls = new Set<string>();

  size(): number {
    return Math.max(0, this.queue.length - this.queueHead);
  }

  visitedCount(): number {
    return this.visitedUrls.size;
  }

  push(task: CrawlTask): void {
    this.tryEnqueue(task);
  }

  pushIfAbsent(task: CrawlTask): boolean {
    return this.tryEnqueue(task);
  }

  private tryEnqueue(task: CrawlTask): boolean {
    let normalizedUrl: string;
    try {
      normalizedUrl = canonicalizeUrl(task.url);
    } catch {
      return false;
    }

    if (isBlockedUrl(normalizedUrl)) return false;
    if (this.visitedUrls.has(normalizedUrl) || this.queuedUrls.has(normalizedUrl)) return false;

    this.queue.push({ ...task, url: normalizedUrl });
    this.queuedUrls.add(normalizedUrl);
    return true;
  }

  pop(): CrawlTask | undefined {
    if (this.size() === 0) return undefined;

    const nextTask = this.queue[this.queueHead++];
    if (this.queueHead > 1024 && this.queueHead > this.queue.length / 2) {
      this.queue = this.queue.slice(this.queueHead);
      this.queueHead = 0;
    }

    this.queuedUrls.delete(nextTask.url);
    return nextTask;
  }

  markVisited(url: string): void {
    this.visitedUrls.add(canonicalizeUrl(url));
  }

  isVisited(url: string): boolean {
    return this.visitedUrls.has(canonicalizeUrl(url));
  }

  has(url: string): boolean {
    let normalizedUrl: string;
    try {
      normalizedUrl = canonicalizeUrl(url);
    } catch {
      return false;
    }
    return this.queuedUrls.has(normalizedUrl) || this.visitedUrls.has(normalizedUrl);
  }

  /** Drops every queued task matching `predicate` and returns how many were removed. */
  discard(predicate: (task: CrawlTask) => boolean): number {
    const remaining = this.queue.slice(this.queueHead);
    const kept: CrawlTask[] = [];
    let removed = 0;

    for (const task of remaining) {
      if (predicate(task)) {
        this.queuedUrls.delete(task.url);
        removed++;
      } else {
        kept.push(task);
      }
    }

    this.queue = kept;
    this.queueHead = 0;
    return removed;
  }
}
