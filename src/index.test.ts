import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runCrawl } from './index';

describe('runCrawl', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keyword-run-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('leaves earlier output untouched when the article budget is zero', async () => {
    const csvPath = path.join(outputDir, 'drimble_vuurwerk.csv');
    fs.writeFileSync(csvPath, 'vorige run\n');

    const report = await runCrawl({ outputDir, maxTotalArticles: 0, delaySeconds: 0, entityBackend: 'none' });

    expect(report.stopReason).toBe('max_total_articles');
    expect(report.attempted).toBe(0);
    expect(fs.readFileSync(csvPath, 'utf8')).toBe('vorige run\n');
    expect(fs.existsSync(path.join(outputDir, 'articles'))).toBe(false);
    expect(JSON.parse(fs.readFileSync(path.join(outputDir, 'run-report.json'), 'utf8'))).toEqual(report);
  });

  it('rejects an empty keyword', async () => {
    await expect(runCrawl({ outputDir, keyword: '' })).rejects.toThrow('No keyword configured; set KEYWORD');
  });
});
