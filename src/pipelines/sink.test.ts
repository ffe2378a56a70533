import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PersistError } from '../errors';
import type { OutputArtifact } from '../types';
import { buildArticleFileName, generateUrlHash, slugifyTitle } from './jsonStore';
import { FileSink } from './sink';

const HEADER =
  'index,url,title,publishedDate,author,tags,mainImageUrl,wordCount,occurrenceCount,contexts,nearbyNumbers,nearbyDates,entities,fetchedAt';

function artifact(overrides: { index?: number; url?: string; title?: string } = {}): OutputArtifact {
  const url = overrides.url ?? 'https://drimble.nl/nieuws/a';
  return {
    index: overrides.index ?? 1,
    keyword: 'vuurwerk',
    fetchedAt: '2025-01-01T00:00:00.000Z',
    record: {
      url,
      title: overrides.title ?? 'Vuurwerk in Rotterdam',
      publishedDate: '2024-12-31',
      author: 'Redactie',
      tags: ['vuurwerk', 'Rotterdam'],
      fullText: 'Veel vuurwerk in Rotterdam',
      outboundLinks: []
    },
    matches: [
      {
        occurrenceIndex: 0,
        charOffset: 5,
        contextWindow: 'Veel vuurwerk in ',
        containingSentence: 'Veel vuurwerk in Rotterdam'
      }
    ],
    signals: { nearbyNumbers: ['12'], nearbyDates: [] },
    entities: [{ text: 'Rotterdam', label: 'LOC', charSpan: [17, 26] }],
    lexical: { wordCount: 4, topTerms: [{ term: 'vuurwerk', frequency: 1 }] }
  };
}

describe('FileSink', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keyword-crawler-'));
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('writes the CSV header when opened', async () => {
    const sink = new FileSink({ outputDir });
    await sink.open();

    expect(sink.csvPath).toBe(path.join(outputDir, 'drimble_vuurwerk.csv'));
    expect(fs.readFileSync(sink.csvPath, 'utf8')).toBe(`${HEADER}\n`);
    expect(fs.statSync(sink.articlesDir).isDirectory()).toBe(true);
  });

  it('writes one CSV row and one JSON file per article', async () => {
    const sink = new FileSink({ outputDir });
    await sink.open();
    const written = artifact();

    await sink.persist(written);

    expect(fs.readFileSync(sink.csvPath, 'utf8')).toBe(
      `${HEADER}\n` +
        '1,https://drimble.nl/nieuws/a,Vuurwerk in Rotterdam,2024-12-31,Redactie,vuurwerk; Rotterdam,,4,1,' +
        'Veel vuurwerk in,12,,Rotterdam [LOC],2025-01-01T00:00:00.000Z\n'
    );

    const fileName = `0001_vuurwerk-in-rotterdam_${generateUrlHash('https://drimble.nl/nieuws/a')}.json`;
    expect(fs.readdirSync(sink.articlesDir)).toEqual([fileName]);
    const json = fs.readFileSync(path.join(sink.articlesDir, fileName), 'utf8');
    expect(json.endsWith('}\n')).toBe(true);
    expect(JSON.parse(json)).toEqual(written);
  });

  it('quotes CSV fields that contain commas', async () => {
    const sink = new FileSink({ outputDir });
    await sink.open();

    await sink.persist(artifact({ title: 'Vuurwerk, knallen en rook' }));

    const [, row] = fs.readFileSync(sink.csvPath, 'utf8').split('\n');
    expect(row.startsWith('1,https://drimble.nl/nieuws/a,"Vuurwerk, knallen en rook",2024-12-31,')).toBe(true);
  });

  it('keeps articles with identical titles in separate files', async () => {
    const sink = new FileSink({ outputDir });
    await sink.open();

    await sink.persist(artifact({ index: 1, url: 'https://drimble.nl/nieuws/a' }));
    await sink.persist(artifact({ index: 1, url: 'https://drimble.nl/nieuws/b' }));

    expect(fs.readdirSync(sink.articlesDir)).toHaveLength(2);
    expect(fs.readFileSync(sink.csvPath, 'utf8').split('\n')).toHaveLength(4);
  });

  it('removes the JSON file when the CSV row cannot be written', async () => {
    const sink = new FileSink({ outputDir });
    await sink.open();
    fs.rmSync(sink.csvPath);
    fs.mkdirSync(sink.csvPath);

    const error = await sink.persist(artifact()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PersistError);
    if (!(error instanceof PersistError)) return;
    expect(error.fatal).toBe(false);
    expect(fs.readdirSync(sink.articlesDir)).toEqual([]);
  });

  it('truncates the CSV of an earlier run', async () => {
    const first = new FileSink({ outputDir });
    await first.open();
    await first.persist(artifact());

    const second = new FileSink({ outputDir });
    await second.open();

    expect(fs.readFileSync(second.csvPath, 'utf8')).toBe(`${HEADER}\n`);
  });

  it('fails fatally when the output directory cannot be created', async () => {
    const blocker = path.join(outputDir, 'bestand');
    fs.writeFileSync(blocker, 'geen map');

    const error = await new FileSink({ outputDir: blocker }).open().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PersistError);
    if (!(error instanceof PersistError)) return;
    expect(error.fatal).toBe(true);
    expect(error.path).toBe(blocker);
  });

  it('refuses to persist before open', async () => {
    const error = await new FileSink({ outputDir }).persist(artifact()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PersistError);
    if (!(error instanceof PersistError)) return;
    expect(error.fatal).toBe(true);
  });

  it('dumps non-matching records into the debug directory', async () => {
    const sink = new FileSink({ outputDir });
    const { record } = artifact();

    await sink.dump(record, 3);

    const fileName = buildArticleFileName(3, record.title, record.url);
    expect(JSON.parse(fs.readFileSync(path.join(sink.debugDir, fileName), 'utf8'))).toEqual(record);
  });
});

describe('article file names', () => {
  it('slugifies titles', () => {
    expect(slugifyTitle('Vuurwerk: één knal!')).toBe('vuurwerk-een-knal');
    expect(slugifyTitle(undefined)).toBe('untitled');
    expect(slugifyTitle('!!!')).toBe('untitled');
  });

  it('caps the slug length without a trailing dash', () => {
    const slug = slugifyTitle(`${'a'.repeat(49)} bcd`);
    expect(slug).toBe('a'.repeat(49));
  });

  it('pads the index and appends a URL hash', () => {
    const fileName = buildArticleFileName(7, 'Oud en nieuw', 'https://drimble.nl/nieuws/x');
    expect(fileName).toMatch(/^0007_oud-en-nieuw_[0-9a-f]{10}\.json$/);
    expect(generateUrlHash('https://drimble.nl/nieuws/x')).toHaveLength(10);
  });
});
