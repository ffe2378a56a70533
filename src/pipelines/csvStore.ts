import * as CsvWriter from 'csv-writer';
import { PersistError, describeError } from '../errors';
import type { Entity, OutputArtifact } from '../types';

export const LIST_SEPARATOR = '; ';
export const CONTEXT_SEPARATOR = ' | ';

type CsvRecord = {
  index: number;
  url: string;
  title: string;
  publishedDate: string;
  author: string;
  tags: string;
  mainImageUrl: string;
  wordCount: number;
  occurrenceCount: number;
  contexts: string;
  nearbyNumbers: string;
  nearbyDates: string;
  entities: string;
  fetchedAt: string;
};

/** Column order of the run CSV; stable across runs. */
export const CSV_HEADER: Array<{ id: keyof CsvRecord; title: string }> = [
  { id: 'index', title: 'index' },
  { id: 'url', title: 'url' },
  { id: 'title', title: 'title' },
  { id: 'publishedDate', title: 'publishedDate' },
  { id: 'author', title: 'author' },
  { id: 'tags', title: 'tags' },
  { id: 'mainImageUrl', title: 'mainImageUrl' },
  { id: 'wordCount', title: 'wordCount' },
  { id: 'occurrenceCount', title: 'occurrenceCount' },
  { id: 'contexts', title: 'contexts' },
  { id: 'nearbyNumbers', title: 'nearbyNumbers' },
  { id: 'nearbyDates', title: 'nearbyDates' },
  { id: 'entities', title: 'entities' },
  { id: 'fetchedAt', title: 'fetchedAt' }
];

function formatEntities(entities: Entity[]): string {
  return entities.map(entity => `${entity.text} [${entity.label}]`).join(LIST_SEPARATOR);
}

export function mapArtifactToCsvRecord(artifact: OutputArtifact): CsvRecord {
  const { record, matches, signals } = artifact;

  return {
    index: artifact.index,
    url: record.url,
    title: record.title ?? '',
    publishedDate: record.publishedDate ?? '',
    author: record.author ?? '',
    tags: record.tags.join(LIST_SEPARATOR),
    mainImageUrl: record.mainImageUrl ?? '',
    wordCount: artifact.lexical.wordCount,
    occurrenceCount: matches.length,
    contexts: matches.map(match => match.contextWindow.trim()).join(CONTEXT_SEPARATOR),
    nearbyNumbers: signals.nearbyNumbers.join(LIST_SEPARATOR),
    nearbyDates: signals.nearbyDates.join(LIST_SEPARATOR),
    entities: formatEntities(artifact.entities),
    fetchedAt: artifact.fetchedAt
  };
}

/** One row per article; the file is truncated and given its header when opened. */
export class CsvStore {
  private readonly csvPath: string;
  private readonly csvWriter: ReturnType<typeof CsvWriter.createObjectCsvWriter>;

  constructor(csvPath: string) {
    this.csvPath = csvPath;
    this.csvWriter = CsvWriter.createObjectCsvWriter({
      path: csvPath,
      header: CSV_HEADER,
      append: false
    });
  }

  async open(): Promise<void> {
    try {
      await this.csvWriter.writeRecords([]);
    } catch (error) {
      throw new PersistError(this.csvPath, `Cannot create ${this.csvPath}: ${describeError(error)}`, {
        fatal: true,
        cause: error
      });
    }
  }

  async append(artifact: OutputArtifact): Promise<void> {
    try {
      await this.csvWriter.writeRecords([mapArtifactToCsvRecord(artifact)]);
    } catch (error) {
      throw PersistError.fromFsError(this.csvPath, error);
    }
  }
}
