import path from 'path';
import { CRAWLER_CONFIG } from '../config';
import { PersistError } from '../errors';
import type { ArticleRecord, ArticleSink, OutputArtifact } from '../types';
import { CsvStore } from './csvStore';
import { ensureDirectory, removeJsonDocument, resolveArticlePath, writeJsonDocument } from './jsonStore';

export interface FileSinkOptions {
  outputDir: string;
  csvFileName?: string;
  articlesDirName?: string;
  debugDirName?: string;
}

/** Writes every qualifying article twice: a CSV row and its own JSON file. */
export class FileSink implements ArticleSink {
  readonly outputDir: string;
  readonly csvPath: string;
  readonly articlesDir: string;
  readonly debugDir: string;
  private readonly csvStore: CsvStore;
  private opened = false;
  private debugDirReady = false;

  constructor(options: FileSinkOptions) {
    this.outputDir = options.outputDir;
    this.csvPath = path.join(options.outputDir, options.csvFileName ?? CRAWLER_CONFIG.output.csvFileName);
    this.articlesDir = path.join(options.outputDir, options.articlesDirName ?? CRAWLER_CONFIG.output.articlesDirName);
    this.debugDir = path.join(options.outputDir, options.debugDirName ?? CRAWLER_CONFIG.output.debugDirName);
    this.csvStore = new CsvStore(this.csvPath);
  }

  /** Prepares the output directories and the CSV header. Every failure here is fatal. */
  async open(): Promise<void> {
    await ensureDirectory(this.outputDir);
    await ensureDirectory(this.articlesDir);
    await this.csvStore.open();
    this.opened = true;
  }

  async persist(artifact: OutputArtifact): Promise<void> {
    if (!this.opened) {
      throw new PersistError(this.outputDir, 'Sink used before open()', { fatal: true });
    }

    const articlePath = resolveArticlePath(this.articlesDir, artifact.index, artifact.record.title, artifact.record.url);
    await writeJsonDocument(articlePath, artifact);
    try {
      await this.csvStore.append(artifact);
    } catch (error) {
      // the index is reused by the next article, so no JSON file may outlive its CSV row
      await removeJsonDocument(articlePath);
      throw error;
    }
  }

  /** Debug copy of a page that did not mention the keyword. */
  async dump(record: ArticleRecord, index: number): Promise<void> {
    if (!this.debugDirReady) {
      await ensureDirectory(this.debugDir);
      this.debugDirReady = true;
    }
    await writeJsonDocument(resolveArticlePath(this.debugDir, index, record.title, record.url), record);
  }
}
