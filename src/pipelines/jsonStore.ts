import * as crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { PersistError, describeError } from '../errors';

const MAX_SLUG_LENGTH = 50;

export function generateUrlHash(value: string, length = 10): string {
  return crypto.createHash('sha256').update(value).digest('hex').slice(0, length);
}

export function slugifyTitle(title: string | undefined): string {
  const slug = (title ?? '')
    .normalize('NFD')
    .replace(/\p{Diacritic}/gu, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, '');
  return slug || 'untitled';
}

/** `{index}_{slug}_{hash}.json`; the URL hash keeps articles with identical titles apart. */
export function buildArticleFileName(index: number, title: string | undefined, url: string): string {
  return `${String(index).padStart(4, '0')}_${slugifyTitle(title)}_${generateUrlHash(url)}.json`;
}

export async function writeJsonDocument(filePath: string, payload: unknown): Promise<void> {
  try {
    await fs.promises.writeFile(filePath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
  } catch (error) {
    throw PersistError.fromFsError(filePath, error);
  }
}

/** Best-effort removal of a document whose companion write failed. */
export async function removeJsonDocument(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (error) {
    console.error({ path: filePath, err: describeError(error) }, 'Could not remove orphaned article file');
  }
}

export async function ensureDirectory(dir: string): Promise<void> {
  try {
    await fs.promises.mkdir(dir, { recursive: true });
    await fs.promises.access(dir, fs.constants.W_OK);
  } catch (error) {
    throw new PersistError(dir, `Output directory ${dir} is not writable`, { fatal: true, cause: error });
  }
}

export function resolveArticlePath(dir: string, index: number, title: string | undefined, url: string): string {
  return path.join(dir, buildArticleFileName(index, title, url));
}
