import { CRAWLER_CONFIG, type EntityBackendName } from '../config';
import { describeError } from '../errors';
import type { Entity, EntityLabel } from '../types';

export interface EntityBackend {
  readonly name: string;
  recognize(text: string): Entity[];
}

interface CompromiseView {
  json(options?: object): unknown;
}

interface CompromiseDocument {
  people(): CompromiseView;
  places(): CompromiseView;
  organizations(): CompromiseView;
}

type CompromiseFactory = (text: string) => CompromiseDocument;

let unavailableWarningEmitted = false;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toEntities(results: unknown, label: EntityLabel, text: string): Entity[] {
  if (!Array.isArray(results)) return [];
  const entities: Entity[] = [];
  let searchFrom = 0;

  for (const item of results) {
    if (!isRecord(item) || typeof item.text !== 'string') continue;
    const surface = item.text.trim().replace(/[.,;:!?]+$/, '');
    if (!surface) continue;

    const offset = isRecord(item.offset) ? item.offset : undefined;
    let start = offset ? readNumber(offset, 'start') : undefined;
    if (start === undefined || text.slice(start, start + surface.length) !== surface) {
      const located = text.indexOf(surface, searchFrom);
      if (located === -1) continue;
      start = located;
    }

    searchFrom = start + surface.length;
    entities.push({ text: surface, label, charSpan: [start, start + surface.length] });
  }

  return entities;
}

export function createCompromiseBackend(nlp: CompromiseFactory): EntityBackend {
  return {
    name: 'compromise',
    recognize(text: string): Entity[] {
      const doc = nlp(text);
      const entities = [
        ...toEntities(doc.people().json({ offset: true }), 'PER', text),
        ...toEntities(doc.places().json({ offset: true }), 'LOC', text),
        ...toEntities(doc.organizations().json({ offset: true }), 'ORG', text)
      ];
      return entities.sort((a, b) => a.charSpan[0] - b.charSpan[0] || a.charSpan[1] - b.charSpan[1]);
    }
  };
}

/**
 * Probes the optional NLP package once. A missing or broken install yields null;
 * callers hand the result to {@link EntityEnricher} and never probe again.
 */
export async function resolveEntityBackend(
  backendName: EntityBackendName = CRAWLER_CONFIG.entityBackend
): Promise<EntityBackend | null> {
  if (backendName === 'none') return null;

  try {
    const compromise = await import('compromise');
    const nlp: CompromiseFactory = compromise.default;
    return createCompromiseBackend(nlp);
  } catch (error) {
    console.log({ backend: backendName, err: describeError(error) }, 'NLP backend not loadable');
    return null;
  }
}

export class EntityEnricher {
  private readonly backend: EntityBackend | null;

  constructor(backend: EntityBackend | null) {
    this.backend = backend;
  }

  get available(): boolean {
    return this.backend !== null;
  }

  enrich(text: string): Entity[] {
    if (!this.backend) {
      if (!unavailableWarningEmitted) {
        unavailableWarningEmitted = true;
        console.warn('Named-entity backend unavailable; articles are stored without entities');
      }
      return [];
    }

    if (!text.trim()) return [];

    try {
      return this.backend.recognize(text);
    } catch (error) {
      console.error({ backend: this.backend.name, err: describeError(error) }, 'Entity recognition failed');
      return [];
    }
  }
}
