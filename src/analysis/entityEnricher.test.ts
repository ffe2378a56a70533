import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EntityEnricher, createCompromiseBackend, resolveEntityBackend, type EntityBackend } from './entityEnricher';

function fakeNlp(results: { people?: unknown; places?: unknown; organizations?: unknown }) {
  return (_text: string) => ({
    people: () => ({ json: () => results.people ?? [] }),
    places: () => ({ json: () => results.places ?? [] }),
    organizations: () => ({ json: () => results.organizations ?? [] })
  });
}

describe('EntityEnricher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('warns once per process when no backend is available', async () => {
    vi.resetModules();
    const fresh = await import('./entityEnricher');
    const first = new fresh.EntityEnricher(null);
    const second = new fresh.EntityEnricher(null);

    expect(first.enrich('Mark Rutte in Den Haag')).toEqual([]);
    expect(first.enrich('Nog een tekst')).toEqual([]);
    expect(second.enrich('En nog een')).toEqual([]);

    expect(first.available).toBe(false);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith('Named-entity backend unavailable; articles are stored without entities');
  });

  it('returns nothing for empty text', () => {
    const recognize = vi.fn(() => []);
    const enricher = new EntityEnricher({ name: 'fake', recognize });

    expect(enricher.enrich('   ')).toEqual([]);
    expect(recognize).not.toHaveBeenCalled();
  });

  it('contains backend failures', () => {
    const failing: EntityBackend = {
      name: 'broken',
      recognize() {
        throw new Error('model crashed');
      }
    };

    expect(new EntityEnricher(failing).enrich('Amsterdam')).toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});

describe('createCompromiseBackend', () => {
  it('maps people, places and organisations to labelled spans', () => {
    const text = 'Mark Rutte bezocht Amsterdam.';
    const backend = createCompromiseBackend(
      fakeNlp({
        people: [{ text: 'Mark Rutte', offset: { start: 0, length: 10 } }],
        places: [{ text: 'Amsterdam.', offset: { start: 19, length: 10 } }]
      })
    );

    expect(backend.recognize(text)).toEqual([
      { text: 'Mark Rutte', label: 'PER', charSpan: [0, 10] },
      { text: 'Amsterdam', label: 'LOC', charSpan: [19, 28] }
    ]);
  });

  it('locates entities without usable offsets and ignores malformed output', () => {
    const text = 'De KNVB en de KNVB-top.';
    const backend = createCompromiseBackend(
      fakeNlp({ organizations: [{ text: 'KNVB' }, { text: 'KNVB' }, { nope: true }, 'KNVB'] })
    );

    expect(backend.recognize(text)).toEqual([
      { text: 'KNVB', label: 'ORG', charSpan: [3, 7] },
      { text: 'KNVB', label: 'ORG', charSpan: [14, 18] }
    ]);
  });
});

describe('resolveEntityBackend', () => {
  it('returns null when entity recognition is switched off', async () => {
    await expect(resolveEntityBackend('none')).resolves.toBeNull();
  });
});
