import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import { loadCountyCatalog, parseCountyCatalog } from '../../src/infrastructure/county-catalog.js';

describe('parseCountyCatalog', () => {
  it('converts entries and string tax rates', () => {
    const result = parseCountyCatalog([
      { canonical_name: 'Santa Clara', tax_rate: '1.25' },
      { canonical_name: 'San Mateo', tax_rate: 1.13 },
    ]);

    expect(result).toEqual({
      ok: true,
      value: [
        { canonicalName: 'Santa Clara', taxRate: 1.25 },
        { canonicalName: 'San Mateo', taxRate: 1.13 },
      ],
    });
    if (result.ok) {
      expect(Object.isFrozen(result.value)).toBe(true);
      expect(Object.isFrozen(result.value[0])).toBe(true);
    }
  });

  it('rejects duplicate names', () => {
    const result = parseCountyCatalog([
      { canonical_name: 'Santa Clara', tax_rate: 1.25 },
      { canonical_name: 'Santa Clara', tax_rate: 1.3 },
    ]);

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'CATALOG_INVALID',
        message: 'County catalog failed schema validation',
        details: "1.canonical_name: duplicate canonical_name 'Santa Clara'",
        retryable: false,
      },
    });
  });

  it('rejects a document that is not a list', () => {
    const result = parseCountyCatalog({ counties: [] });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('CATALOG_INVALID');
  });

  it('rejects a negative tax rate', () => {
    const result = parseCountyCatalog([{ canonical_name: 'Santa Clara', tax_rate: -1 }]);
    expect(result.ok).toBe(false);
  });
});

describe('loadCountyCatalog', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'county-catalog-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the bundled catalog', () => {
    const result = loadCountyCatalog('data/counties.json');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.find((county) => county.canonicalName === 'Santa Clara')).toEqual({
      canonicalName: 'Santa Clara',
      taxRate: 1.25,
    });
  });

  it('reads a catalog file', () => {
    const path = join(dir, 'catalog.json');
    writeFileSync(path, JSON.stringify([{ canonical_name: 'Santa Cruz', tax_rate: '1.08' }]));

    expect(loadCountyCatalog(path)).toEqual({ ok: true, value: [{ canonicalName: 'Santa Cruz', taxRate: 1.08 }] });
  });

  it('reports a missing file as CATALOG_LOAD_FAILED', () => {
    const path = join(dir, 'missing.json');
    const result = loadCountyCatalog(path);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('CATALOG_LOAD_FAILED');
    expect(result.error.message).toBe(`Cannot read county catalog at '${path}'`);
  });

  it('reports unparseable JSON as CATALOG_INVALID', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '[{"canonical_name": ');

    const result = loadCountyCatalog(path);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('CATALOG_INVALID');
    expect(result.error.message).toBe(`County catalog at '${path}' is not valid JSON`);
  });
});

describe('initCountyCatalog / getCountyCatalog', () => {
  let dir: string;

  // Each test gets a fresh module so the process-wide catalog starts empty.
  const freshModule = () => import('../../src/infrastructure/county-catalog.js');

  function writeCatalog(name: string, entries: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, JSON.stringify(entries));
    return path;
  }

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'county-catalog-init-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.resetModules();
  });

  it('throws from get before init has run', async () => {
    const { getCountyCatalog } = await freshModule();

    expect(() => getCountyCatalog()).toThrow('County catalog has not been initialized');
  });

  it('returns the loaded catalog after init', async () => {
    const { initCountyCatalog, getCountyCatalog } = await freshModule();
    const path = writeCatalog('one.json', [{ canonical_name: 'Santa Cruz', tax_rate: '1.08' }]);

    initCountyCatalog(path);

    expect(getCountyCatalog()).toEqual([{ canonicalName: 'Santa Cruz', taxRate: 1.08 }]);
    expect(Object.isFrozen(getCountyCatalog())).toBe(true);
  });

  it('loads only once', async () => {
    const { initCountyCatalog, getCountyCatalog } = await freshModule();
    const first = writeCatalog('first.json', [{ canonical_name: 'Santa Clara', tax_rate: 1.25 }]);
    const second = writeCatalog('second.json', [{ canonical_name: 'San Mateo', tax_rate: 1.13 }]);

    initCountyCatalog(first);
    const loaded = getCountyCatalog();
    initCountyCatalog(second);

    expect(getCountyCatalog()).toBe(loaded);
    expect(loaded).toEqual([{ canonicalName: 'Santa Clara', taxRate: 1.25 }]);
  });

  it('throws on a missing file and stays uninitialized', async () => {
    const { initCountyCatalog, getCountyCatalog } = await freshModule();
    const path = join(dir, 'missing.json');

    expect(() => initCountyCatalog(path)).toThrow(`[CATALOG_LOAD_FAILED] Cannot read county catalog at '${path}': `);
    expect(() => getCountyCatalog()).toThrow('County catalog has not been initialized');
  });

  it('throws on a catalog that fails validation', async () => {
    const { initCountyCatalog } = await freshModule();
    const path = writeCatalog('duplicate.json', [
      { canonical_name: 'Santa Clara', tax_rate: 1.25 },
      { canonical_name: 'Santa Clara', tax_rate: 1.3 },
    ]);

    expect(() => initCountyCatalog(path)).toThrow(
      "[CATALOG_INVALID] County catalog failed schema validation: 1.canonical_name: duplicate canonical_name 'Santa Clara'",
    );
  });
});
