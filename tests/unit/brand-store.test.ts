/**
 * Tests for src/brand-store.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { parseBrandConfig, type BrandConfigInput } from '../../src/brand-schema.js';
import { BrandStore, type BrandStoreOptions } from '../../src/brand-store.js';
import { StoreLoadError } from '../../src/errors.js';
import { makeTempDir } from '../helpers/docx-fixtures.js';

function brand(input: Partial<BrandConfigInput> & { client_id: string }) {
  return parseBrandConfig({ display_name: `${input.client_id} Inc`, ...input });
}

describe('BrandStore', () => {
  let testDir: string;
  let storePath: string;
  let clock: Date;
  const now = () => clock;

  beforeEach(() => {
    testDir = makeTempDir('brand-store-');
    storePath = path.join(testDir, 'data', 'brands.json');
    clock = new Date('2026-03-01T10:00:00.000Z');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function openStore(options: BrandStoreOptions = {}): BrandStore {
    const store = new BrandStore(storePath, { now, ...options });
    store.open();
    return store;
  }

  describe('open', () => {
    it('should start empty when the file does not exist', () => {
      const store = openStore();

      expect(store.size).toBe(0);
      expect(store.getAll()).toEqual([]);
      expect(fs.existsSync(path.dirname(storePath))).toBe(true);
    });

    it('should reset an unparseable file with a warning', () => {
      fs.mkdirSync(path.dirname(storePath), { recursive: true });
      fs.writeFileSync(storePath, '{ not json', 'utf-8');
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      const store = openStore();

      expect(store.size).toBe(0);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(String(warn.mock.calls[0]?.[0])).toMatch(/^\[BrandStore\] Ignoring unreadable store .*invalid JSON/);
    });

    it('should reset a file that does not match the schema', () => {
      fs.mkdirSync(path.dirname(storePath), { recursive: true });
      fs.writeFileSync(storePath, JSON.stringify({ acme: { client_id: 'acme' } }), 'utf-8');
      vi.spyOn(console, 'warn').mockImplementation(() => {});

      expect(openStore().size).toBe(0);
    });

    it('should keep records whose timestamps carry an offset or no zone', async () => {
      fs.mkdirSync(path.dirname(storePath), { recursive: true });
      fs.writeFileSync(
        storePath,
        JSON.stringify({
          acme: {
            client_id: 'acme',
            display_name: 'Acme Co',
            created_at: '2026-03-01T10:15:00.123456',
            updated_at: '2026-03-01T10:15:00.123456',
          },
          globex: {
            client_id: 'globex',
            display_name: 'Globex',
            created_at: '2026-03-01T10:15:00+00:00',
            updated_at: '2026-03-01T11:15:00+01:00',
          },
        }),
        'utf-8',
      );
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      const store = openStore();
      await store.upsert(brand({ client_id: 'initech' }));

      expect(warn).not.toHaveBeenCalled();
      expect(store.get('acme')?.created_at).toBe('2026-03-01T10:15:00.123Z');
      expect(store.get('globex')?.updated_at).toBe('2026-03-01T10:15:00.000Z');
      const onDisk: Record<string, unknown> = JSON.parse(fs.readFileSync(storePath, 'utf-8'));
      expect(Object.keys(onDisk)).toEqual(['acme', 'globex', 'initech']);
    });

    it('should throw StoreLoadError under the fail policy', () => {
      fs.mkdirSync(path.dirname(storePath), { recursive: true });
      fs.writeFileSync(storePath, '[1, 2', 'utf-8');

      expect(() => openStore({ onCorruptStore: 'fail' })).toThrow(StoreLoadError);
    });

    it('should refuse mutations before open', async () => {
      const store = new BrandStore(storePath, { now });

      await expect(store.upsert(brand({ client_id: 'acme' }))).rejects.toThrow(
        `BrandStore ${storePath} is not open; call open() first`,
      );
    });
  });

  describe('upsert', () => {
    it('should stamp a new record with equal created_at and updated_at', async () => {
      const store = openStore();

      const saved = await store.upsert(brand({ client_id: 'acme', primary_color: '#0055AA' }));

      expect(saved.created_at).toBe('2026-03-01T10:00:00.000Z');
      expect(saved.updated_at).toBe('2026-03-01T10:00:00.000Z');
      expect(store.get('acme')).toEqual(saved);
      expect(store.exists('acme')).toBe(true);
    });

    it('should keep created_at and refresh updated_at on replace', async () => {
      const store = openStore();
      await store.upsert(brand({ client_id: 'acme', primary_color: '#0055AA' }));

      clock = new Date('2026-03-02T08:30:00.000Z');
      const saved = await store.upsert(brand({ client_id: 'acme', primary_color: '#FF0000' }));

      expect(saved.created_at).toBe('2026-03-01T10:00:00.000Z');
      expect(saved.updated_at).toBe('2026-03-02T08:30:00.000Z');
      expect(saved.primary_color).toBe('#FF0000');
      expect(store.size).toBe(1);
    });

    it('should advance updated_at even when the clock has not moved', async () => {
      const store = openStore();
      await store.upsert(brand({ client_id: 'acme' }));

      const second = await store.upsert(brand({ client_id: 'acme' }));
      const third = await store.upsert(brand({ client_id: 'acme' }));

      expect(second.updated_at).toBe('2026-03-01T10:00:00.001Z');
      expect(third.updated_at).toBe('2026-03-01T10:00:00.002Z');
    });

    it('should ignore client-supplied timestamps', async () => {
      const store = openStore();

      const saved = await store.upsert(
        brand({ client_id: 'acme', created_at: '2020-01-01T00:00:00.000Z', updated_at: '2020-01-01T00:00:00.000Z' }),
      );

      expect(saved.created_at).toBe('2026-03-01T10:00:00.000Z');
    });

    it('should keep the stored logo_path when the update has none', async () => {
      const store = openStore();
      await store.upsert(brand({ client_id: 'acme' }));
      await store.updateLogo('acme', '/srv/brands/acme_logo.png');

      const saved = await store.upsert(brand({ client_id: 'acme', display_name: 'Acme Renamed' }));

      expect(saved.logo_path).toBe('/srv/brands/acme_logo.png');
      expect(saved.display_name).toBe('Acme Renamed');
    });

    it('should list records in insertion order', async () => {
      const store = openStore();
      await store.upsert(brand({ client_id: 'zeta' }));
      await store.upsert(brand({ client_id: 'alpha' }));
      await store.upsert(brand({ client_id: 'zeta', display_name: 'Zeta Again' }));

      expect(store.getAll().map((b) => b.client_id)).toEqual(['zeta', 'alpha']);
    });

    it('should serialise concurrent writers without losing records', async () => {
      const store = openStore();

      await Promise.all(
        Array.from({ length: 10 }, (_, i) => store.upsert(brand({ client_id: `client-${i}` }))),
      );

      expect(store.size).toBe(10);
      const onDisk: Record<string, unknown> = JSON.parse(fs.readFileSync(storePath, 'utf-8'));
      expect(Object.keys(onDisk)).toHaveLength(10);
    });
  });

  describe('updateLogo', () => {
    it('should set logo_path and bump updated_at', async () => {
      const store = openStore();
      await store.upsert(brand({ client_id: 'acme' }));

      const saved = await store.updateLogo('acme', '/srv/brands/acme_logo.svg');

      expect(saved?.logo_path).toBe('/srv/brands/acme_logo.svg');
      expect(saved?.updated_at).toBe('2026-03-01T10:00:00.001Z');
    });

    it('should return null for an unknown client', async () => {
      const store = openStore();
      expect(await store.updateLogo('ghost', '/srv/brands/ghost_logo.png')).toBeNull();
      expect(fs.existsSync(storePath)).toBe(false);
    });
  });

  describe('delete', () => {
    it('should remove an existing record', async () => {
      const store = openStore();
      await store.upsert(brand({ client_id: 'acme' }));

      expect(await store.delete('acme')).toBe(true);
      expect(store.get('acme')).toBeNull();
      expect(store.size).toBe(0);
    });

    it('should report false and change nothing for an unknown client', async () => {
      const store = openStore();
      await store.upsert(brand({ client_id: 'acme' }));

      expect(await store.delete('ghost')).toBe(false);
      expect(store.size).toBe(1);
    });
  });

  describe('persistence', () => {
    it('should round-trip through the backing file', async () => {
      const first = openStore();
      await first.upsert(brand({ client_id: 'acme', primary_color: '#0055AA', website_url: 'https://acme.test' }));
      await first.upsert(brand({ client_id: 'globex' }));
      await first.close();

      const second = openStore();

      expect(second.getAll()).toEqual(first.getAll());
      expect(second.get('acme')?.website_url).toBe('https://acme.test');
    });

    it('should write pretty JSON keyed by client id and leave no temp file', async () => {
      const store = openStore();
      await store.upsert(brand({ client_id: 'acme' }));

      const text = fs.readFileSync(storePath, 'utf-8');
      expect(text.startsWith('{\n  "acme": {\n')).toBe(true);
      expect(text.endsWith('}\n')).toBe(true);
      expect(fs.existsSync(`${storePath}.tmp`)).toBe(false);
    });

    it('should reject mutations after close', async () => {
      const store = openStore();
      await store.close();

      await expect(store.delete('acme')).rejects.toThrow(`BrandStore ${storePath} is closed`);
    });
  });
});
