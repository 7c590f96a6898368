/**
 * Brand Store - JSON-file-backed storage for client brand configurations.
 *
 * The whole store is one JSON document mapping `client_id` to a
 * {@link BrandConfig}. An in-memory `Map` mirrors it; every mutation builds
 * the next snapshot, rewrites the document (temp file + rename), and only
 * then swaps the snapshot in, so memory never runs ahead of disk.
 *
 * Mutations are serialised through a {@link StoreLock}. Reads are served
 * from memory without taking the lock.
 *
 * @module brand-store
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { validateStoreDocument, type BrandConfig } from './brand-schema.js';
import { StoreLoadError } from './errors.js';
import { StoreLock } from './store-lock.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * What `open()` does with a store file that is not valid JSON or does not
 * match the schema: start empty (`reset`) or throw {@link StoreLoadError}.
 */
export type CorruptStorePolicy = 'reset' | 'fail';

export interface BrandStoreOptions {
  /** Default: `reset`. */
  onCorruptStore?: CorruptStorePolicy;
  /** Clock used for `created_at` / `updated_at`. */
  now?: () => Date;
}

type StoreState = 'new' | 'open' | 'closed';

// ---------------------------------------------------------------------------
// BrandStore Class
// ---------------------------------------------------------------------------

/**
 * @example
 * ```typescript
 * const store = new BrandStore('/srv/reports/data/brands.json');
 * store.open();
 *
 * await store.upsert(parseBrandConfig({ client_id: 'acme', display_name: 'Acme Co' }));
 * store.get('acme')?.created_at; // '2026-03-01T10:15:00.000Z'
 *
 * await store.close();
 * ```
 */
export class BrandStore {
  private readonly storePath: string;
  private readonly onCorruptStore: CorruptStorePolicy;
  private readonly now: () => Date;
  private readonly lock = new StoreLock();
  private cache = new Map<string, BrandConfig>();
  private state: StoreState = 'new';

  constructor(storePath: string, options: BrandStoreOptions = {}) {
    this.storePath = storePath;
    this.onCorruptStore = options.onCorruptStore ?? 'reset';
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load the backing document into memory. A missing file is an empty store.
   *
   * @throws {StoreLoadError} when the file is corrupt and the policy is `fail`
   */
  open(): void {
    if (this.state === 'open') return;
    fs.mkdirSync(path.dirname(this.storePath), { recursive: true });
    this.cache = this.load();
    this.state = 'open';
  }

  /**
   * Flush the current state and refuse further mutations.
   * Waits for in-flight mutations to finish first.
   */
  async close(): Promise<void> {
    if (this.state !== 'open') {
      this.state = 'closed';
      return;
    }
    await this.lock.runExclusive(() => {
      this.write(this.cache);
      this.state = 'closed';
    });
  }

  get path(): string {
    return this.storePath;
  }

  get size(): number {
    return this.cache.size;
  }

  get(clientId: string): BrandConfig | null {
    return this.cache.get(clientId) ?? null;
  }

  /** All records, in insertion order. */
  getAll(): BrandConfig[] {
    return [...this.cache.values()];
  }

  exists(clientId: string): boolean {
    return this.cache.has(clientId);
  }

  /**
   * Create or replace a brand configuration.
   *
   * Replacement keeps the stored `created_at`, and the stored `logo_path`
   * when the incoming record has none. `updated_at` is always refreshed.
   */
  async upsert(brand: BrandConfig): Promise<BrandConfig> {
    return this.mutate((next) => {
      const existing = next.get(brand.client_id);
      let saved: BrandConfig;

      if (existing) {
        saved = {
          ...brand,
          logo_path: brand.logo_path ?? existing.logo_path,
          created_at: existing.created_at ?? this.timestampAfter(null),
          updated_at: this.timestampAfter(existing.updated_at),
        };
      } else {
        const stamp = this.timestampAfter(null);
        saved = { ...brand, created_at: stamp, updated_at: stamp };
      }

      next.set(saved.client_id, saved);
      return saved;
    });
  }

  /** Record an uploaded logo path. Returns `null` for an unknown client. */
  async updateLogo(clientId: string, logoPath: string): Promise<BrandConfig | null> {
    return this.mutate((next) => {
      const existing = next.get(clientId);
      if (!existing) return null;

      const saved: BrandConfig = {
        ...existing,
        logo_path: logoPath,
        updated_at: this.timestampAfter(existing.updated_at),
      };
      next.set(clientId, saved);
      return saved;
    });
  }

  /** Returns whether the client existed. */
  async delete(clientId: string): Promise<boolean> {
    return this.mutate((next) => next.delete(clientId));
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  /**
   * Run `change` against a copy of the map under the lock, persist the copy,
   * then make it current. Nothing is written when `change` leaves it alone
   * (it returned `null` or `false`).
   */
  private async mutate<T>(change: (next: Map<string, BrandConfig>) => T): Promise<T> {
    return this.lock.runExclusive(() => {
      this.assertOpen();
      const next = new Map(this.cache);
      const result = change(next);
      if (result === null || result === false) {
        return result;
      }
      this.write(next);
      this.cache = next;
      return result;
    });
  }

  private assertOpen(): void {
    if (this.state === 'new') {
      throw new Error(`BrandStore ${this.storePath} is not open; call open() first`);
    }
    if (this.state === 'closed') {
      throw new Error(`BrandStore ${this.storePath} is closed`);
    }
  }

  /**
   * ISO timestamp for "now", pushed one millisecond past `previous` when the
   * clock has not moved, so `updated_at` strictly increases per record.
   */
  private timestampAfter(previous: string | null): string {
    let millis = this.now().getTime();
    if (previous !== null) {
      const prev = Date.parse(previous);
      if (Number.isFinite(prev) && millis <= prev) {
        millis = prev + 1;
      }
    }
    return new Date(millis).toISOString();
  }

  private load(): Map<string, BrandConfig> {
    if (!fs.existsSync(this.storePath)) {
      return new Map();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.storePath, 'utf-8'));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return this.handleCorrupt(`invalid JSON (${cause.message})`, cause);
    }

    const result = validateStoreDocument(raw);
    if (!result.success) {
      return this.handleCorrupt(`schema mismatch (${result.errors.join('; ')})`, null);
    }

    return new Map(Object.entries(result.data));
  }

  private handleCorrupt(reason: string, cause: Error | null): Map<string, BrandConfig> {
    if (this.onCorruptStore === 'fail') {
      throw new StoreLoadError(this.storePath, reason, cause);
    }
    console.warn(`[BrandStore] Ignoring unreadable store ${this.storePath}: ${reason}. Starting with an empty store.`);
    return new Map();
  }

  /** Rewrite the whole document atomically (temp file + rename). */
  private write(records: Map<string, BrandConfig>): void {
    const tmpPath = `${this.storePath}.tmp`;
    const json = JSON.stringify(Object.fromEntries(records), null, 2) + '\n';

    fs.mkdirSync(path.dirname(this.storePath), { recursive: true });
    fs.writeFileSync(tmpPath, json, 'utf-8');
    fs.renameSync(tmpPath, this.storePath);
  }
}
