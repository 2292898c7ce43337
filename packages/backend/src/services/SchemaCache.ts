import type { SchemaStore, SchemaSummary } from "@graphqa/shared";
import { logger } from "../utils/logger.js";

export interface SchemaSnapshot {
  readonly summary: SchemaSummary;
  readonly fetchedAt: number;
  readonly version: number;
}

export interface SchemaCacheOptions {
  ttlMs: number;
  sampleLimit: number;
  now: () => number;
}

const defaultOptions: SchemaCacheOptions = {
  ttlMs: 300_000,
  sampleLimit: 20,
  now: () => Date.now()
};

/**
 * Read-only, time-bounded copy of the graph's shape used to ground query
 * generation. Snapshots are swapped whole; at most one refresh runs at a time
 * and readers arriving during it keep the previous snapshot.
 */
export class SchemaCache {
  private snapshot: SchemaSnapshot | null = null;
  private inflight: Promise<SchemaSnapshot> | null = null;
  private invalidated = false;
  private readonly options: SchemaCacheOptions;

  constructor(
    private readonly store: SchemaStore,
    options: Partial<SchemaCacheOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  async getSchema(): Promise<SchemaSummary> {
    const current = this.snapshot;
    if (current && !this.isStale(current)) {
      return current.summary;
    }

    if (this.inflight) {
      if (current) {
        return current.summary;
      }
      return (await this.inflight).summary;
    }

    return (await this.refresh()).summary;
  }

  peek(): SchemaSnapshot | null {
    return this.snapshot;
  }

  invalidate(): void {
    this.invalidated = true;
  }

  private isStale(snapshot: SchemaSnapshot): boolean {
    return this.invalidated || this.options.now() - snapshot.fetchedAt > this.options.ttlMs;
  }

  private refresh(): Promise<SchemaSnapshot> {
    const previousVersion = this.snapshot?.version ?? 0;
    this.invalidated = false;

    const refresh = this.store
      .loadSchemaSummary(this.options.sampleLimit)
      .then((summary) => {
        const next: SchemaSnapshot = {
          summary,
          fetchedAt: this.options.now(),
          version: previousVersion + 1
        };
        this.snapshot = next;
        logger.debug(
          {
            version: next.version,
            labels: summary.nodeCounts.length,
            relationshipTypes: summary.relationshipCounts.length
          },
          "Schema cache refreshed"
        );
        return next;
      })
      .catch((error: unknown) => {
        this.invalidated = true;
        logger.warn({ err: error }, "Schema cache refresh failed");
        throw error;
      })
      .finally(() => {
        this.inflight = null;
      });

    this.inflight = refresh;
    return refresh;
  }
}
