/**
 * MultiSourceAggregator - read-only fan-in over host shards
 *
 * Each subdirectory of the aggregate root holding a store file is one shard.
 * Shards are opened read-only and merged into a single timeline ordered by
 * capture time, then shard name, then capture id.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { toErrorMessage } from "@shared/errors";
import type { TimelineEntry } from "@shared/capture-types";
import { STORE_FILENAME } from "../../config";
import { ShardStore } from "../../database";
import {
  CaptureRepository,
  type TimeRange,
  type TimelineRow,
} from "../../database/capture-repository";
import { getLogger } from "../logger";

const logger = getLogger("multi-source-aggregator");

export interface ShardLocation {
  /** Directory name under the aggregate root */
  name: string;
  dbPath: string;
}

export interface ShardSource {
  shard: string;
  rows: readonly TimelineRow[];
}

export interface ShardPendingCount {
  shard: string;
  pending: number;
}

/**
 * Subdirectories of `root` that contain a store file, sorted by name.
 * A missing root yields no shards.
 */
export async function discoverShards(root: string): Promise<ShardLocation[]> {
  const entries = await fs.readdir(root, { withFileTypes: true }).catch((error: unknown) => {
    logger.warn({ root, error: toErrorMessage(error) }, "Aggregate root not readable");
    return null;
  });
  if (entries === null) return [];

  const shards: ShardLocation[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const dbPath = path.join(root, entry.name, STORE_FILENAME);
    const stat = await fs.stat(dbPath).catch(() => null);
    if (stat?.isFile()) {
      shards.push({ name: entry.name, dbPath });
    }
  }
  return shards.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

export function compareEntries(a: TimelineEntry, b: TimelineEntry): number {
  if (a.capture.capturedAt !== b.capture.capturedAt) {
    return a.capture.capturedAt - b.capture.capturedAt;
  }
  if (a.shard !== b.shard) return a.shard < b.shard ? -1 : 1;
  return a.capture.id - b.capture.id;
}

/**
 * K-way merge of per-shard rows, each already sorted by (capturedAt, id).
 */
export function* mergeTimelines(sources: readonly ShardSource[]): Generator<TimelineEntry> {
  const cursors = sources.map(() => 0);

  for (;;) {
    let best: TimelineEntry | null = null;
    let bestSource = -1;

    for (let index = 0; index < sources.length; index++) {
      const source = sources[index];
      const row = source.rows[cursors[index]];
      if (!row) continue;
      const candidate: TimelineEntry = { shard: source.shard, ...row };
      if (best === null || compareEntries(candidate, best) < 0) {
        best = candidate;
        bestSource = index;
      }
    }

    if (best === null) return;
    cursors[bestSource]++;
    yield best;
  }
}

export class MultiSourceAggregator {
  private constructor(
    readonly root: string,
    private readonly stores: ReadonlyMap<string, ShardStore>
  ) {}

  /**
   * Discover and open every shard under `root`. Shards that fail to open
   * are logged and left out.
   */
  static async open(root: string): Promise<MultiSourceAggregator> {
    const stores = new Map<string, ShardStore>();
    for (const location of await discoverShards(root)) {
      try {
        stores.set(location.name, ShardStore.open(location.dbPath, { readonly: true }));
      } catch (error) {
        logger.warn(
          { shard: location.name, dbPath: location.dbPath, error: toErrorMessage(error) },
          "Skipping shard that cannot be opened"
        );
      }
    }
    logger.info({ root, shards: [...stores.keys()] }, "Shards opened");
    return new MultiSourceAggregator(root, stores);
  }

  shardNames(): string[] {
    return [...this.stores.keys()];
  }

  timeline(range: TimeRange = {}): TimelineEntry[] {
    const sources: ShardSource[] = [];
    for (const [shard, store] of this.stores) {
      sources.push({ shard, rows: new CaptureRepository(store).listTimeline(range) });
    }
    return [...mergeTimelines(sources)];
  }

  pendingCounts(): ShardPendingCount[] {
    return [...this.stores].map(([shard, store]) => ({
      shard,
      pending: new CaptureRepository(store).countPending(),
    }));
  }

  close(): void {
    for (const store of this.stores.values()) {
      store.close();
    }
  }
}
