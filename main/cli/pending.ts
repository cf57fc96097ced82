/**
 * pending - print pending capture counts
 *
 *   --db PATH    one store; prints NA when it is absent or unreadable
 *   --root PATH  every shard under PATH, one "<shard>\t<count>" line each
 */

import fs from "node:fs";
import { parseArgs } from "node:util";
import { ErrorCode, ServiceError, toErrorMessage } from "@shared/errors";
import { CaptureRepository } from "../database/capture-repository";
import { ShardStore } from "../database";
import { MultiSourceAggregator } from "../services/aggregator/multi-source-aggregator";
import { getLogger } from "../services/logger";
import { bootstrap, runCli } from "./startup";

const { values } = parseArgs({
  options: {
    db: { type: "string" },
    root: { type: "string" },
  },
});

function pendingCount(dbPath: string): number | null {
  if (!fs.existsSync(dbPath)) return null;
  let store: ShardStore | null = null;
  try {
    store = ShardStore.open(dbPath, { readonly: true });
    return new CaptureRepository(store).countPending();
  } catch (error) {
    getLogger("pending").warn({ dbPath, error: toErrorMessage(error) }, "Cannot count pending");
    return null;
  } finally {
    store?.close();
  }
}

await runCli("pending", async () => {
  const { config } = bootstrap("pending");

  if (values.db !== undefined && values.root !== undefined) {
    throw new ServiceError(ErrorCode.CONFIG_INVALID, "Pass either --db or --root, not both");
  }

  if (values.root !== undefined) {
    const aggregator = await MultiSourceAggregator.open(values.root);
    try {
      for (const { shard, pending } of aggregator.pendingCounts()) {
        process.stdout.write(`${shard}\t${pending}\n`);
      }
    } finally {
      aggregator.close();
    }
    return;
  }

  const count = pendingCount(values.db ?? config.storage.storePath);
  process.stdout.write(`${count ?? "NA"}\n`);
});
