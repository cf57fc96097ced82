/**
 * timeline - print the merged multi-shard timeline for one day as JSON lines
 */

import { parseArgs } from "node:util";
import { MultiSourceAggregator } from "../services/aggregator/multi-source-aggregator";
import { bootstrap, dayRange, runCli } from "./startup";

const { values } = parseArgs({
  options: {
    root: { type: "string" },
    date: { type: "string" },
  },
});

await runCli("timeline", async () => {
  const { config, logger } = bootstrap("timeline");
  const range = dayRange(values.date);
  const aggregator = await MultiSourceAggregator.open(values.root ?? config.storage.aggregateRoot);

  try {
    const entries = aggregator.timeline(range);
    for (const entry of entries) {
      process.stdout.write(`${JSON.stringify(entry)}\n`);
    }
    logger.info({ shards: aggregator.shardNames(), entries: entries.length }, "Timeline printed");
  } finally {
    aggregator.close();
  }
});
