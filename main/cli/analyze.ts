/**
 * analyze - run one bounded batch, or drain the queue with --until-empty
 */

import { parseArgs } from "node:util";
import { CaptureRepository } from "../database/capture-repository";
import { ShardStore } from "../database";
import { createBackend } from "../services/analysis/backend-factory";
import { AnalysisBatchEngine } from "../services/analysis/batch-engine";
import { ImageLifecycleManager, lifecyclePolicyFor } from "../services/analysis/image-lifecycle";
import { RateRetryController } from "../services/analysis/rate-retry-controller";
import { systemClock } from "../services/clock";
import { bootstrap, parsePositiveInt, runCli } from "./startup";

const { values } = parseArgs({
  options: {
    limit: { type: "string" },
    "until-empty": { type: "boolean", default: false },
    "capture-root": { type: "string" },
    "archive-root": { type: "string" },
    "requeue-failed": { type: "boolean", default: false },
  },
});

await runCli("analyze", async () => {
  const { config, logger } = bootstrap("analyzer", {
    captureRoot: values["capture-root"],
    archiveRoot: values["archive-root"],
  });
  const limit = parsePositiveInt(values.limit, "--limit");

  const store = ShardStore.open(config.storage.storePath);
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  process.once("SIGTERM", () => controller.abort());

  try {
    const repository = new CaptureRepository(store);
    if (values["requeue-failed"]) {
      repository.requeueFailed();
    }

    const engine = new AnalysisBatchEngine(
      {
        repository,
        backend: createBackend(config.analyzer),
        controller: new RateRetryController(config.analyzer.retry, systemClock),
        lifecycle: new ImageLifecycleManager(lifecyclePolicyFor(config.storage), repository),
        clock: systemClock,
      },
      { batchLimit: config.analyzer.batchLimit, staleAnalyzingMs: config.analyzer.staleAnalyzingMs }
    );

    const summary = await engine.run({
      limit,
      untilEmpty: values["until-empty"],
      signal: controller.signal,
    });
    logger.info({ ...summary, counts: repository.countByStatus() }, "Analyzer finished");
  } finally {
    store.close();
  }
});
