/**
 * observe - run the capture scheduler until SIGINT/SIGTERM
 */

import { parseArgs } from "node:util";
import { CaptureRepository } from "../database/capture-repository";
import { ShardStore } from "../database";
import { systemClock } from "../services/clock";
import { CaptureScheduler } from "../services/screen-capture/capture-scheduler";
import { CaptureStorage } from "../services/screen-capture/capture-storage";
import { DesktopScreenGrabber } from "../services/screen-capture/screen-grabber";
import { createSessionProbe } from "../services/screen-capture/session-probe";
import { SessionMonitor } from "../services/screen-capture/session-state";
import { bootstrap, runCli } from "./startup";

const { values } = parseArgs({
  options: {
    "capture-root": { type: "string" },
    "archive-root": { type: "string" },
  },
});

await runCli("observe", async () => {
  const { config, logger } = bootstrap("observer", {
    captureRoot: values["capture-root"],
    archiveRoot: values["archive-root"],
  });

  const store = ShardStore.open(config.storage.storePath);
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Stopping observer");
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  const scheduler = new CaptureScheduler(
    {
      session: new SessionMonitor(createSessionProbe(), {
        idleThresholdMs: config.capture.idleThresholdMs,
        lockCheckEnabled: config.capture.lockCheckEnabled,
      }),
      grabber: new DesktopScreenGrabber({
        format: config.capture.format,
        quality: config.capture.quality,
      }),
      storage: new CaptureStorage(config.capture.captureRoot),
      repository: new CaptureRepository(store),
      clock: systemClock,
    },
    { host: config.host, intervalMs: config.capture.intervalMs }
  );

  try {
    await scheduler.run(controller.signal);
    logger.info(scheduler.getStats(), "Observer stopped");
  } finally {
    store.close();
  }
});
