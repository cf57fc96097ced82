/**
 * probe - check that the configured backend is reachable and accepts images
 */

import sharp from "sharp";
import { createBackend } from "../services/analysis/backend-factory";
import { parseAnalysisResponse } from "../services/analysis/response-parser";
import { bootstrap, runCli } from "./startup";

async function probeImage(): Promise<Buffer> {
  return sharp({
    create: { width: 64, height: 64, channels: 3, background: { r: 32, g: 96, b: 160 } },
  })
    .png()
    .toBuffer();
}

await runCli("probe", async () => {
  const { config, logger } = bootstrap("probe");
  const backend = createBackend(config.analyzer);

  const model = await backend.resolveModel();
  logger.info({ backend: backend.id, model }, "Model resolved");

  const response = await backend.analyze({
    captureId: 0,
    image: await probeImage(),
    mime: "image/png",
    windowTitle: "Connectivity probe",
    processName: null,
    capturedAt: Date.now(),
    context: "This is a solid-colour test image; describe it briefly.",
  });
  const parsed = parseAnalysisResponse(response.text);

  process.stdout.write(
    `${JSON.stringify({ backend: backend.id, model: response.model, structured: parsed.structured, summary: parsed.summary })}\n`
  );
});
