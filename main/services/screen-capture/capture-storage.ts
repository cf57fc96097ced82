/**
 * Capture file storage
 *
 * Images are written under <captureRoot>/<yyyy-MM-dd>/ with timestamp-based
 * filenames. Files are created exclusively; a name clash bumps the sequence.
 */

import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { format } from "date-fns";
import { getLogger } from "../logger";
import type { ImageFormat } from "@shared/capture-types";
import type { StoredCapture } from "./types";

const MAX_NAME_ATTEMPTS = 1000;

export function dateDirectoryName(timestamp: number): string {
  return format(timestamp, "yyyy-MM-dd");
}

export function generateCaptureFilename(
  timestamp: number,
  imageFormat: ImageFormat,
  sequence: number
): string {
  return `capture-${format(timestamp, "yyyyMMdd-HHmmss")}-${sequence}.${imageFormat}`;
}

export function hashContent(buffer: Buffer): string {
  return crypto.createHash("sha256").update(buffer).digest("hex");
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export class CaptureStorage {
  private readonly logger = getLogger("capture-storage");

  constructor(private readonly captureRoot: string) {}

  async save(buffer: Buffer, timestamp: number, imageFormat: ImageFormat): Promise<StoredCapture> {
    const dir = path.join(this.captureRoot, dateDirectoryName(timestamp));
    await fs.mkdir(dir, { recursive: true });

    for (let sequence = 1; sequence <= MAX_NAME_ATTEMPTS; sequence++) {
      const filePath = path.join(dir, generateCaptureFilename(timestamp, imageFormat, sequence));
      try {
        await fs.writeFile(filePath, buffer, { flag: "wx" });
      } catch (error) {
        if (isErrnoException(error) && error.code === "EEXIST") continue;
        this.logger.error({ error, filePath }, "Failed to save capture to file");
        throw error;
      }

      this.logger.debug({ filePath, bytes: buffer.length }, "Capture saved to file");
      return { filePath, contentHash: hashContent(buffer), bytes: buffer.length };
    }

    throw new Error(`No free capture filename in ${dir}`);
  }

  /**
   * Remove a file written by `save` whose record could not be persisted.
   */
  async discard(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      this.logger.warn({ filePath }, "Discarded capture without a record");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return;
      this.logger.error({ error, filePath }, "Failed to discard capture");
    }
  }
}
