/**
 * Desktop screen grabber - primary display via screenshot-desktop, encoded with sharp
 */

import screenshot from "screenshot-desktop";
import sharp from "sharp";
import activeWindow from "active-win";
import { ErrorCode, toErrorMessage } from "@shared/errors";
import type { ImageFormat } from "@shared/capture-types";
import { getLogger } from "../logger";
import {
  CaptureError,
  MIME_BY_FORMAT,
  type CapturedImage,
  type ScreenGrabber,
  type WindowContext,
} from "./types";

export interface GrabOptions {
  format: ImageFormat;
  quality: number;
}

const PERMISSION_PATTERN = /permission|not permitted|denied|EACCES|EPERM/i;

export class DesktopScreenGrabber implements ScreenGrabber {
  private readonly logger = getLogger("screen-grabber");

  constructor(private readonly options: GrabOptions) {}

  async grab(): Promise<CapturedImage> {
    let raw: Buffer;
    try {
      raw = await screenshot({ format: "png" });
    } catch (error) {
      const message = toErrorMessage(error);
      const code = PERMISSION_PATTERN.test(message)
        ? ErrorCode.CAPTURE_PERMISSION
        : ErrorCode.CAPTURE_FAILED;
      throw new CaptureError(code, `Screen grab failed: ${message}`, error);
    }

    try {
      const image = sharp(raw);
      const metadata = await image.metadata();
      const buffer = await this.applyFormat(image);
      return {
        buffer,
        format: this.options.format,
        mime: MIME_BY_FORMAT[this.options.format],
        width: metadata.width ?? null,
        height: metadata.height ?? null,
      };
    } catch (error) {
      throw new CaptureError(
        ErrorCode.CAPTURE_ENCODING,
        `Encoding capture as ${this.options.format} failed: ${toErrorMessage(error)}`,
        error
      );
    }
  }

  async foregroundWindow(): Promise<WindowContext> {
    try {
      const win = await activeWindow();
      if (!win) {
        return { title: null, processName: null };
      }
      return { title: win.title || null, processName: win.owner.name || null };
    } catch (error) {
      this.logger.debug({ error: toErrorMessage(error) }, "Foreground window lookup failed");
      return { title: null, processName: null };
    }
  }

  private async applyFormat(sharpInstance: sharp.Sharp): Promise<Buffer> {
    switch (this.options.format) {
      case "jpeg":
        return sharpInstance.jpeg({ quality: this.options.quality }).toBuffer();
      case "webp":
        return sharpInstance.webp({ quality: this.options.quality }).toBuffer();
      case "png":
      default:
        return sharpInstance.png().toBuffer();
    }
  }
}
