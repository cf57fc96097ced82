/**
 * ImageLifecycleManager - delete or archive an image once its capture is analyzed
 *
 * Archive layout: <archiveRoot>/<yyyy-MM-dd>/[<host>/]<basename>
 */

import fs from "node:fs/promises";
import path from "node:path";
import { ErrorCode, ServiceError } from "@shared/errors";
import type { CaptureRecord, StorageState } from "@shared/capture-types";
import type { StorageConfig } from "../../config";
import type { CaptureRepository } from "../../database/capture-repository";
import { getLogger } from "../logger";
import { dateDirectoryName } from "../screen-capture/capture-storage";

export type LifecyclePolicy =
  | { mode: "delete" }
  | { mode: "archive"; archiveRoot: string; partitionByHost: boolean };

export type LifecycleOutcome =
  | { action: "deleted" }
  | { action: "archived"; archivedPath: string }
  | { action: "missing"; archivedPath: string | null };

export function lifecyclePolicyFor(storage: StorageConfig): LifecyclePolicy {
  return storage.deleteAfterAnalysis
    ? { mode: "delete" }
    : {
        mode: "archive",
        archiveRoot: storage.archiveRoot,
        partitionByHost: storage.partitionArchiveByHost,
      };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

const MAX_ARCHIVE_SUFFIX = 100;
const LINK_UNSUPPORTED = new Set(["EXDEV", "EPERM", "ENOTSUP", "EOPNOTSUPP"]);

/** Only ENOENT counts as absent; other access errors propagate */
async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return false;
    throw error;
  }
}

/**
 * Move without ever replacing `target`: hard link + unlink, or an exclusive
 * copy + unlink where links are not possible. Rejects with EEXIST when the
 * target is taken.
 */
export async function moveFile(source: string, target: string): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  try {
    await fs.link(source, target);
  } catch (error) {
    if (!isErrnoException(error) || !LINK_UNSUPPORTED.has(error.code ?? "")) throw error;
    await fs.copyFile(source, target, fs.constants.COPYFILE_EXCL);
  }
  await fs.unlink(source);
}

function isTargetTaken(error: unknown): boolean {
  return isErrnoException(error) && error.code === "EEXIST";
}

/** `name.png` -> `name-<n>.png` */
export function suffixedPath(target: string, n: number): string {
  const ext = path.extname(target);
  return path.join(path.dirname(target), `${path.basename(target, ext)}-${n}${ext}`);
}

function storageFor(outcome: LifecycleOutcome): {
  state: StorageState;
  archivedPath: string | null;
} {
  switch (outcome.action) {
    case "archived":
      return { state: "archived", archivedPath: outcome.archivedPath };
    case "missing":
      return outcome.archivedPath === null
        ? { state: "deleted", archivedPath: null }
        : { state: "archived", archivedPath: outcome.archivedPath };
    case "deleted":
      return { state: "deleted", archivedPath: null };
  }
}

export class ImageLifecycleManager {
  private readonly logger = getLogger("image-lifecycle");

  constructor(
    private readonly policy: LifecyclePolicy,
    private readonly repository: Pick<CaptureRepository, "recordStorage">
  ) {}

  archivePathFor(record: CaptureRecord): string | null {
    if (this.policy.mode !== "archive") return null;
    const segments = [this.policy.archiveRoot, dateDirectoryName(record.capturedAt)];
    if (this.policy.partitionByHost) segments.push(record.host);
    segments.push(path.basename(record.filePath));
    return path.join(...segments);
  }

  /**
   * Apply the configured policy and record the resulting storage state.
   * Only analyzed captures are accepted.
   */
  async apply(record: CaptureRecord): Promise<LifecycleOutcome> {
    if (record.status !== "analyzed") {
      throw new ServiceError(
        ErrorCode.INVALID_TRANSITION,
        `Refusing to touch the image of capture ${record.id} in status ${record.status}`
      );
    }

    const outcome = await this.applyToFile(record);
    const { state, archivedPath } = storageFor(outcome);
    this.repository.recordStorage(record.id, state, archivedPath);
    this.logger.debug({ captureId: record.id, action: outcome.action, archivedPath }, "Image settled");
    return outcome;
  }

  private async applyToFile(record: CaptureRecord): Promise<LifecycleOutcome> {
    const target = this.archivePathFor(record);

    if (!(await exists(record.filePath))) {
      // A crash after the move but before bookkeeping leaves the file at its target
      const alreadyArchived = target !== null && (await exists(target));
      this.logger.warn(
        { captureId: record.id, filePath: record.filePath, alreadyArchived },
        "Image already gone"
      );
      return { action: "missing", archivedPath: alreadyArchived ? target : null };
    }

    if (target === null) {
      await fs.unlink(record.filePath);
      return { action: "deleted" };
    }

    return { action: "archived", archivedPath: await this.archive(record, target) };
  }

  /** Archive to `target`, or the first free suffixed name when it is taken */
  private async archive(record: CaptureRecord, target: string): Promise<string> {
    for (let n = 0; n <= MAX_ARCHIVE_SUFFIX; n++) {
      const candidate = n === 0 ? target : suffixedPath(target, n);
      try {
        await moveFile(record.filePath, candidate);
        return candidate;
      } catch (error) {
        if (!isTargetTaken(error)) throw error;
        this.logger.warn(
          { captureId: record.id, target: candidate },
          "Archive target already exists; trying another name"
        );
      }
    }
    throw new ServiceError(
      ErrorCode.ARCHIVE_COLLISION,
      `No free archive name for capture ${record.id} near ${target}`
    );
  }
}
