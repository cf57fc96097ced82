/**
 * RateRetryController - spacing and bounded retries around backend calls
 *
 * - consecutive calls start at least `requestSpacingMs` apart
 * - retryable errors wait the server hint plus a buffer, else
 *   `base * 2^(n-1)` capped at `backoffMaxMs`
 * - connection refused gets the smaller of the two retry bounds
 * - fatal errors return at once
 * - an abort observed before a call is made returns `aborted` with no call
 */

import { ErrorCode, toErrorMessage } from "@shared/errors";
import type { BackendId } from "@shared/capture-types";
import type { RetryConfig } from "../../config";
import type { Clock } from "../clock";
import { getLogger } from "../logger";
import { classifyBackendError } from "./error-classifier";
import type { BackendError } from "./types";

export type ControlledResult<T> =
  | { ok: true; value: T; attempts: number; retries: number }
  | { ok: false; aborted: false; error: BackendError; attempts: number; retries: number }
  /** Stopped by the signal; `error` is the last failure, if any */
  | { ok: false; aborted: true; error: BackendError | null; attempts: number; retries: number };

export interface CallContext {
  captureId: number;
  backend: BackendId;
}

export function exponentialDelay(retryNumber: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** (retryNumber - 1), maxMs);
}

export class RateRetryController {
  private readonly logger = getLogger("rate-retry-controller");
  private lastCallStartedAt: number | null = null;

  constructor(
    private readonly policy: RetryConfig,
    private readonly clock: Clock
  ) {}

  retryLimitFor(error: BackendError): number {
    if (error.code === ErrorCode.BACKEND_CONNECTION_REFUSED) {
      return Math.min(this.policy.maxRetries, this.policy.connectionRefusedMaxRetries);
    }
    return this.policy.maxRetries;
  }

  /** Wait before retry number `retryNumber` (1-based) */
  retryDelay(error: BackendError, retryNumber: number): number {
    if (error.retryAfterMs !== null) {
      return error.retryAfterMs + this.policy.bufferMs;
    }
    return exponentialDelay(retryNumber, this.policy.backoffBaseMs, this.policy.backoffMaxMs);
  }

  async execute<T>(
    call: () => Promise<T>,
    context: CallContext,
    signal?: AbortSignal
  ): Promise<ControlledResult<T>> {
    let attempts = 0;
    let retries = 0;
    let lastError: BackendError | null = null;

    for (;;) {
      await this.awaitSpacing(signal);
      if (signal?.aborted) {
        this.logger.info(
          { ...context, attempts, retries, code: lastError?.code ?? null },
          "Backend call abandoned after abort"
        );
        return { ok: false, aborted: true, error: lastError, attempts, retries };
      }
      attempts++;
      this.lastCallStartedAt = this.clock.now();

      let error: BackendError;
      try {
        const value = await call();
        return { ok: true, value, attempts, retries };
      } catch (caught) {
        error = classifyBackendError(caught, context.backend, this.clock.now());
      }

      if (!error.retryable) {
        this.logger.warn(
          { ...context, attempt: attempts, code: error.code, error: toErrorMessage(error) },
          "Backend call failed (fatal)"
        );
        return { ok: false, aborted: false, error, attempts, retries };
      }

      const limit = this.retryLimitFor(error);
      if (signal?.aborted) {
        this.logger.info(
          { ...context, attempts, retries, code: error.code },
          "Backend call abandoned after abort"
        );
        return { ok: false, aborted: true, error, attempts, retries };
      }
      if (retries >= limit) {
        this.logger.warn(
          { ...context, attempt: attempts, retries, code: error.code, error: toErrorMessage(error) },
          "Backend call failed after retries"
        );
        return { ok: false, aborted: false, error, attempts, retries };
      }

      lastError = error;
      retries++;
      const delayMs = this.retryDelay(error, retries);
      this.logger.info(
        { ...context, attempt: attempts, retry: retries, limit, delayMs, code: error.code },
        "Retrying backend call"
      );
      await this.clock.sleep(delayMs, signal);
    }
  }

  private async awaitSpacing(signal?: AbortSignal): Promise<void> {
    if (this.lastCallStartedAt === null || this.policy.requestSpacingMs <= 0) return;
    const wait = this.lastCallStartedAt + this.policy.requestSpacingMs - this.clock.now();
    if (wait > 0) {
      await this.clock.sleep(wait, signal);
    }
  }
}
