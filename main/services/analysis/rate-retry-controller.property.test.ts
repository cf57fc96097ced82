import { describe, it, expect, vi } from "vitest";
import * as fc from "fast-check";
import { ErrorCode } from "@shared/errors";
import { FakeClock } from "../test-utils/fake-clock";
import { RateRetryController } from "./rate-retry-controller";
import { BackendError } from "./types";

vi.mock("../logger", () => ({
  getLogger: vi.fn(() => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() })),
}));

type Step = "success" | "quota" | "network" | "refused" | "fatal";

function errorFor(step: Exclude<Step, "success">): BackendError {
  switch (step) {
    case "quota":
      return new BackendError(ErrorCode.BACKEND_QUOTA, "quota", {
        backend: "gemini",
        retryable: true,
        retryAfterMs: 1000,
      });
    case "network":
      return new BackendError(ErrorCode.BACKEND_NETWORK, "503", { backend: "gemini", retryable: true });
    case "refused":
      return new BackendError(ErrorCode.BACKEND_CONNECTION_REFUSED, "refused", {
        backend: "local",
        retryable: true,
      });
    case "fatal":
      return new BackendError(ErrorCode.BACKEND_AUTH, "denied", { backend: "gemini", retryable: false });
  }
}

const stepArb = fc.constantFrom<Step>("success", "quota", "network", "refused", "fatal");

describe("RateRetryController properties", () => {
  it("Property: retries never exceed maxRetries and attempts = retries + 1", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(stepArb, { minLength: 1, maxLength: 12 }),
        fc.nat({ max: 6 }),
        fc.nat({ max: 6 }),
        async (steps, maxRetries, connectionRefusedMaxRetries) => {
          const clock = new FakeClock(0);
          const controller = new RateRetryController(
            {
              maxRetries,
              connectionRefusedMaxRetries,
              bufferMs: 100,
              requestSpacingMs: 0,
              backoffBaseMs: 10,
              backoffMaxMs: 1000,
            },
            clock
          );
          let index = 0;
          const call = async () => {
            const step = steps[Math.min(index++, steps.length - 1)];
            if (step === "success") return step;
            throw errorFor(step);
          };

          const result = await controller.execute(call, { captureId: 1, backend: "gemini" });

          expect(result.retries).toBeLessThanOrEqual(maxRetries);
          expect(result.attempts).toBe(result.retries + 1);
          expect(clock.sleeps).toHaveLength(result.retries);
          if (!result.ok && !result.aborted && !result.error.retryable) {
            expect(steps[Math.min(result.attempts - 1, steps.length - 1)]).toBe("fatal");
          }
          if (steps.every((step) => step === "refused")) {
            expect(result.retries).toBe(Math.min(maxRetries, connectionRefusedMaxRetries));
          }
        }
      ),
      { numRuns: 200 }
    );
  });
});
