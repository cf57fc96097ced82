import { describe, it, expect } from "vitest";
import { CAPTURE_STATUS_VALUES, canTransition } from "./capture-types";

describe("canTransition", () => {
  it("allows only the forward path and the explicit reset", () => {
    const allowed = CAPTURE_STATUS_VALUES.flatMap((from) =>
      CAPTURE_STATUS_VALUES.filter((to) => canTransition(from, to)).map((to) => `${from}->${to}`)
    );

    expect(allowed).toEqual([
      "pending->analyzing",
      "analyzing->pending",
      "analyzing->analyzed",
      "analyzing->failed",
      "failed->pending",
    ]);
  });
});
