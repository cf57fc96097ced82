import { describe, it, expect } from "vitest";
import { parseAnalysisResponse, repairJson } from "./response-parser";

describe("parseAnalysisResponse", () => {
  it("reads a fenced JSON payload and normalises the lists", () => {
    const raw = [
      "```json",
      JSON.stringify({
        description: "Writing unit tests for the parser",
        primary_task: "testing",
        tags: ["ts", "ts", " vitest "],
        confidence: 0.9,
        observed_files: ["response-parser.test.ts"],
        observed_repositories: ["mirulog"],
        observed_urls: ["https://example.com/docs", "not a url"],
      }),
      "```",
    ].join("\n");

    expect(parseAnalysisResponse(raw)).toEqual({
      structured: true,
      summary: "Writing unit tests for the parser",
      primaryTask: "testing",
      tags: ["ts", "vitest"],
      confidence: 0.9,
      entities: {
        files: ["response-parser.test.ts"],
        repositories: ["mirulog"],
        urls: ["https://example.com/docs"],
      },
    });
  });

  it("salvages an object surrounded by prose and repairs trailing commas", () => {
    const result = parseAnalysisResponse(
      'Here you go: {"description": "Reading docs", "tags": ["docs",],} hope that helps'
    );

    expect(result.structured).toBe(true);
    expect(result.summary).toBe("Reading docs");
    expect(result.tags).toEqual(["docs"]);
  });

  it("falls back to the raw text when nothing parses", () => {
    expect(parseAnalysisResponse("  The user is reading email.  ")).toEqual({
      structured: false,
      summary: "The user is reading email.",
      primaryTask: null,
      tags: [],
      confidence: null,
      entities: { files: [], repositories: [], urls: [] },
    });
  });

  it("drops fields with the wrong type instead of failing", () => {
    const result = parseAnalysisResponse('{"description": 42, "confidence": "high", "tags": "x"}');

    expect(result.structured).toBe(true);
    expect(result.summary).toBeNull();
    expect(result.confidence).toBeNull();
    expect(result.tags).toEqual([]);
  });

  it("coerces numeric strings and rejects out-of-range confidence", () => {
    expect(parseAnalysisResponse('{"confidence": "0.75"}').confidence).toBe(0.75);
    expect(parseAnalysisResponse('{"confidence": 7}').confidence).toBeNull();
  });

  it("returns a null summary for an empty response", () => {
    expect(parseAnalysisResponse("").summary).toBeNull();
  });
});

describe("repairJson", () => {
  it("strips fences and trailing commas", () => {
    expect(repairJson('```json\n{"a": [1, 2,], }\n```')).toBe('{"a": [1, 2] }\n');
  });
});
