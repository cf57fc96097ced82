import { z } from "zod";
import type { ObservedEntities } from "@shared/capture-types";

const stringList = z
  .array(z.unknown())
  .transform((items) =>
    [...new Set(items.filter((item) => item !== null).map((item) => String(item).trim()))].filter(
      (item) => item.length > 0
    )
  )
  .optional()
  .catch(undefined);

const optionalString = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .catch(undefined);

/**
 * Every field tolerates garbage: a bad value is dropped, never fatal.
 */
export const AnalysisPayloadSchema = z.object({
  description: optionalString,
  primary_task: optionalString,
  tags: stringList,
  confidence: z.coerce.number().min(0).max(1).optional().catch(undefined),
  observed_files: stringList,
  observed_repositories: stringList,
  observed_urls: stringList,
});

export type AnalysisPayload = z.infer<typeof AnalysisPayloadSchema>;

export interface ParsedAnalysis {
  /** False when no JSON object could be recovered */
  structured: boolean;
  summary: string | null;
  primaryTask: string | null;
  tags: string[];
  confidence: number | null;
  entities: ObservedEntities;
}

/**
 * Repair common JSON format issues in model output
 */
export function repairJson(text: string): string {
  return text
    .replace(/```(?:json)?\s*/g, "")
    .replace(/```/g, "")
    .replace(/,(\s*[}\]])/g, "$1");
}

function parseObject(text: string): object | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) ? parsed : null;
}

function extractObject(rawText: string): object | null {
  let jsonStr = rawText.trim();

  // Remove markdown code block if present
  const codeBlockMatch = jsonStr.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (codeBlockMatch) {
    jsonStr = codeBlockMatch[1].trim();
  }

  const jsonMatch = jsonStr.match(/\{[\s\S]*\}/);
  if (!jsonMatch) return null;

  return parseObject(jsonMatch[0]) ?? parseObject(repairJson(jsonMatch[0]));
}

function nonEmpty(value: string | undefined): string | null {
  return value ? value : null;
}

/**
 * Best-effort extraction of derived fields. Never throws: when nothing
 * parses, the trimmed raw text becomes the summary.
 */
export function parseAnalysisResponse(rawText: string): ParsedAnalysis {
  const candidate = extractObject(rawText);
  const result = candidate === null ? null : AnalysisPayloadSchema.safeParse(candidate);

  if (!result || !result.success) {
    const trimmed = rawText.trim();
    return {
      structured: false,
      summary: trimmed.length > 0 ? trimmed : null,
      primaryTask: null,
      tags: [],
      confidence: null,
      entities: { files: [], repositories: [], urls: [] },
    };
  }

  const payload = result.data;
  return {
    structured: true,
    summary: nonEmpty(payload.description),
    primaryTask: nonEmpty(payload.primary_task),
    tags: payload.tags ?? [],
    confidence: payload.confidence ?? null,
    entities: {
      files: payload.observed_files ?? [],
      repositories: payload.observed_repositories ?? [],
      urls: (payload.observed_urls ?? []).filter((url) => /^https?:\/\//i.test(url)),
    },
  };
}
