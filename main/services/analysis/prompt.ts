import { formatISO } from "date-fns";
import type { AnalysisRequest } from "./types";

const REMOTE_DESKTOP_TITLE_HINTS = ["remote desktop", "リモート デスクトップ", "rdp", "mstsc", "msrdc"];
const REMOTE_DESKTOP_PROCESSES = new Set(["mstsc.exe", "msrdc.exe", "remotedesktop.exe"]);

export function buildSystemPrompt(language: string): string {
  return `You are mirulog, a meticulous self-tracking assistant. You receive desktop screenshots and contextual metadata.
Analyze what the user was doing. Respond strictly as compact JSON with keys:
  - description: 1 sentence summary of the activity.
  - primary_task: concise task label (<=6 words).
  - tags: array of activity tags/keywords.
  - confidence: float between 0 and 1 reflecting your certainty.
  - observed_files: array of file paths/names you can read from the screenshot (if any).
  - observed_repositories: array of repository/workspace names you can read from the screenshot (if any).
  - observed_urls: array of http(s) URLs you can read from the screenshot (if any).
All values must be written in ${language}. The JSON keys must remain in English as listed above.
Focus on observable actions only.
If you cannot confidently read items, return empty arrays for those keys.`;
}

export function isRemoteDesktop(windowTitle: string | null, processName: string | null): boolean {
  const title = (windowTitle ?? "").toLowerCase();
  const proc = (processName ?? "").toLowerCase();
  return (
    REMOTE_DESKTOP_TITLE_HINTS.some((hint) => title.includes(hint)) ||
    REMOTE_DESKTOP_PROCESSES.has(proc)
  );
}

const REMOTE_DESKTOP_HINT =
  "IMPORTANT (RDP): If this screenshot is from Remote Desktop, do NOT summarize as just 'using remote desktop'. " +
  "Describe what is happening inside the remote session (apps, code, browser, docs, errors) based on what you see. " +
  "Only mention RDP as a note if you cannot infer the actual work.";

/**
 * Per-capture user text sent alongside the image.
 */
export function buildUserPrompt(request: AnalysisRequest): string {
  const lines = [
    `Timestamp: ${formatISO(request.capturedAt)}`,
    `Window: ${request.windowTitle ?? "Unknown"}`,
    `Application: ${request.processName ?? "Unknown"}`,
  ];

  if (isRemoteDesktop(request.windowTitle, request.processName)) {
    lines.push("", REMOTE_DESKTOP_HINT);
  }
  if (request.context) {
    lines.push("", `Context: ${request.context}`);
  }
  return lines.join("\n");
}
