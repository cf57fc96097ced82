import type { AnalyzerConfig } from "../../config";
import { LocalLLMBackend } from "./local-backend";
import { GeminiBackend } from "./remote-backend";
import type { AnalysisBackend } from "./types";

/**
 * Build the configured backend. Chosen once per process.
 */
export function createBackend(config: AnalyzerConfig): AnalysisBackend {
  switch (config.backend) {
    case "gemini":
      return new GeminiBackend(
        { apiKey: config.gemini.apiKey, model: config.gemini.model },
        {
          maxTokens: config.gemini.maxTokens,
          temperature: config.gemini.temperature,
          timeoutMs: config.timeoutMs,
          language: config.language,
        }
      );
    case "local":
      return new LocalLLMBackend(
        { baseURL: config.local.baseURL, apiKey: config.local.apiKey, model: config.local.model },
        {
          maxTokens: config.local.maxTokens,
          temperature: config.local.temperature,
          timeoutMs: config.timeoutMs,
          language: config.language,
        }
      );
  }
}
