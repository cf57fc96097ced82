import { generateText, type LanguageModel } from "ai";
import type { BackendId } from "@shared/capture-types";
import { classifyBackendError } from "./error-classifier";
import { buildSystemPrompt, buildUserPrompt } from "./prompt";
import type { AnalysisBackend, AnalysisRequest, BackendResponse } from "./types";

export interface GenerationSettings {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  /** Output language for the derived fields */
  language: string;
}

/**
 * Shared request path for every backend: one `generateText` call with the
 * screenshot attached, SDK retries off, errors classified.
 */
export abstract class VisionBackend implements AnalysisBackend {
  abstract readonly id: BackendId;
  abstract readonly defaultBatchLimit: number | null;

  constructor(protected readonly settings: GenerationSettings) {}

  abstract resolveModel(): Promise<string>;

  protected abstract languageModel(modelId: string): LanguageModel;

  async analyze(request: AnalysisRequest): Promise<BackendResponse> {
    try {
      const model = await this.resolveModel();
      const { text } = await generateText({
        model: this.languageModel(model),
        system: buildSystemPrompt(this.settings.language),
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: buildUserPrompt(request) },
              { type: "image", image: request.image, mediaType: request.mime },
            ],
          },
        ],
        maxOutputTokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(this.settings.timeoutMs),
      });
      return { text, model };
    } catch (error) {
      throw classifyBackendError(error, this.id);
    }
  }
}
