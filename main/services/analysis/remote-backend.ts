import { createGoogleGenerativeAI, type GoogleGenerativeAIProvider } from "@ai-sdk/google";
import type { LanguageModel } from "ai";
import { ErrorCode, ServiceError } from "@shared/errors";
import { VisionBackend, type GenerationSettings } from "./vision-backend";

export const REMOTE_DEFAULT_BATCH_LIMIT = 20;

export interface RemoteBackendConfig {
  apiKey: string | null;
  model: string;
}

/**
 * Hosted Gemini vision API
 */
export class GeminiBackend extends VisionBackend {
  readonly id = "gemini" as const;
  readonly defaultBatchLimit = REMOTE_DEFAULT_BATCH_LIMIT;
  private readonly provider: GoogleGenerativeAIProvider;

  constructor(
    private readonly config: RemoteBackendConfig,
    settings: GenerationSettings
  ) {
    super(settings);
    if (!config.apiKey || config.apiKey.trim() === "") {
      throw new ServiceError(ErrorCode.API_KEY_MISSING, "Please configure GEMINI_API_KEY");
    }
    this.provider = createGoogleGenerativeAI({ apiKey: config.apiKey });
  }

  async resolveModel(): Promise<string> {
    return this.config.model;
  }

  protected languageModel(modelId: string): LanguageModel {
    return this.provider(modelId);
  }
}
