import { createOpenAICompatible, type OpenAICompatibleProvider } from "@ai-sdk/openai-compatible";
import { APICallError, type LanguageModel } from "ai";
import { z } from "zod";
import { ErrorCode } from "@shared/errors";
import { getLogger } from "../logger";
import { classifyBackendError } from "./error-classifier";
import { BackendError } from "./types";
import { VisionBackend, type GenerationSettings } from "./vision-backend";

export const AUTO_MODEL = "auto";

export interface LocalBackendConfig {
  baseURL: string;
  apiKey: string | null;
  /** Explicit model id, or "auto" */
  model: string;
}

const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.string().min(1) })),
});

/**
 * OpenAI-compatible local server (LM Studio, llama.cpp server, ...)
 */
export class LocalLLMBackend extends VisionBackend {
  readonly id = "local" as const;
  readonly defaultBatchLimit = null;
  private readonly logger = getLogger("local-backend");
  private readonly provider: OpenAICompatibleProvider;
  private resolvedModel: string | null = null;

  constructor(
    private readonly config: LocalBackendConfig,
    settings: GenerationSettings,
    private readonly fetchFn: typeof fetch = fetch
  ) {
    super(settings);
    this.provider = createOpenAICompatible({
      name: "local",
      baseURL: config.baseURL,
      apiKey: config.apiKey ?? undefined,
      fetch: fetchFn,
    });
    if (config.model.toLowerCase() !== AUTO_MODEL) {
      this.resolvedModel = config.model;
    }
  }

  /**
   * With "auto", ask the server once for its model list and use the first entry.
   */
  async resolveModel(): Promise<string> {
    if (this.resolvedModel) return this.resolvedModel;

    const url = `${this.config.baseURL}/models`;
    let model: string;
    try {
      model = await this.fetchFirstModel(url);
    } catch (error) {
      throw classifyBackendError(error, this.id);
    }

    this.logger.info({ model, baseURL: this.config.baseURL }, "Resolved local model");
    this.resolvedModel = model;
    return model;
  }

  protected languageModel(modelId: string): LanguageModel {
    return this.provider(modelId);
  }

  private async fetchFirstModel(url: string): Promise<string> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const response = await this.fetchFn(url, {
      headers,
      signal: AbortSignal.timeout(this.settings.timeoutMs),
    });
    const body = await response.text();

    if (!response.ok) {
      throw new APICallError({
        message: `Model list request failed with status ${response.status}`,
        url,
        requestBodyValues: {},
        statusCode: response.status,
        responseHeaders: Object.fromEntries(response.headers.entries()),
        responseBody: body,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new BackendError(ErrorCode.BACKEND_REJECTED, `Model list at ${url} is not JSON`, {
        backend: this.id,
        retryable: false,
      });
    }

    const parsed = ModelListSchema.safeParse(json);
    const first = parsed.success ? parsed.data.data[0] : undefined;
    if (!first) {
      throw new BackendError(
        ErrorCode.BACKEND_REJECTED,
        `No model loaded on ${this.config.baseURL}; load one or set LOCAL_LLM_MODEL`,
        { backend: this.id, retryable: false }
      );
    }
    return first.id;
  }
}
