import type { OllamaConfig } from "../config.js";
import type { ChatMessage } from "../models.js";
import { logger } from "../utils/logger.js";

// Ollama REST API types (POST /api/chat, GET /api/tags)
interface OllamaChatRequest {
  model: string;
  messages: ChatMessage[];
  stream: false;
  options: {
    temperature: number;
  };
}

interface OllamaChatResponse {
  model: string;
  created_at?: string;
  message?: {
    role: string;
    content: string;
  };
  done: boolean;
  prompt_eval_count?: number;
  eval_count?: number;
}

interface OllamaTagsResponse {
  models?: Array<{ name: string }>;
}

export interface OllamaHealth {
  available: boolean;
  modelLoaded: boolean;
  error?: string;
}

export class OllamaError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "OllamaError";
  }
}

export class OllamaTimeoutError extends OllamaError {
  constructor(readonly timeoutSeconds: number) {
    super(`Ollama did not answer within ${timeoutSeconds}s`);
    this.name = "OllamaTimeoutError";
  }
}

/** Anything that can turn a conversation into a reply. */
export interface ChatModel {
  chat(messages: ChatMessage[]): Promise<string>;
}

export const EMPTY_RESPONSE = "No response.";

function isAbort(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

function isConnectionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const cause = error.cause instanceof Error ? error.cause.message : "";
  return [error.message, cause].some((text) => text.includes("ECONNREFUSED") || text.includes("fetch failed"));
}

export class OllamaClient implements ChatModel {
  private config: OllamaConfig;
  private fetchImpl: typeof fetch;

  constructor(config: OllamaConfig, fetchImpl: typeof fetch = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  get model(): string {
    return this.config.model;
  }

  async chat(messages: ChatMessage[]): Promise<string> {
    const requestBody: OllamaChatRequest = {
      model: this.config.model,
      messages,
      stream: false,
      options: { temperature: this.config.temperature },
    };

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.config.host}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(requestBody),
        signal: AbortSignal.timeout(this.config.timeoutSeconds * 1000),
      });
    } catch (error) {
      if (isAbort(error)) throw new OllamaTimeoutError(this.config.timeoutSeconds);
      if (isConnectionFailure(error)) {
        throw new OllamaError(`Ollama is not reachable at ${this.config.host}. Start it with: ollama serve`);
      }
      throw error;
    }

    if (!response.ok) {
      let errorText: string;
      try {
        errorText = await response.text();
      } catch (error) {
        if (isAbort(error)) throw new OllamaTimeoutError(this.config.timeoutSeconds);
        throw error;
      }
      throw new OllamaError(
        `Ollama request failed: ${response.status} ${response.statusText}${errorText ? `\n${errorText}` : ""}`,
        response.status
      );
    }

    let data: OllamaChatResponse;
    try {
      data = (await response.json()) as OllamaChatResponse;
    } catch (error) {
      if (isAbort(error)) throw new OllamaTimeoutError(this.config.timeoutSeconds);
      throw error;
    }

    logger.debug(`Ollama answered (prompt tokens: ${data.prompt_eval_count ?? "?"}, reply tokens: ${data.eval_count ?? "?"})`);

    return data.message?.content || EMPTY_RESPONSE;
  }

  /**
   * Check if Ollama is available and the configured model is pulled
   */
  async healthCheck(): Promise<OllamaHealth> {
    try {
      const tagsResponse = await this.fetchImpl(`${this.config.host}/api/tags`, {
        signal: AbortSignal.timeout(this.config.timeoutSeconds * 1000),
      });
      if (!tagsResponse.ok) {
        return { available: false, modelLoaded: false, error: `Ollama responded with ${tagsResponse.status}` };
      }

      const tags = (await tagsResponse.json()) as OllamaTagsResponse;
      const models = tags.models || [];
      // "llama3" matches "llama3:latest"
      const modelLoaded = models.some((m) => m.name === this.config.model || m.name.startsWith(`${this.config.model}:`));

      return modelLoaded
        ? { available: true, modelLoaded }
        : {
            available: true,
            modelLoaded,
            error: `Model ${this.config.model} not found. Run: ollama pull ${this.config.model}`,
          };
    } catch (error) {
      logger.debug("Ollama health check failed:", error);
      return { available: false, modelLoaded: false, error: `Cannot connect to Ollama at ${this.config.host}` };
    }
  }
}

/**
 * Text posted back to Discord when a chat request fails
 */
export function describeFailure(error: unknown): string {
  if (error instanceof OllamaTimeoutError) return "AI request timed out.";
  return `AI error: ${error instanceof Error ? error.message : String(error)}`;
}
