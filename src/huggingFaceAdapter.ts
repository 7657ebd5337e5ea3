import { CompletionOptions, LLMAdapter } from "./llmAdapter";
import { createRunId, errorMessageOf, logLLMInteraction } from "./logging";

export interface HuggingFaceAdapterConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

interface GeneratedText {
  generated_text?: unknown;
}

function isGeneratedTextList(value: unknown): value is GeneratedText[] {
  return Array.isArray(value) && value.every((v) => typeof v === "object" && v !== null);
}

/**
 * Text-generation client for the Hugging Face Inference API.
 */
export class HuggingFaceAdapter implements LLMAdapter {
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: HuggingFaceAdapterConfig) {
    if (!config.apiKey) {
      throw new Error("HuggingFaceAdapter: an apiKey is required.");
    }
    this.apiKey = config.apiKey;
    this.model = config.model ?? "bigcode/starcoder";
    this.baseUrl = config.baseUrl ?? "https://api-inference.huggingface.co/models";
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    const runId = createRunId();
    const start = Date.now();
    let completion = "";
    let errorMessage: string | undefined;

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/${this.model}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          inputs: prompt,
          parameters: {
            max_new_tokens: options?.maxTokens,
            temperature: options?.temperature,
            stop: typeof options?.stop === "string" ? [options.stop] : options?.stop,
            return_full_text: false,
          },
        }),
      });

      if (!response.ok) {
        throw new Error(
          `HuggingFaceAdapter: request failed with ${response.status} ${response.statusText}`
        );
      }

      const body: unknown = await response.json();
      if (!isGeneratedTextList(body)) {
        throw new Error("HuggingFaceAdapter: unexpected response shape");
      }
      const generated = body[0]?.generated_text;
      completion = typeof generated === "string" ? generated : "";
      return completion;
    } catch (err) {
      errorMessage = errorMessageOf(err);
      throw err;
    } finally {
      logLLMInteraction({
        timestamp: new Date().toISOString(),
        adapterName: "HuggingFaceAdapter",
        model: this.model,
        runId,
        prompt,
        completion,
        options,
        durationMs: Date.now() - start,
        errorMessage,
      });
    }
  }
}
