import OpenAI from "openai";
import { CompletionOptions, LLMAdapter } from "./llmAdapter";
import { createRunId, errorMessageOf, logLLMInteraction } from "./logging";

export interface OpenAIAdapterConfig {
  apiKey: string;
  model: string;
  /**
   * Prepended as a system message to every request.
   */
  systemMessage?: string;
}

export class OpenAIAdapter implements LLMAdapter {
  readonly model: string;
  private client: OpenAI;
  private systemMessage?: string;

  constructor(config: OpenAIAdapterConfig) {
    if (!config.apiKey) {
      throw new Error("OpenAIAdapter: an apiKey is required.");
    }

    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model;
    this.systemMessage = config.systemMessage;
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    const runId = createRunId();
    const start = Date.now();

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = this.systemMessage
      ? [
          { role: "system", content: this.systemMessage },
          { role: "user", content: prompt },
        ]
      : [{ role: "user", content: prompt }];

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature: options?.temperature,
        max_tokens: options?.maxTokens,
        stop: options?.stop,
      });

      const text = response.choices[0]?.message.content ?? "";
      const usage = response.usage;

      logLLMInteraction({
        timestamp: new Date().toISOString(),
        adapterName: "OpenAIAdapter",
        model: this.model,
        runId,
        prompt,
        completion: text,
        options,
        usage: usage
          ? {
              promptTokens: usage.prompt_tokens,
              completionTokens: usage.completion_tokens,
              totalTokens: usage.total_tokens,
            }
          : undefined,
        durationMs: Date.now() - start,
      });

      return text;
    } catch (err) {
      logLLMInteraction({
        timestamp: new Date().toISOString(),
        adapterName: "OpenAIAdapter",
        model: this.model,
        runId,
        prompt,
        completion: "",
        options,
        usage: undefined,
        durationMs: Date.now() - start,
        errorMessage: errorMessageOf(err),
      });
      throw err;
    }
  }
}
