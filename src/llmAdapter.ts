export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  stop?: string | string[];
}

/**
 * Text-completion client a step can obtain through `sdk.models`.
 */
export interface LLMAdapter {
  /**
   * Model identifier, used in logs.
   */
  readonly model: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * Remove a single surrounding ``` fence (with optional language tag) that
 * chat models like to wrap code in.
 */
export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const match = /^```[\w-]*\n([\s\S]*?)\n?```$/.exec(trimmed);
  return match ? match[1] : raw;
}
