import * as fs from "fs";
import * as path from "path";
import { CompletionOptions, LLMAdapter } from "./llmAdapter";

export interface LLMUsageInfo {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface LLMLogRecord {
  timestamp: string;
  adapterName: string;
  model?: string;
  runId: string;
  prompt: string;
  completion: string;
  options?: CompletionOptions;
  usage?: LLMUsageInfo;
  durationMs?: number;
  errorMessage?: string;
}

export interface StepLogRecord {
  timestamp: string;
  event: "started" | "finished" | "failed" | "skipped";
  stepName: string;
  index: number;
  depth: number;
  observationKind?: string;
  durationMs?: number;
  errorMessage?: string;
}

export interface LoggingSettings {
  enabled: boolean;
  directory: string;
}

const settings: LoggingSettings = {
  enabled: process.env.NODE_ENV !== "test",
  directory:
    process.env.STEP_AUTOPILOT_LOG_DIR ?? path.resolve(__dirname, "..", "logs"),
};

export function configureLogging(overrides: Partial<LoggingSettings>): void {
  Object.assign(settings, overrides);
}

export function createRunId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 10)}`;
}

function appendRecord(prefix: string, timestamp: string, record: object): void {
  if (!settings.enabled) return;
  try {
    if (!fs.existsSync(settings.directory)) {
      fs.mkdirSync(settings.directory, { recursive: true });
    }
    const date = timestamp.slice(0, 10).replace(/-/g, "");
    const filePath = path.join(settings.directory, `${prefix}-${date}.jsonl`);
    fs.appendFileSync(filePath, JSON.stringify(record) + "\n", { encoding: "utf8" });
  } catch {
    // best-effort logging only; ignore logging failures
  }
}

/**
 * Append a single JSON line to the daily LLM log file.
 */
export function logLLMInteraction(record: LLMLogRecord): void {
  appendRecord("llm", record.timestamp, record);
}

/**
 * Append a single JSON line to the daily step log file.
 */
export function logStepEvent(record: StepLogRecord): void {
  appendRecord("steps", record.timestamp, record);
}

export function errorMessageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Generic wrapper that logs requests and responses for any LLMAdapter.
 * For adapters that don't expose token usage, usage will be undefined.
 */
export class LoggingLLMAdapter implements LLMAdapter {
  constructor(
    private readonly inner: LLMAdapter,
    private readonly adapterName: string = "LLMAdapter",
  ) {}

  get model(): string {
    return this.inner.model;
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    const runId = createRunId();
    const start = Date.now();
    let completion = "";
    let errorMessage: string | undefined;

    try {
      completion = await this.inner.complete(prompt, options);
      return completion;
    } catch (err) {
      errorMessage = errorMessageOf(err);
      throw err;
    } finally {
      logLLMInteraction({
        timestamp: new Date().toISOString(),
        adapterName: this.adapterName,
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
