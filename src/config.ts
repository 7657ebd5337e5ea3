import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors";

// ── Workspace config file ───────────────────────────────────

export const continueConfigSchema = z.object({
  /**
   * Model used by `sdk.editFile`.
   */
  defaultModel: z.enum(["gpt35", "starcoder"]).default("gpt35"),
  /**
   * Step names the Autopilot records as errors instead of running.
   */
  disallowedSteps: z.array(z.string()).default([]),
}).strict();

export type ContinueConfig = z.infer<typeof continueConfigSchema>;

/**
 * Spellings accepted in config files besides the schema's own keys.
 */
const KEY_ALIASES: Partial<Record<string, keyof ContinueConfig>> = {
  default_model: "defaultModel",
  disallowed_steps: "disallowedSteps",
};

export const CONFIG_DIRECTORY = ".continue";
export const CONFIG_CANDIDATES = ["config.yaml", "config.json"] as const;

export function defaultConfig(): ContinueConfig {
  return continueConfigSchema.parse({});
}

function normalizeKeys(configPath: string, parsed: unknown): unknown {
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return parsed;
  }
  const normalized = new Map<string, unknown>();
  for (const [key, value] of Object.entries(parsed)) {
    const name = KEY_ALIASES[key] ?? key;
    if (normalized.has(name)) {
      throw new ConfigError(configPath, `${name} is given more than once`);
    }
    normalized.set(name, value);
  }
  return Object.fromEntries(normalized);
}

function describeIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Load and validate a YAML or JSON config file.
 * Throws ConfigError if the file cannot be parsed or fails validation.
 */
export function loadConfig(configPath: string): ContinueConfig {
  const raw = fs.readFileSync(configPath, "utf8");

  let parsed: unknown;
  try {
    parsed = configPath.endsWith(".json") ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigError(configPath, err instanceof Error ? err.message : String(err));
  }

  const result = continueConfigSchema.safeParse(normalizeKeys(configPath, parsed ?? {}));
  if (!result.success) {
    throw new ConfigError(configPath, describeIssues(result.error));
  }
  return result.data;
}

/**
 * First existing file among `.continue/config.yaml` and
 * `.continue/config.json`, or undefined.
 */
export function findWorkspaceConfig(workspaceDir: string): string | undefined {
  for (const candidate of CONFIG_CANDIDATES) {
    const candidatePath = path.join(workspaceDir, CONFIG_DIRECTORY, candidate);
    if (fs.existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
}

export function loadWorkspaceConfig(workspaceDir: string): ContinueConfig {
  const configPath = findWorkspaceConfig(workspaceDir);
  return configPath ? loadConfig(configPath) : defaultConfig();
}
