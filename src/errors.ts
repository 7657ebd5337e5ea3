import type { Step } from "./step";

/**
 * Raised on purpose by a step (through `sdk.raiseException`) to show the
 * user a titled message. Never retried.
 */
export class UserFacingException extends Error {
  readonly title: string;
  readonly step?: Step;

  constructor(message: string, title: string, step?: Step) {
    super(message);
    this.name = "UserFacingException";
    this.title = title;
    this.step = step;
  }
}

export class SecretUnavailableError extends Error {
  readonly envVar: string;

  constructor(envVar: string, prompt?: string) {
    super(prompt ? `${envVar} is not available. ${prompt}` : `${envVar} is not available.`);
    this.name = "SecretUnavailableError";
    this.envVar = envVar;
  }
}

export class StepExecutionFailure extends Error {
  readonly stepName: string;
  readonly output?: string;

  constructor(stepName: string, message: string, output?: string) {
    super(message);
    this.name = "StepExecutionFailure";
    this.stepName = stepName;
    this.output = output;
  }
}

export class NotImplementedError extends Error {
  readonly operation: string;

  constructor(operation: string) {
    super(`${operation} is not implemented`);
    this.name = "NotImplementedError";
    this.operation = operation;
  }
}

export class SessionClosedError extends Error {
  constructor(message = "Session was closed") {
    super(message);
    this.name = "SessionClosedError";
  }
}

export class ResourceCycleError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Resource "${key}" was requested while it was being constructed`);
    this.name = "ResourceCycleError";
    this.key = key;
  }
}

export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Invalid config at ${path}: ${reason}`);
    this.name = "ConfigError";
    this.path = path;
  }
}

/**
 * Title and message used when an error is recorded on a HistoryNode.
 */
export function describeError(err: unknown): { title: string; message: string } {
  if (err instanceof UserFacingException) {
    return { title: err.title, message: err.message };
  }
  if (err instanceof StepExecutionFailure) {
    return { title: `${err.stepName} failed`, message: err.message };
  }
  if (err instanceof Error) {
    return { title: err.name, message: err.message };
  }
  return { title: "Error", message: String(err) };
}
