import type { Observation } from "./observation";
import type { StepSDK } from "./sdk";

export type ChatMessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatMessageRole;
  content: string;
}

/**
 * A discrete, recorded unit of work.
 *
 * Steps are an open family: anything implementing this interface can be
 * handed to `Autopilot.runSingularStep` or `sdk.runStep`. A step only ever
 * reaches the workspace, the shell, secrets and models through the SDK it
 * is given.
 */
export interface Step {
  name: string;
  description?: string;
  /**
   * Hidden steps are recorded but left out of the chat transcript.
   */
  hidden: boolean;
  /**
   * Messages attached to this step while or after it runs.
   */
  chatContext: ChatMessage[];
  /**
   * When false, an error thrown by `run` is recorded and then re-thrown to
   * the caller instead of being turned into an error observation only.
   */
  handleError?: boolean;

  describe(): string;
  run(sdk: StepSDK): Promise<Observation>;
}

export interface StepOptions {
  name?: string;
  description?: string;
  hidden?: boolean;
}

export abstract class BaseStep implements Step {
  name: string;
  description?: string;
  hidden: boolean;
  chatContext: ChatMessage[] = [];
  handleError?: boolean;

  constructor(defaultName: string, options: StepOptions = {}) {
    this.name = options.name ?? defaultName;
    this.description = options.description;
    this.hidden = options.hidden ?? false;
  }

  describe(): string {
    return this.description ?? this.name;
  }

  abstract run(sdk: StepSDK): Promise<Observation>;
}
