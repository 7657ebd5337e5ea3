import { IdeHost } from "./ideHost";
import { History, HistoryNode, HistorySnapshot, ReadonlyHistory } from "./history";
import { Context, ContextValue, ReadonlyContext } from "./context";
import { Observation } from "./observation";
import { Step } from "./step";
import { StepSDK } from "./sdk";
import { CommandRunner, shellCommandRunner } from "./commandRunner";
import { LLMAdapter } from "./llmAdapter";
import { ModelDefinitions, defaultModelDefinitions, modelCache } from "./models";
import { ResourceCache } from "./secretGatedResource";
import { loadWorkspaceConfig } from "./config";
import { SessionClosedError, UserFacingException, describeError } from "./errors";
import { errorMessageOf, logStepEvent } from "./logging";

export interface AutopilotOptions {
  commandRunner?: CommandRunner;
  models?: ModelDefinitions;
  resourceCache?: ResourceCache<LLMAdapter>;
  /**
   * Step names that are recorded as errors instead of being run.
   */
  disallowedSteps?: string[];
}

export interface SessionState {
  history: HistorySnapshot;
  context: Record<string, ContextValue>;
  userInputPending: boolean;
  closed: boolean;
}

export type SessionListener = (state: SessionState) => void | Promise<void>;

/**
 * The part of the Autopilot a StepSDK is allowed to use.
 */
export interface AutopilotCapabilities {
  readonly history: ReadonlyHistory;
  readonly context: ReadonlyContext;
  readonly commandRunner: CommandRunner;
  readonly modelDefinitions: ModelDefinitions;
  readonly resourceCache: ResourceCache<LLMAdapter>;
  runSingularStep(step: Step): Promise<Observation>;
  runNestedStep(step: Step, parent: HistoryNode): Promise<Observation>;
  waitForUserInput(): Promise<string>;
  updateSubscribers(): Promise<void>;
}

interface PendingInput {
  resolve: (input: string) => void;
  reject: (err: Error) => void;
}

/**
 * Owns the History and Context of one session and is the only thing that
 * appends to History.
 *
 * `runSingularStep` calls are queued so one step flow runs at a time.
 * A running step starts children through `sdk.runStep`, which goes to
 * `runNestedStep`: the child belongs to the parent's flow and runs
 * immediately, one nesting level deeper.
 */
export class Autopilot implements AutopilotCapabilities {
  readonly history = new History();
  readonly context = new Context();
  readonly commandRunner: CommandRunner;
  readonly modelDefinitions: ModelDefinitions;
  readonly resourceCache: ResourceCache<LLMAdapter>;

  private readonly disallowedSteps: Set<string>;
  private queue: Promise<void> = Promise.resolve();
  private pendingInput: PendingInput | null = null;
  private listeners: SessionListener[] = [];
  private closed = false;

  constructor(readonly ide: IdeHost, options: AutopilotOptions = {}) {
    this.commandRunner = options.commandRunner ?? shellCommandRunner;
    this.modelDefinitions = options.models ?? defaultModelDefinitions;
    this.resourceCache = options.resourceCache ?? modelCache;
    this.disallowedSteps = new Set(options.disallowedSteps ?? []);
  }

  /**
   * Autopilot with `disallowedSteps` taken from the workspace config.
   */
  static fromWorkspace(ide: IdeHost, options: AutopilotOptions = {}): Autopilot {
    const config = loadWorkspaceConfig(ide.workspaceDirectory);
    return new Autopilot(ide, { disallowedSteps: config.disallowedSteps, ...options });
  }

  runSingularStep(step: Step): Promise<Observation> {
    return this.enqueue(() => this.executeStep(step, 0));
  }

  /**
   * Run `step` as a child of the running step `parent`.
   */
  async runNestedStep(step: Step, parent: HistoryNode): Promise<Observation> {
    if (!parent.active) {
      throw new Error(
        `${parent.step.name} has finished; start new steps with runSingularStep`
      );
    }
    return this.executeStep(step, parent.depth + 1);
  }

  async waitForUserInput(): Promise<string> {
    if (this.closed) {
      throw new SessionClosedError();
    }
    if (this.pendingInput) {
      throw new Error("Already waiting for user input");
    }

    const input = new Promise<string>((resolve, reject) => {
      this.pendingInput = { resolve, reject };
    });
    // Awaited together so a close() during notification rejects into the caller.
    const [value] = await Promise.all([input, this.updateSubscribers()]);
    return value;
  }

  isWaitingForUserInput(): boolean {
    return this.pendingInput !== null;
  }

  /**
   * Hand a string to the pending `waitForUserInput`.
   * Returns false when nothing is waiting.
   */
  async deliverUserInput(input: string): Promise<boolean> {
    const pending = this.pendingInput;
    if (!pending) {
      return false;
    }
    this.pendingInput = null;
    pending.resolve(input);
    await this.updateSubscribers();
    return true;
  }

  /**
   * Tear the session down. A pending wait fails with SessionClosedError, as
   * does every later wait or step.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const pending = this.pendingInput;
    this.pendingInput = null;
    pending?.reject(new SessionClosedError("Session was closed while waiting for user input"));
    await this.updateSubscribers();
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  /**
   * A failing listener is logged and skipped; it never fails the caller.
   */
  async updateSubscribers(): Promise<void> {
    const state = this.getState();
    for (const listener of [...this.listeners]) {
      try {
        await listener(state);
      } catch (err) {
        console.error("Session listener failed", err);
      }
    }
  }

  getState(): SessionState {
    return {
      history: this.history.snapshot(),
      context: this.context.toJSON(),
      userInputPending: this.pendingInput !== null,
      closed: this.closed,
    };
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    // Keep the chain going whatever the outcome; the caller sees the rejection.
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async executeStep(step: Step, depth: number): Promise<Observation> {
    if (this.closed) {
      throw new SessionClosedError();
    }

    const node: HistoryNode = { step, depth, active: true };
    const index = this.history.addNode(node);
    const start = Date.now();
    logStepEvent({
      timestamp: new Date().toISOString(),
      event: "started",
      stepName: step.name,
      index,
      depth,
    });
    await this.updateSubscribers();

    let observation: Observation;
    let failure: unknown;
    let failed = false;
    const disallowed = this.disallowedSteps.has(step.name);

    try {
      if (disallowed) {
        throw new UserFacingException(
          `${step.name} is disallowed by the workspace configuration`,
          "Step disallowed",
          step
        );
      }
      const sdk = new StepSDK(this.ide, this, node);
      observation = await step.run(sdk);
    } catch (err) {
      failed = true;
      failure = err;
      const { title, message } = describeError(err);
      observation = { kind: "error", title, message, stepName: step.name };
    }

    node.observation = observation;
    node.active = false;
    logStepEvent({
      timestamp: new Date().toISOString(),
      event: disallowed ? "skipped" : failed ? "failed" : "finished",
      stepName: step.name,
      index,
      depth,
      observationKind: observation.kind,
      durationMs: Date.now() - start,
      errorMessage: failed ? errorMessageOf(failure) : undefined,
    });
    await this.updateSubscribers();

    if (failed && step.handleError === false) {
      throw failure;
    }
    return observation;
  }
}
