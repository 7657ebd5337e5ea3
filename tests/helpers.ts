import { Autopilot, AutopilotOptions } from "../src/autopilot";
import { InMemoryIdeHost, InMemoryIdeHostOptions } from "../src/ideHost";
import { CommandResult, CommandRunner } from "../src/commandRunner";
import { CompletionOptions, LLMAdapter } from "../src/llmAdapter";
import { ModelDefinitions } from "../src/models";
import { ResourceCache } from "../src/secretGatedResource";
import { Observation } from "../src/observation";
import { BaseStep, StepOptions } from "../src/step";
import { StepSDK } from "../src/sdk";

export class MockAdapter implements LLMAdapter {
  readonly model = "mock";
  public lastPrompt: string | null = null;
  public calls = 0;

  constructor(public nextOutput: string | null = null) {}

  async complete(prompt: string, _options?: CompletionOptions): Promise<string> {
    this.lastPrompt = prompt;
    this.calls++;
    if (this.nextOutput === null) {
      throw new Error("MockAdapter.nextOutput must be set before calling complete.");
    }
    return this.nextOutput;
  }
}

/**
 * Step whose body is supplied by the test.
 */
export class ScriptStep extends BaseStep {
  constructor(
    private readonly body: (sdk: StepSDK) => Promise<Observation | void>,
    options: StepOptions = {}
  ) {
    super("ScriptStep", options);
  }

  async run(sdk: StepSDK): Promise<Observation> {
    const result = await this.body(sdk);
    if (result) return result;
    return { kind: "text", text: "" };
  }
}

export class FakeCommandRunner {
  readonly calls: { command: string; cwd: string }[] = [];
  private results = new Map<string, Omit<CommandResult, "command">>();

  on(command: string, result: Omit<CommandResult, "command">): this {
    this.results.set(command, result);
    return this;
  }

  readonly run: CommandRunner = async (command, cwd) => {
    this.calls.push({ command, cwd });
    const result = this.results.get(command) ?? { exitCode: 0, stdout: "", stderr: "" };
    return { command, ...result };
  };
}

export function mockModels(adapter: LLMAdapter, created?: { count: number }): ModelDefinitions {
  const create = () => {
    if (created) created.count++;
    return adapter;
  };
  return {
    gpt35: { secretName: "OPENAI_API_KEY", prompt: "Add your OpenAI key", create },
    starcoder: { secretName: "HUGGING_FACE_TOKEN", prompt: "Add your Hugging Face token", create },
  };
}

export interface TestSession {
  ide: InMemoryIdeHost;
  autopilot: Autopilot;
  runner: FakeCommandRunner;
  adapter: MockAdapter;
}

export function createSession(
  hostOptions: InMemoryIdeHostOptions = {},
  options: AutopilotOptions = {}
): TestSession {
  const ide = new InMemoryIdeHost("/ws", {
    secrets: { OPENAI_API_KEY: "test-secret" },
    ...hostOptions,
  });
  const runner = new FakeCommandRunner();
  const adapter = new MockAdapter();
  const autopilot = new Autopilot(ide, {
    commandRunner: runner.run,
    models: mockModels(adapter),
    resourceCache: new ResourceCache<LLMAdapter>(),
    ...options,
  });
  return { ide, autopilot, runner, adapter };
}

export function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
