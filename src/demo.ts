import { Autopilot } from "./autopilot";
import { InMemoryIdeHost } from "./ideHost";
import { CommandResult } from "./commandRunner";
import { CompletionOptions, LLMAdapter } from "./llmAdapter";
import { LoggingLLMAdapter } from "./logging";
import { ModelDefinitions } from "./models";
import { ResourceCache } from "./secretGatedResource";
import { Observation } from "./observation";
import { BaseStep } from "./step";
import { StepSDK } from "./sdk";

// Mock LLM: always answers with the same rewritten code
class MockEditAdapter implements LLMAdapter {
  readonly model = "mock-editor";
  constructor(private readonly output: string) {}
  async complete(_prompt: string, _options?: CompletionOptions): Promise<string> {
    return "```ts\n" + this.output + "\n```";
  }
}

// Fake command runner: simulates successful tests
async function fakeRunCommand(command: string, _cwd: string): Promise<CommandResult> {
  return {
    command,
    exitCode: 0,
    stdout: `[fake] ${command}: all tests passed`,
    stderr: "",
  };
}

/**
 * A user-defined step built only from SDK calls.
 */
export class ImproveLoggingStep extends BaseStep {
  constructor() {
    super("ImproveLoggingStep", { description: "Improve the login log message" });
  }

  async run(sdk: StepSDK): Promise<Observation> {
    await sdk.addDirectory("src");
    await sdk.addFile("src/login.ts", "console.log('old');\n");
    await sdk.editFile("src/login.ts", "Make the log message more descriptive.");
    await sdk.appendToFile("src/login.ts", "\nexport {};\n");

    const answer = await sdk.waitForUserConfirmation("Run the tests now?");
    if (answer.kind === "user_input" && answer.userInput.trim() !== "yes") {
      return { kind: "text", text: "Skipped tests" };
    }

    const output = await sdk.run("npm test");
    sdk.addChatContext(`Tests finished: ${output}`);
    return { kind: "text", text: output };
  }
}

export async function runDemo(): Promise<Autopilot> {
  const ide = new InMemoryIdeHost("/workspace", {
    secrets: { OPENAI_API_KEY: "test-secret" },
  });
  const editor = new LoggingLLMAdapter(
    new MockEditAdapter("console.log('User logged in successfully');"),
    "MockEditAdapter"
  );
  const models: ModelDefinitions = {
    gpt35: { secretName: "OPENAI_API_KEY", prompt: "Set OPENAI_API_KEY", create: () => editor },
    starcoder: { secretName: "HUGGING_FACE_TOKEN", prompt: "Set HUGGING_FACE_TOKEN", create: () => editor },
  };

  const autopilot = new Autopilot(ide, {
    commandRunner: fakeRunCommand,
    models,
    resourceCache: new ResourceCache<LLMAdapter>(),
  });

  // Answer every confirmation as soon as the step asks for it.
  autopilot.subscribe(async (state) => {
    if (state.userInputPending) {
      await autopilot.deliverUserInput("yes");
    }
  });

  await autopilot.runSingularStep(new ImproveLoggingStep());
  return autopilot;
}

if (require.main === module) {
  runDemo()
    .then((autopilot) => {
      for (const node of autopilot.getState().history.timeline) {
        const indent = "  ".repeat(node.depth);
        console.log(`${indent}[${node.index}] ${node.name}: ${node.description}`);
        console.log(`${indent}    -> ${JSON.stringify(node.observation)}`);
      }
    })
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
