import { FileSystemEdit, RangeInFile, editTarget, entireFileRange } from "./filesystem";
import { Observation } from "./observation";
import { BaseStep, StepOptions } from "./step";
import { CommandResult, CommandRunner, shellCommandRunner } from "./commandRunner";
import { StepExecutionFailure } from "./errors";
import { ensureAbsolutePath } from "./pathResolver";
import { ModelName } from "./models";
import { stripCodeFence } from "./llmAdapter";
import type { StepSDK } from "./sdk";

/**
 * Applies one filesystem edit through the host. A host failure propagates,
 * so the edit is recorded either as applied or as an error.
 */
export class FileSystemEditStep extends BaseStep {
  readonly edit: FileSystemEdit;

  constructor(edit: FileSystemEdit, options: StepOptions = {}) {
    super("FileSystemEditStep", options);
    this.edit = edit;
    this.hidden = options.hidden ?? true;
  }

  describe(): string {
    return this.description ?? `${this.edit.kind} ${editTarget(this.edit)}`;
  }

  async run(sdk: StepSDK): Promise<Observation> {
    return sdk.ide.applyFileSystemEdit(this.edit);
  }
}

export interface ShellCommandsStepOptions extends StepOptions {
  cmds: string[];
  cwd?: string;
  handleError?: boolean;
  runner?: CommandRunner;
}

function formatCommandOutput(result: CommandResult): string {
  return [result.stdout, result.stderr].filter((part) => part.length > 0).join("\n");
}

/**
 * Runs shell commands one after another and records their combined output.
 * The first failing command stops the sequence.
 */
export class ShellCommandsStep extends BaseStep {
  readonly cmds: string[];
  readonly cwd?: string;
  private readonly runner: CommandRunner;

  constructor(options: ShellCommandsStepOptions) {
    super("ShellCommandsStep", options);
    this.cmds = options.cmds;
    this.cwd = options.cwd;
    this.handleError = options.handleError ?? true;
    this.runner = options.runner ?? shellCommandRunner;
  }

  describe(): string {
    return this.description ?? `Run ${this.cmds.map((c) => `\`${c}\``).join(", ")}`;
  }

  async run(sdk: StepSDK): Promise<Observation> {
    const workspace = await sdk.ide.getWorkspaceDirectory();
    const cwd = this.cwd ? ensureAbsolutePath(this.cwd, workspace) : workspace;

    const outputs: string[] = [];
    for (const command of this.cmds) {
      const result = await this.runner(command, cwd);
      outputs.push(formatCommandOutput(result));
      if (result.exitCode !== 0) {
        const output = outputs.filter((o) => o.length > 0).join("\n");
        throw new StepExecutionFailure(
          this.name,
          `Command \`${command}\` exited with code ${String(result.exitCode)}${output ? `:\n${output}` : ""}`,
          output
        );
      }
    }

    return { kind: "text", text: outputs.filter((o) => o.length > 0).join("\n") };
  }
}

/**
 * Pauses until the user answers the prompt.
 */
export class WaitForUserConfirmationStep extends BaseStep {
  readonly prompt: string;

  constructor(prompt: string, options: StepOptions = {}) {
    super("WaitForUserConfirmationStep", { description: prompt, ...options });
    this.prompt = prompt;
  }

  async run(sdk: StepSDK): Promise<Observation> {
    const userInput = await sdk.waitForUserInput();
    return { kind: "user_input", userInput };
  }
}

/**
 * Asks the user a question and keeps the answer in the chat transcript.
 */
export class UserInputStep extends BaseStep {
  readonly prompt: string;

  constructor(prompt: string, options: StepOptions = {}) {
    super("UserInputStep", { description: prompt, ...options });
    this.prompt = prompt;
  }

  async run(sdk: StepSDK): Promise<Observation> {
    const userInput = await sdk.waitForUserInput();
    this.chatContext.push({ role: "user", content: userInput });
    return { kind: "user_input", userInput };
  }
}

export interface EditCodeStepOptions extends StepOptions {
  rangeInFiles: RangeInFile[];
  userInput: string;
  model?: ModelName;
}

export function buildEditPrompt(code: string, instruction: string): string {
  return [
    "Rewrite the following code according to the instruction.",
    "Respond with only the rewritten code, no explanation.",
    "",
    "Code:",
    "```",
    code,
    "```",
    "",
    `Instruction: ${instruction}`,
  ].join("\n");
}

/**
 * Has a model rewrite each range and applies the result as a file edit.
 */
export class EditCodeStep extends BaseStep {
  readonly rangeInFiles: RangeInFile[];
  readonly userInput: string;
  readonly model: ModelName;

  constructor(options: EditCodeStepOptions) {
    super("EditCodeStep", options);
    this.rangeInFiles = options.rangeInFiles;
    this.userInput = options.userInput;
    this.model = options.model ?? "gpt35";
  }

  describe(): string {
    return this.description ?? `Edit code: ${this.userInput}`;
  }

  async run(sdk: StepSDK): Promise<Observation> {
    const model = await sdk.models.get(this.model);
    this.chatContext.push({ role: "user", content: this.userInput });

    const edited: string[] = [];
    for (const rif of this.rangeInFiles) {
      const code = await sdk.ide.readRangeInFile(rif);
      const completion = await model.complete(buildEditPrompt(code, this.userInput), {
        temperature: 0,
      });
      const range = rif.range ?? entireFileRange(await sdk.ide.readFile(rif.filepath));

      await sdk.applyFilesystemEdit(
        {
          kind: "file_edit",
          filepath: rif.filepath,
          range,
          replacement: stripCodeFence(completion),
        }
      );
      edited.push(rif.filepath);
    }

    const summary = `Edited ${edited.join(", ")}`;
    this.chatContext.push({ role: "assistant", content: summary });
    return { kind: "text", text: summary };
  }
}
