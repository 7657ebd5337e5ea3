import type { AutopilotCapabilities } from "./autopilot";
import { IdeHost } from "./ideHost";
import { HistoryNode, ReadonlyHistory } from "./history";
import { ReadonlyContext } from "./context";
import { Models } from "./models";
import { ContinueConfig, loadWorkspaceConfig } from "./config";
import {
  FileSystemEdit,
  Range,
  fileEditFromAppend,
  rangeInFileFromEntireFile,
} from "./filesystem";
import { Observation, observationText } from "./observation";
import { ChatMessage, ChatMessageRole, Step } from "./step";
import {
  EditCodeStep,
  FileSystemEditStep,
  ShellCommandsStep,
  WaitForUserConfirmationStep,
} from "./coreSteps";
import {
  NotImplementedError,
  SecretUnavailableError,
  UserFacingException,
} from "./errors";
import { ensureAbsolutePath } from "./pathResolver";

export interface RunOptions {
  cwd?: string;
  name?: string;
  description?: string;
  /**
   * When false, a failing command rejects `run` instead of only being
   * recorded as an error observation. Defaults to true.
   */
  handleError?: boolean;
}

export interface EditFileOptions {
  name?: string;
  description?: string;
  range?: Range;
}

export function highlightedCodeMessage(code: string): ChatMessage {
  return {
    role: "user",
    content: `The following code is highlighted:\n\`\`\`\n${code}\n\`\`\``,
  };
}

/**
 * The SDK provided to a step when it runs.
 *
 * Every privileged action a step can take goes through here. Actions that
 * should show up in History are wrapped in a step and run through the
 * Autopilot; plain reads go straight to the host.
 */
export class StepSDK {
  readonly ide: IdeHost;
  readonly models: Models;
  private readonly autopilot: AutopilotCapabilities;
  private readonly node: HistoryNode;

  /**
   * @param node - the History entry of the step this SDK was created for
   */
  constructor(ide: IdeHost, autopilot: AutopilotCapabilities, node: HistoryNode) {
    this.ide = ide;
    this.autopilot = autopilot;
    this.node = node;
    this.models = new Models(
      (envVar, prompt) => this.getUserSecret(envVar, prompt),
      autopilot.modelDefinitions,
      autopilot.resourceCache
    );
  }

  get history(): ReadonlyHistory {
    return this.autopilot.history;
  }

  get context(): ReadonlyContext {
    return this.autopilot.context;
  }

  /**
   * First of `.continue/config.yaml` and `.continue/config.json` under the
   * workspace, or the default config. A malformed file throws.
   */
  get config(): ContinueConfig {
    return loadWorkspaceConfig(this.ide.workspaceDirectory);
  }

  async ensureAbsolutePath(filepath: string): Promise<string> {
    return ensureAbsolutePath(filepath, await this.ide.getWorkspaceDirectory());
  }

  /**
   * Run `step` as a child of this SDK's step, recorded one level deeper.
   */
  runStep(step: Step): Promise<Observation> {
    return this.autopilot.runNestedStep(step, this.node);
  }

  applyFilesystemEdit(
    edit: FileSystemEdit,
    name?: string,
    description?: string
  ): Promise<Observation> {
    return this.runStep(new FileSystemEditStep(edit, { name, description }));
  }

  /**
   * Run one or more shell commands as a recorded step; resolves to their output.
   */
  async run(commands: string | string[], options: RunOptions = {}): Promise<string> {
    const cmds = Array.isArray(commands) ? commands : [commands];
    const observation = await this.runStep(
      new ShellCommandsStep({
        cmds,
        cwd: options.cwd,
        name: options.name,
        description: options.description,
        handleError: options.handleError ?? true,
        runner: this.autopilot.commandRunner,
      })
    );
    return observationText(observation);
  }

  async editFile(filename: string, prompt: string, options: EditFileOptions = {}): Promise<void> {
    const filepath = await this.ensureAbsolutePath(filename);

    await this.ide.setFileOpen(filepath);
    const contents = await this.ide.readFile(filepath);
    await this.runStep(
      new EditCodeStep({
        rangeInFiles: [
          options.range
            ? { filepath, range: options.range }
            : rangeInFileFromEntireFile(filepath, contents),
        ],
        userInput: prompt,
        model: this.config.defaultModel,
        name: options.name,
        description: options.description,
      })
    );
  }

  /**
   * Appends straight through the host. Not recorded in History.
   */
  async appendToFile(filename: string, content: string): Promise<void> {
    const filepath = await this.ensureAbsolutePath(filename);
    const previousContent = await this.ide.readFile(filepath);
    const fileEdit = fileEditFromAppend(filepath, previousContent, content);
    await this.ide.applyFileSystemEdit(fileEdit);
  }

  async addFile(filename: string, content?: string): Promise<Observation> {
    const filepath = await this.ensureAbsolutePath(filename);
    return this.runStep(new FileSystemEditStep({ kind: "add_file", filepath, content }));
  }

  // deleteFile, addDirectory and deleteDirectory resolve the path but send
  // the caller's argument; the host resolves it against the workspace.

  async deleteFile(filename: string): Promise<Observation> {
    await this.ensureAbsolutePath(filename);
    return this.runStep(new FileSystemEditStep({ kind: "delete_file", filepath: filename }));
  }

  async addDirectory(dirPath: string): Promise<Observation> {
    await this.ensureAbsolutePath(dirPath);
    return this.runStep(new FileSystemEditStep({ kind: "add_directory", path: dirPath }));
  }

  async deleteDirectory(dirPath: string): Promise<Observation> {
    await this.ensureAbsolutePath(dirPath);
    return this.runStep(new FileSystemEditStep({ kind: "delete_directory", path: dirPath }));
  }

  /**
   * `prompt` is shown to the user when the host has no value for `envVar`.
   */
  async getUserSecret(envVar: string, prompt: string): Promise<string> {
    try {
      return await this.ide.getUserSecret(envVar);
    } catch (err) {
      if (err instanceof SecretUnavailableError && err.envVar === envVar) {
        throw new SecretUnavailableError(envVar, prompt);
      }
      throw err;
    }
  }

  waitForUserInput(): Promise<string> {
    return this.autopilot.waitForUserInput();
  }

  waitForUserConfirmation(prompt: string): Promise<Observation> {
    return this.runStep(new WaitForUserConfirmationStep(prompt));
  }

  /**
   * The History transcript followed by one message per highlighted range.
   */
  async getChatContext(): Promise<ChatMessage[]> {
    const messages = this.history.toChatHistory();
    const highlighted = await this.ide.getHighlightedCode();
    for (const rif of highlighted) {
      const code = await this.ide.readRangeInFile(rif);
      messages.push(highlightedCodeMessage(code));
    }
    return messages;
  }

  /**
   * Attach a message to the running step this SDK belongs to. Nested steps
   * that already finished are left alone.
   */
  addChatContext(content: string, role: ChatMessageRole = "assistant"): void {
    this.node.step.chatContext.push({ role, content });
  }

  raiseException(message: string, title: string, withStep?: Step): never {
    throw new UserFacingException(message, title, withStep);
  }

  setLoadingMessage(_message: string): never {
    throw new NotImplementedError("setLoadingMessage");
  }

  updateUi(): Promise<void> {
    return this.autopilot.updateSubscribers();
  }
}
