import * as path from "path";
import {
  FileSystemEdit,
  RangeInFile,
  applyRangeReplacement,
  readRange,
} from "./filesystem";
import { FileSystemEditObservation } from "./observation";
import { SecretUnavailableError } from "./errors";
import { ensureAbsolutePath } from "./pathResolver";

/**
 * Everything the engine needs from the editor it runs inside.
 * The concrete transport (extension API, socket, local disk) lives behind it.
 */
export interface IdeHost {
  /**
   * Synchronous mirror of getWorkspaceDirectory, used for config lookup.
   */
  readonly workspaceDirectory: string;

  getWorkspaceDirectory(): Promise<string>;
  setFileOpen(filepath: string): Promise<void>;
  readFile(filepath: string): Promise<string>;
  readRangeInFile(rangeInFile: RangeInFile): Promise<string>;
  /**
   * Apply one edit. Either the edit is fully applied and an observation is
   * returned, or the promise rejects and nothing was changed.
   */
  applyFileSystemEdit(edit: FileSystemEdit): Promise<FileSystemEditObservation>;
  /**
   * Rejects with SecretUnavailableError when the secret cannot be supplied.
   */
  getUserSecret(envVar: string): Promise<string>;
  getHighlightedCode(): Promise<RangeInFile[]>;
}

export interface InMemoryIdeHostOptions {
  files?: Record<string, string>;
  directories?: string[];
  secrets?: Record<string, string>;
  highlighted?: RangeInFile[];
}

/**
 * Host that keeps the whole workspace in memory.
 * Used for tests and demos; relative paths are taken against the workspace.
 */
export class InMemoryIdeHost implements IdeHost {
  readonly workspaceDirectory: string;
  readonly openedFiles: string[] = [];
  readonly appliedEdits: FileSystemEdit[] = [];
  readonly secretRequests: string[] = [];

  private files = new Map<string, string>();
  private directories = new Set<string>();
  private secrets = new Map<string, string>();
  private highlighted: RangeInFile[];

  constructor(workspaceDirectory: string, options: InMemoryIdeHostOptions = {}) {
    this.workspaceDirectory = workspaceDirectory;
    for (const [p, content] of Object.entries(options.files ?? {})) {
      this.files.set(this.resolve(p), content);
    }
    for (const dir of options.directories ?? []) {
      this.directories.add(this.resolve(dir));
    }
    for (const [key, value] of Object.entries(options.secrets ?? {})) {
      this.secrets.set(key, value);
    }
    this.highlighted = options.highlighted ?? [];
  }

  async getWorkspaceDirectory(): Promise<string> {
    return this.workspaceDirectory;
  }

  async setFileOpen(filepath: string): Promise<void> {
    this.openedFiles.push(filepath);
  }

  async readFile(filepath: string): Promise<string> {
    const content = this.files.get(this.resolve(filepath));
    if (content === undefined) {
      throw new Error(`File not found: ${filepath}`);
    }
    return content;
  }

  async readRangeInFile(rangeInFile: RangeInFile): Promise<string> {
    const content = await this.readFile(rangeInFile.filepath);
    return readRange(content, rangeInFile.range);
  }

  async applyFileSystemEdit(edit: FileSystemEdit): Promise<FileSystemEditObservation> {
    switch (edit.kind) {
      case "add_file": {
        const abs = this.resolve(edit.filepath);
        if (this.directories.has(abs)) {
          throw new Error(`Cannot add file over directory: ${edit.filepath}`);
        }
        const content = edit.content ?? "";
        this.files.set(abs, content);
        this.record(edit);
        return { kind: "file_system_edit", edit, content };
      }
      case "delete_file": {
        const abs = this.resolve(edit.filepath);
        if (!this.files.has(abs)) {
          throw new Error(`File not found: ${edit.filepath}`);
        }
        this.files.delete(abs);
        this.record(edit);
        return { kind: "file_system_edit", edit };
      }
      case "add_directory": {
        const abs = this.resolve(edit.path);
        if (this.files.has(abs)) {
          throw new Error(`A file already exists at ${edit.path}`);
        }
        this.directories.add(abs);
        this.record(edit);
        return { kind: "file_system_edit", edit };
      }
      case "delete_directory": {
        const abs = this.resolve(edit.path);
        if (!this.directoryExists(abs)) {
          throw new Error(`Directory not found: ${edit.path}`);
        }
        const prefix = abs + path.sep;
        for (const file of [...this.files.keys()]) {
          if (file.startsWith(prefix)) this.files.delete(file);
        }
        for (const dir of [...this.directories]) {
          if (dir === abs || dir.startsWith(prefix)) this.directories.delete(dir);
        }
        this.record(edit);
        return { kind: "file_system_edit", edit };
      }
      case "file_edit": {
        const abs = this.resolve(edit.filepath);
        const previous = this.files.get(abs);
        if (previous === undefined) {
          throw new Error(`File not found: ${edit.filepath}`);
        }
        const content = applyRangeReplacement(previous, edit.range, edit.replacement);
        this.files.set(abs, content);
        this.record(edit);
        return { kind: "file_system_edit", edit, content };
      }
    }
  }

  async getUserSecret(envVar: string): Promise<string> {
    this.secretRequests.push(envVar);
    const value = this.secrets.get(envVar);
    if (value === undefined) {
      throw new SecretUnavailableError(envVar);
    }
    return value;
  }

  async getHighlightedCode(): Promise<RangeInFile[]> {
    return [...this.highlighted];
  }

  // ---------- Test helpers ----------

  setHighlightedCode(ranges: RangeInFile[]): void {
    this.highlighted = ranges;
  }

  setSecret(envVar: string, value: string): void {
    this.secrets.set(envVar, value);
  }

  fileContent(filepath: string): string | undefined {
    return this.files.get(this.resolve(filepath));
  }

  hasDirectory(dirPath: string): boolean {
    return this.directoryExists(this.resolve(dirPath));
  }

  private resolve(p: string): string {
    return ensureAbsolutePath(p, this.workspaceDirectory);
  }

  private directoryExists(abs: string): boolean {
    if (this.directories.has(abs)) return true;
    const prefix = abs + path.sep;
    for (const file of this.files.keys()) {
      if (file.startsWith(prefix)) return true;
    }
    return false;
  }

  private record(edit: FileSystemEdit): void {
    this.appliedEdits.push(edit);
  }
}
