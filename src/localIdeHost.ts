import * as fs from "fs";
import * as fsp from "fs/promises";
import * as path from "path";
import {
  FileSystemEdit,
  RangeInFile,
  applyRangeReplacement,
  readRange,
} from "./filesystem";
import { FileSystemEditObservation } from "./observation";
import { IdeHost } from "./ideHost";
import { SecretUnavailableError } from "./errors";
import { ensureAbsolutePath } from "./pathResolver";

export interface LocalIdeHostOptions {
  /**
   * Where secrets are looked up. Defaults to process.env.
   */
  env?: NodeJS.ProcessEnv;
}

/**
 * Disk-backed host that:
 * - reads and writes files under the workspace root,
 * - takes secrets from environment variables,
 * - and keeps the open-file and highlight lists the embedding app reports.
 *
 * Use with care: edits go straight to the real filesystem.
 */
export class LocalIdeHost implements IdeHost {
  readonly workspaceDirectory: string;
  private readonly env: NodeJS.ProcessEnv;
  private openFiles: string[] = [];
  private highlighted: RangeInFile[] = [];

  constructor(workspaceDirectory: string, options: LocalIdeHostOptions = {}) {
    this.workspaceDirectory = path.resolve(workspaceDirectory);
    this.env = options.env ?? process.env;
  }

  async getWorkspaceDirectory(): Promise<string> {
    return this.workspaceDirectory;
  }

  async setFileOpen(filepath: string): Promise<void> {
    const abs = this.resolve(filepath);
    if (!this.openFiles.includes(abs)) {
      this.openFiles.push(abs);
    }
  }

  getOpenFiles(): string[] {
    return [...this.openFiles];
  }

  async readFile(filepath: string): Promise<string> {
    return fsp.readFile(this.resolve(filepath), "utf8");
  }

  async readRangeInFile(rangeInFile: RangeInFile): Promise<string> {
    const content = await this.readFile(rangeInFile.filepath);
    return readRange(content, rangeInFile.range);
  }

  async applyFileSystemEdit(edit: FileSystemEdit): Promise<FileSystemEditObservation> {
    switch (edit.kind) {
      case "add_file": {
        const abs = this.resolve(edit.filepath);
        const content = edit.content ?? "";
        await fsp.mkdir(path.dirname(abs), { recursive: true });
        await writeAtomically(abs, content);
        return { kind: "file_system_edit", edit, content };
      }
      case "delete_file": {
        await fsp.rm(this.resolve(edit.filepath));
        return { kind: "file_system_edit", edit };
      }
      case "add_directory": {
        await fsp.mkdir(this.resolve(edit.path), { recursive: true });
        return { kind: "file_system_edit", edit };
      }
      case "delete_directory": {
        const abs = this.resolve(edit.path);
        const stat = await fsp.stat(abs);
        if (!stat.isDirectory()) {
          throw new Error(`Not a directory: ${edit.path}`);
        }
        await fsp.rm(abs, { recursive: true });
        return { kind: "file_system_edit", edit };
      }
      case "file_edit": {
        const abs = this.resolve(edit.filepath);
        const previous = await fsp.readFile(abs, "utf8");
        const content = applyRangeReplacement(previous, edit.range, edit.replacement);
        await writeAtomically(abs, content);
        return { kind: "file_system_edit", edit, content };
      }
    }
  }

  async getUserSecret(envVar: string): Promise<string> {
    const value = this.env[envVar];
    if (!value) {
      throw new SecretUnavailableError(envVar);
    }
    return value;
  }

  async getHighlightedCode(): Promise<RangeInFile[]> {
    return [...this.highlighted];
  }

  setHighlightedCode(ranges: RangeInFile[]): void {
    this.highlighted = ranges;
  }

  private resolve(p: string): string {
    return ensureAbsolutePath(p, this.workspaceDirectory);
  }
}

async function writeAtomically(filePath: string, content: string): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  await fsp.writeFile(tmpPath, content, "utf8");
  try {
    await fsp.rename(tmpPath, filePath);
  } catch (err) {
    if (fs.existsSync(tmpPath)) {
      await fsp.rm(tmpPath);
    }
    throw err;
  }
}
