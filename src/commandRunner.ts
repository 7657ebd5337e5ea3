import { exec as execCb } from "child_process";
import { promisify } from "util";

const exec = promisify(execCb);

export interface CommandResult {
  command: string;
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, cwd: string) => Promise<CommandResult>;

function execFailureFields(err: unknown): { code?: unknown; stdout?: unknown; stderr?: unknown } {
  if (typeof err !== "object" || err === null) return {};
  return {
    code: "code" in err ? err.code : undefined,
    stdout: "stdout" in err ? err.stdout : undefined,
    stderr: "stderr" in err ? err.stderr : undefined,
  };
}

/**
 * Runs a command through the system shell. A non-zero exit is reported in
 * the result rather than thrown.
 */
export const shellCommandRunner: CommandRunner = async (command, cwd) => {
  try {
    const { stdout, stderr } = await exec(command, { cwd });
    return { command, exitCode: 0, stdout, stderr };
  } catch (err) {
    const failure = execFailureFields(err);
    return {
      command,
      exitCode: typeof failure.code === "number" ? failure.code : null,
      stdout: typeof failure.stdout === "string" ? failure.stdout : "",
      stderr: typeof failure.stderr === "string" ? failure.stderr : String(err),
    };
  }
};
