import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";

const execFile = promisify(execFileCb);

export interface CommandResult {
  /** Process exit code, or null when it never ran to completion (missing binary, timeout). */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<CommandResult>;

const toText = (value: string | Buffer | undefined): string =>
  typeof value === "string" ? value : value?.toString("utf-8") ?? "";

/**
 * Runs a command and reports how it ended. Non-zero exits, spawn errors and
 * timeouts all resolve; callers decide what counts as success.
 */
export const runCommand: CommandRunner = async (file, args, { timeoutMs }) => {
  try {
    const { stdout, stderr } = await execFile(file, args, { timeout: timeoutMs });
    return { exitCode: 0, stdout: toText(stdout), stderr: toText(stderr) };
  } catch (error) {
    const execError = error as Error & {
      code?: number | string;
      stdout?: string | Buffer;
      stderr?: string | Buffer;
    };
    const exitCode = typeof execError.code === "number" ? execError.code : null;
    const stderr = toText(execError.stderr) || String(execError.message);
    return { exitCode, stdout: toText(execError.stdout), stderr };
  }
};
