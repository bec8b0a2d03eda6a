/**
 * External command execution for imgspec.
 *
 * Every subprocess (docker, depot, aws, which) flows through a CommandRunner
 * so tests can substitute a fake without invoking real tools.
 */

import { platform } from "node:process";
import { execa, ExecaError, type Options as ExecaOptions } from "execa";

import { TOOL_CHECK_TIMEOUT } from "./constants.js";
import { ToolNotFoundError } from "./errors.js";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  /** Milliseconds; 0 or undefined means no timeout. */
  timeout?: number;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Mirror stdout/stderr to the terminal while still capturing them. */
  stream?: boolean;
}

/**
 * Injectable seam over process execution.
 *
 * `run` never rejects on a non-zero exit code; it rejects with
 * ToolNotFoundError when the executable cannot be spawned at all.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
  /** Resolve an executable on PATH, or null when it is absent. */
  which(command: string): Promise<string | null>;
}

/** Short human-readable command preview for error messages. */
export function describeCommand(command: string, args: readonly string[]): string {
  const head = args.slice(0, 3).join(" ");
  return args.length > 3 ? `${command} ${head}...` : `${command} ${head}`.trimEnd();
}

/** CommandRunner backed by execa. */
export class ExecaCommandRunner implements CommandRunner {
  async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const execaOptions: ExecaOptions = {
      timeout: options.timeout ?? 0,
      env: options.env,
      cwd: options.cwd,
      stdin: "ignore",
      stdout: options.stream ? ["pipe", "inherit"] : "pipe",
      stderr: options.stream ? ["pipe", "inherit"] : "pipe",
    };

    try {
      const result = await execa(command, [...args], execaOptions);
      return {
        exitCode: result.exitCode ?? 0,
        stdout: String(result.stdout ?? ""),
        stderr: String(result.stderr ?? ""),
        timedOut: false,
      };
    } catch (error: unknown) {
      if (!(error instanceof ExecaError)) {
        throw error;
      }
      if (error.code === "ENOENT") {
        throw new ToolNotFoundError(command, `${command} not found in PATH. Command: ${describeCommand(command, args)}`);
      }
      return {
        exitCode: error.exitCode ?? 1,
        stdout: String(error.stdout ?? ""),
        stderr: String(error.stderr ?? ""),
        timedOut: error.timedOut,
      };
    }
  }

  async which(command: string): Promise<string | null> {
    const locator = platform === "win32" ? "where" : "which";
    try {
      const result = await this.run(locator, [command], { timeout: TOOL_CHECK_TIMEOUT });
      if (result.exitCode !== 0) {
        return null;
      }
      const first = result.stdout.split(/\r?\n/).find((line) => line.trim() !== "");
      return first?.trim() ?? null;
    } catch (error: unknown) {
      if (error instanceof ToolNotFoundError) {
        return null;
      }
      throw error;
    }
  }
}
