/**
 * Command runner fake for unit testing.
 *
 * Answers commands from a script of responses so unit tests can verify
 * build, push and registry logic without docker, depot or aws.
 */

import { ToolNotFoundError } from "../../src/errors.js";
import type { CommandOptions, CommandResult, CommandRunner } from "../../src/exec.js";

export interface RecordedCall {
  command: string;
  args: string[];
  options?: CommandOptions;
}

/** Scripted reply; "missing" makes the command behave as not installed. */
export type FakeResponse = Partial<CommandResult> | "missing";

export interface FakeRule {
  /** Matched against `command args...` joined with spaces. */
  match: string | RegExp;
  response: FakeResponse;
}

function matches(rule: FakeRule, line: string): boolean {
  return typeof rule.match === "string" ? line.startsWith(rule.match) : rule.match.test(line);
}

/** Record of all runner calls for verification. */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly rules: FakeRule[] = [];
  private readonly missingTools = new Set<string>();

  /** Reply to commands starting with (or matching) `match`; the latest rule wins. */
  on(match: string | RegExp, response: FakeResponse): this {
    this.rules.unshift({ match, response });
    return this;
  }

  /** Make `which(tool)` report the tool as absent. */
  withoutTool(tool: string): this {
    this.missingTools.add(tool);
    return this;
  }

  async run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult> {
    this.calls.push({ command, args: [...args], options });
    const line = [command, ...args].join(" ");
    const rule = this.rules.find((candidate) => matches(candidate, line));
    const response = rule?.response ?? {};
    if (response === "missing") {
      throw new ToolNotFoundError(command);
    }
    return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...response };
  }

  async which(command: string): Promise<string | null> {
    return this.missingTools.has(command) ? null : `/usr/bin/${command}`;
  }

  /** Command lines in call order. */
  lines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(" "));
  }

  reset(): void {
    this.calls.length = 0;
  }
}
