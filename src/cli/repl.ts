/**
 * Line-oriented command loop.
 *
 * Reads one command per line, prints each result block followed by a blank
 * line, and reports failures as `Error: <message>` on the error stream
 * without stopping. Ends on EXIT or end of input.
 */

import type { Readable, Writable } from "node:stream";
import { createInterface } from "node:readline";
import type { Theme } from "../terminal/theme.js";
import { formatErrorMessage, isVtreeError } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { plainTheme } from "../terminal/theme.js";
import { VersionStore } from "../versioning/index.js";
import { createCommandHandlers } from "./command-handlers.js";
import { parseCommand } from "./commands.js";

const log = createSubsystemLogger("repl");

export type LineResult = {
  stdout: string;
  stderr: string;
  exit: boolean;
};

export type ReplSessionOptions = {
  store?: VersionStore;
  theme?: Theme;
  formatTime?: (timestamp: number) => string;
};

export type ReplOptions = ReplSessionOptions & {
  input: Readable;
  output: Writable;
  errorOutput: Writable;
  prompt?: string;
};

export type ReplSummary = {
  commands: number;
  errors: number;
  /** True when EXIT ended the loop, false on end of input */
  exited: boolean;
};

export function createReplSession(options: ReplSessionOptions = {}) {
  const store = options.store ?? new VersionStore();
  const theme = options.theme ?? plainTheme;
  const { handleCommand } = createCommandHandlers({ store, formatTime: options.formatTime });

  /**
   * Run one input line. Blank lines produce no output.
   */
  const handleLine = (line: string): LineResult => {
    try {
      const command = parseCommand(line);
      if (!command) {
        return { stdout: "", stderr: "", exit: false };
      }
      const outcome = handleCommand(command);
      return { stdout: `${outcome.lines.join("\n")}\n\n`, stderr: "", exit: outcome.exit };
    } catch (error) {
      const message = formatErrorMessage(error);
      if (isVtreeError(error)) {
        log.debug(`Command failed (${error.kind}): ${message}`);
      } else {
        log.error(`Unexpected failure: ${message}`, error);
      }
      return { stdout: "\n", stderr: `${theme.error(`Error: ${message}`)}\n`, exit: false };
    }
  };

  return { store, handleLine };
}

export async function runRepl(options: ReplOptions): Promise<ReplSummary> {
  const { input, output, errorOutput } = options;
  const theme = options.theme ?? plainTheme;
  const prompt = options.prompt ? theme.prompt(options.prompt) : "";
  const session = createReplSession(options);
  const summary: ReplSummary = { commands: 0, errors: 0, exited: false };

  const writePrompt = () => {
    if (prompt) output.write(prompt);
  };

  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
  writePrompt();
  try {
    for await (const line of rl) {
      const result = session.handleLine(line);
      if (result.stdout || result.stderr) {
        summary.commands++;
      }
      if (result.stderr) {
        summary.errors++;
        errorOutput.write(result.stderr);
      }
      output.write(result.stdout);
      if (result.exit) {
        summary.exited = true;
        break;
      }
      writePrompt();
    }
  } finally {
    rl.close();
  }

  log.debug(
    `Session ended after ${summary.commands} command(s), ${summary.errors} error(s)` +
      (summary.exited ? " (EXIT)" : " (end of input)"),
  );
  return summary;
}
