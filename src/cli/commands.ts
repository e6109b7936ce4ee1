/**
 * Command line grammar.
 *
 * The command and the filename are whitespace-delimited tokens. Everything
 * after the single whitespace character that ends the filename is trailing
 * text and is kept verbatim, inner runs of whitespace included.
 */

import { ValidationError } from "../infra/errors.js";

export const COMMAND_NAMES = [
  "CREATE",
  "READ",
  "INSERT",
  "UPDATE",
  "SNAPSHOT",
  "ROLLBACK",
  "HISTORY",
  "RECENT_FILES",
  "BIGGEST_TREES",
  "HELP",
  "EXIT",
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export type ParsedCommand =
  | { name: "CREATE" | "READ" | "HISTORY"; filename: string }
  | { name: "INSERT" | "UPDATE"; filename: string; content: string }
  | { name: "SNAPSHOT"; filename: string; message: string }
  | { name: "ROLLBACK"; filename: string; versionId?: number }
  | { name: "RECENT_FILES" | "BIGGEST_TREES"; count?: number }
  | { name: "HELP" | "EXIT" };

export type TokenizedLine = {
  command: string;
  /** Second token; empty when absent */
  target: string;
  /** Verbatim text after the second token; empty when absent */
  rest: string;
};

const HELP_LINES = [
  "Available commands:",
  "  CREATE <filename>",
  "  READ <filename>",
  "  INSERT <filename> <content...>",
  "  UPDATE <filename> <content...>",
  "  SNAPSHOT <filename> [message...]",
  "  ROLLBACK <filename> [version_id]",
  "  HISTORY <filename>",
  "  RECENT_FILES [k]",
  "  BIGGEST_TREES [k]",
  "  HELP",
  "  EXIT",
];

export function helpText(): string {
  return HELP_LINES.join("\n");
}

function isSeparator(char: string | undefined): boolean {
  return char === " " || char === "\t";
}

/**
 * Split a line into command, second token and trailing text.
 * Returns null for a blank line.
 */
export function tokenizeLine(input: string): TokenizedLine | null {
  const line = input.endsWith("\r") ? input.slice(0, -1) : input;
  let i = 0;

  const skipSeparators = () => {
    while (i < line.length && isSeparator(line[i])) i++;
  };
  const readToken = () => {
    const start = i;
    while (i < line.length && !isSeparator(line[i])) i++;
    return line.slice(start, i);
  };

  skipSeparators();
  const command = readToken();
  if (!command) {
    return null;
  }
  skipSeparators();
  const target = readToken();
  // Skip exactly the one separator that ended the target
  const rest = i < line.length ? line.slice(i + 1) : "";

  return { command, target, rest };
}

export function isCommandName(value: string): value is CommandName {
  return (COMMAND_NAMES as readonly string[]).includes(value);
}

/**
 * Parse a non-negative decimal integer, as typed by the user
 */
export function parseNonNegativeInteger(raw: string, errorMessage: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(errorMessage);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(errorMessage);
  }
  return value;
}

function splitArgs(text: string): string[] {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

function requireFilename(name: CommandName, target: string): string {
  if (!target) {
    throw new ValidationError(`${name} command requires a file name`);
  }
  return target;
}

function rejectExtra(name: CommandName, rest: string, expected: string): void {
  if (splitArgs(rest).length > 0) {
    throw new ValidationError(`${name} command takes ${expected}`);
  }
}

/**
 * Parse one input line. Returns null for a blank line.
 */
export function parseCommand(input: string): ParsedCommand | null {
  const tokens = tokenizeLine(input);
  if (!tokens) {
    return null;
  }
  const { command, target, rest } = tokens;
  if (!isCommandName(command)) {
    throw new ValidationError(`Unknown command: ${command}`);
  }

  switch (command) {
    case "HELP":
    case "EXIT":
      rejectExtra(command, `${target} ${rest}`, "no arguments");
      return { name: command };

    case "CREATE":
    case "READ":
    case "HISTORY": {
      const filename = requireFilename(command, target);
      rejectExtra(command, rest, "exactly one file name");
      return { name: command, filename };
    }

    case "INSERT":
    case "UPDATE":
      return { name: command, filename: requireFilename(command, target), content: rest };

    case "SNAPSHOT":
      return { name: command, filename: requireFilename(command, target), message: rest };

    case "ROLLBACK": {
      const filename = requireFilename(command, target);
      const args = splitArgs(rest);
      if (args.length > 1) {
        throw new ValidationError("ROLLBACK command takes at most one argument");
      }
      if (args.length === 0) {
        return { name: command, filename };
      }
      const versionId = parseNonNegativeInteger(
        args[0],
        "ROLLBACK requires a non-negative integer version id",
      );
      return { name: command, filename, versionId };
    }

    case "RECENT_FILES":
    case "BIGGEST_TREES": {
      rejectExtra(command, rest, "at most one argument");
      if (!target) {
        return { name: command };
      }
      const count = parseNonNegativeInteger(
        target,
        `${command} requires a non-negative integer argument`,
      );
      return { name: command, count };
    }
  }
}
