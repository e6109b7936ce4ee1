import { Command } from "commander";
import type { ConfigOverrides, VtreeConfig } from "../config/config.js";
import { resolveConfig } from "../config/config.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger, setLogColor, setLogLevel } from "../logging/subsystem.js";
import { createTheme } from "../terminal/theme.js";
import { VERSION } from "../version.js";
import { runRepl } from "./repl.js";

const log = createSubsystemLogger("cli");

type ProgramOpts = {
  logLevel?: string;
  prompt?: string;
  /** commander sets this to false for --no-color, true otherwise */
  color: boolean;
};

function resolveConfigOrExit(command: Command, overrides: ConfigOverrides): VtreeConfig {
  try {
    return resolveConfig(process.env, overrides);
  } catch (err) {
    return command.error(`error: ${formatErrorMessage(err)}`, { exitCode: 1 });
  }
}

export function buildProgram(): Command {
  const program = new Command("vtree")
    .description(
      "In-memory versioned files: snapshots, rollback and recency/size rankings.\n" +
        "Reads one command per line from stdin; type HELP for the command list.",
    )
    .version(VERSION)
    .option("-l, --log-level <level>", "silent, fatal, error, warn, info, debug or trace")
    .option("-p, --prompt <text>", "prompt printed before each command")
    .option("--no-color", "disable colored output")
    .action(async (opts: ProgramOpts) => {
      const overrides: ConfigOverrides = {
        logLevel: opts.logLevel,
        prompt: opts.prompt,
        // Only an explicit --no-color overrides the environment
        color: opts.color ? undefined : false,
      };

      const config = resolveConfigOrExit(program, overrides);
      setLogLevel(config.logLevel);
      setLogColor(config.color && Boolean(process.stderr.isTTY));
      log.debug(`Starting vtree ${VERSION}`, config);

      const summary = await runRepl({
        input: process.stdin,
        output: process.stdout,
        errorOutput: process.stderr,
        prompt: config.prompt,
        theme: createTheme(config.color),
      });
      log.info(`Processed ${summary.commands} command(s)`);
    });

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}
