#!/usr/bin/env node
import { formatErrorMessage } from "./infra/errors.js";
import { runCli } from "./cli/program.js";

runCli().catch((err) => {
  console.error(`vtree: ${formatErrorMessage(err)}`);
  process.exitCode = 1;
});
