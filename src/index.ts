#!/usr/bin/env node
import { Command } from "commander";
import { configureStatsProgram } from "./commands/stats.js";
import { describeFailure } from "./core/errors.js";

const program = new Command();

program
  .name("pr-stats")
  .description("Parse GitHub statistics about a repository's pull requests")
  .version("0.1.0");

configureStatsProgram(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  const failure = describeFailure(error);
  process.stderr.write(`${failure.message}\n`);
  process.exit(failure.exitCode);
});
