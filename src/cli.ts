#!/usr/bin/env node
import { Command } from "commander";
import { benchCommand } from "./commands/bench";
import { findCommand } from "./commands/find";
import { makeLogger } from "./logging";
import { writeStderr } from "./utils/terminal";

const log = makeLogger();
const program = new Command();

program
  .name("majority")
  .description("Boyer-Moore majority vote with operation counters")
  .version("0.1.0");

program.addCommand(findCommand());
program.addCommand(benchCommand(log));

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  log.debug({ err: error }, "command failed");
  writeStderr(message);
  process.exitCode = 1;
});
