#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import { Command } from "commander";
import { initCommand } from "./commands/init";
import { partitionsCommand } from "./commands/partitions";
import { readCommand } from "./commands/read";
import { serveCommand } from "./commands/serve";

export function createCli(): Command {
  const program = new Command();

  program
    .name("routefs")
    .description("routefs CLI: read route snapshots and serve the change log")
    .version("0.1.0");

  program.addCommand(initCommand());
  program.addCommand(partitionsCommand());
  program.addCommand(readCommand());
  program.addCommand(serveCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
