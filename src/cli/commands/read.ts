/**
 * src/cli/commands/read.ts
 * routefs read <route...>
 */

import { Command } from "commander";
import { Vfs } from "../../core/vfs";
import { createLoggerFromConfig, createVfsFromConfig } from "../utils/bootstrap";
import { loadConfig } from "../utils/loadConfig";

export interface ReadCommandOptions {
  skipped?: boolean;
  pretty?: boolean;
}

/**
 * JSON printed by `routefs read`. With `skipped`, the snapshot is wrapped
 * together with the routes that were left out.
 */
export function renderRead(vfs: Vfs, route: string[], opts: ReadCommandOptions = {}): string {
  const indent = opts.pretty === false ? undefined : 2;
  if (!opts.skipped) {
    return JSON.stringify(vfs.read(route), null, indent);
  }
  const { item, skipped } = vfs.readWithReport(route);
  return JSON.stringify(
    {
      item,
      skipped: skipped.map((s) => ({ route: s.route, reason: s.error.message })),
    },
    null,
    indent
  );
}

export function readCommand(): Command {
  const cmd = new Command("read");
  cmd
    .description("Print the snapshot of a route as JSON")
    .argument("<route...>", "partition name followed by path segments")
    .option("--skipped", "also list entries that could not be read")
    .option("--no-pretty", "print compact JSON")
    .action((route: string[], opts: ReadCommandOptions) => {
      try {
        const config = loadConfig();
        const vfs = createVfsFromConfig(config, createLoggerFromConfig(config));
        console.log(renderRead(vfs, route, opts));
      } catch (e) {
        console.error("Read failed:", (e as Error).message);
        process.exit(1);
      }
    });

  return cmd;
}
