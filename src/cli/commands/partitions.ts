/**
 * src/cli/commands/partitions.ts
 * routefs partitions
 */

import { Command } from "commander";
import { formatTable } from "../utils/printTable";
import { RouteFsConfig, loadConfig } from "../utils/loadConfig";

export function partitionRows(config: RouteFsConfig): string[][] {
  return Object.entries(config.partitions)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, root]) => [name, root]);
}

export function partitionsCommand(): Command {
  const cmd = new Command("partitions");
  cmd.description("List configured partitions")
    .action(() => {
      try {
        const lines = formatTable(["NAME", "ROOT"], partitionRows(loadConfig()));
        lines.forEach(line => console.log(line));
      } catch (e) {
        console.error("Failed to list partitions:", (e as Error).message);
        process.exit(1);
      }
    });
  return cmd;
}
