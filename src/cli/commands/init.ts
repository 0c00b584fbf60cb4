/**
 * src/cli/commands/init.ts
 * routefs init
 */

import { Command } from "commander";
import fs from "fs";
import path from "path";
import { CONFIG_FILE_NAME, defaultConfig } from "../utils/loadConfig";

/**
 * Write a default config into `root`. Returns false when one already exists
 * and `force` is not set.
 */
export function writeDefaultConfig(root: string, force = false): boolean {
  const configPath = path.join(root, CONFIG_FILE_NAME);
  if (!force && fs.existsSync(configPath)) {
    return false;
  }
  const config = { ...defaultConfig(), partitions: { root: "." } };
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + "\n", { encoding: "utf8" });
  return true;
}

export function initCommand(): Command {
  const cmd = new Command("init");
  cmd
    .description(`Create ${CONFIG_FILE_NAME} in the current directory`)
    .option("-f, --force", "overwrite existing files")
    .action((opts: { force?: boolean }) => {
      try {
        if (writeDefaultConfig(process.cwd(), opts.force)) {
          console.log(`Created ${CONFIG_FILE_NAME}`);
        } else {
          console.log(`${CONFIG_FILE_NAME} already exists. Use --force to overwrite.`);
        }
      } catch (e) {
        console.error("Failed to initialize:", (e as Error).message);
        process.exit(1);
      }
    });

  return cmd;
}
