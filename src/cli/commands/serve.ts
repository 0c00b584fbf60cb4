/**
 * src/cli/commands/serve.ts
 * routefs serve
 */

import "dotenv/config";
import { Command } from "commander";
import { PartitionWatcher } from "../../core/watcher/partitionWatcher";
import { startServer } from "../../server";
import { createLoggerFromConfig, createVfsFromConfig } from "../utils/bootstrap";
import { loadConfig } from "../utils/loadConfig";

export function serveCommand(): Command {
  const cmd = new Command("serve");
  cmd
    .description("Serve snapshots and the change log over HTTP")
    .option("-p, --port <port>", "port to listen on", (v) => parseInt(v, 10))
    .option("--no-watch", "do not watch partitions for changes")
    .action(async (opts: { port?: number; watch: boolean }) => {
      const config = loadConfig();
      const logger = createLoggerFromConfig(config);

      try {
        const vfs = createVfsFromConfig(config, logger);
        const watcher = new PartitionWatcher(vfs, logger);
        if (opts.watch && config.watch) {
          watcher.watchAll();
        }

        const server = await startServer({
          vfs,
          logger,
          port: opts.port ?? config.server.port,
          allowedOrigins: config.server.allowedOrigins,
        });

        const shutdown = () => {
          logger.info("Shutting down");
          watcher.unwatchAll();
          server.close(() => process.exit(0));
        };
        process.on("SIGINT", shutdown);
        process.on("SIGTERM", shutdown);
      } catch (e) {
        logger.fatal(e instanceof Error ? e : String(e));
        process.exit(1);
      }
    });

  return cmd;
}
