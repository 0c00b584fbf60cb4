/**
 * src/cli/utils/bootstrap.ts
 * Build a VFS and its logger from a loaded config
 */

import { Logger } from "../../core/logger";
import { PluginChain, VfsPlugin } from "../../core/plugins";
import { Vfs } from "../../core/vfs";
import { RouteFsConfig } from "./loadConfig";

export function createLoggerFromConfig(config: RouteFsConfig): Logger {
  return new Logger({ level: config.logger.level, format: config.logger.format, source: "routefs" });
}

export function createVfsFromConfig(config: RouteFsConfig, logger: Logger, plugins: VfsPlugin[] = []): Vfs {
  return new Vfs(new PluginChain(plugins), {
    verbose: config.verbose,
    partitions: config.partitions,
    logger: logger.child({ component: "vfs" }),
    enforceMonotonicTimestamps: config.changeLog.enforceMonotonicTimestamps,
  });
}
