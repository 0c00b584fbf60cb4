/**
 * routefs public API
 */

export * from "./core/vfs";
export * from "./core/errors";
export * from "./core/plugins";
export { Logger, initializeLogger, getLogger } from "./core/logger";
export type { LoggerConfig, LogLevel, LogFormat } from "./core/logger";
export { PartitionWatcher, pathToRoute } from "./core/watcher/partitionWatcher";
export { createApp, startServer } from "./server";
export type { StartServerOptions } from "./server";
export { loadConfig, RouteFsConfigSchema } from "./cli/utils/loadConfig";
export type { RouteFsConfig } from "./cli/utils/loadConfig";
