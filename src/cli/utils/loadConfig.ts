/**
 * src/cli/utils/loadConfig.ts
 * routefs.config.json loading and validation
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ValidationError } from "../../core/errors";
import { parseLogFormat, parseLogLevel } from "../../core/logger";

export const CONFIG_FILE_NAME = "routefs.config.json";

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const RouteFsConfigSchema = z
  .object({
    verbose: z.boolean().default(false),
    partitions: z.record(z.string().min(1)).default({}),
    logger: z
      .object({
        level: LogLevelSchema.default("info"),
        format: z.enum(["json", "pretty"]).default("pretty"),
      })
      .default({}),
    server: z
      .object({
        port: z.number().int().min(0).max(65535).default(4000),
        allowedOrigins: z.array(z.string()).default(["http://localhost:3000"]),
      })
      .default({}),
    changeLog: z
      .object({
        enforceMonotonicTimestamps: z.boolean().default(false),
      })
      .default({}),
    watch: z.boolean().default(true),
  })
  .strict();

export type RouteFsConfig = z.infer<typeof RouteFsConfigSchema>;

export function defaultConfig(): RouteFsConfig {
  return RouteFsConfigSchema.parse({});
}

/**
 * Load `routefs.config.json` from `cwd`, apply environment overrides and
 * resolve relative partition roots against the config file's directory.
 * A missing file yields the defaults.
 *
 * @throws ValidationError for unreadable JSON or schema violations
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): RouteFsConfig {
  const p = path.join(cwd, CONFIG_FILE_NAME);

  let raw: unknown = {};
  if (fs.existsSync(p)) {
    try {
      raw = JSON.parse(fs.readFileSync(p, "utf8"));
    } catch (err) {
      throw new ValidationError(`${CONFIG_FILE_NAME} is not valid JSON`, {
        file: p,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }

  const result = RouteFsConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`${CONFIG_FILE_NAME} is invalid`, {
      file: p,
      issues: result.error.errors.map((e) => ({ path: e.path.join("."), message: e.message })),
    });
  }

  const config = result.data;
  config.partitions = Object.fromEntries(
    Object.entries(config.partitions).map(([name, root]) => [name, path.resolve(cwd, root)])
  );

  return applyEnv(config, env);
}

function applyEnv(config: RouteFsConfig, env: NodeJS.ProcessEnv): RouteFsConfig {
  if (env.ROUTEFS_VERBOSE !== undefined) {
    config.verbose = env.ROUTEFS_VERBOSE === "true" || env.ROUTEFS_VERBOSE === "1";
  }
  if (env.PORT) {
    const port = parseInt(env.PORT, 10);
    if (Number.isNaN(port)) {
      throw new ValidationError(`PORT must be a number, got "${env.PORT}"`);
    }
    config.server.port = port;
  }
  if (env.LOG_LEVEL) {
    config.logger.level = parseLogLevel(env.LOG_LEVEL);
  }
  if (env.LOG_FORMAT) {
    config.logger.format = parseLogFormat(env.LOG_FORMAT);
  }
  return config;
}
