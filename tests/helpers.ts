/**
 * Shared test fixtures
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Logger, LoggerConfig } from "../src/core/logger";
import { PluginGateway } from "../src/core/plugins";
import { Clock } from "../src/core/vfs/clock";
import { Route } from "../src/core/vfs/types";

export function createTempDir(prefix = "routefs-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a tree of files. Keys are posix relative paths; a `null` value
 * creates an empty directory.
 */
export function writeTree(root: string, files: Record<string, string | Buffer | null>): void {
  for (const [rel, contents] of Object.entries(files)) {
    const target = path.join(root, ...rel.split("/"));
    if (contents === null) {
      fs.mkdirSync(target, { recursive: true });
    } else {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, contents);
    }
  }
}

export interface LogLine {
  level: string;
  msg: string;
  [key: string]: unknown;
}

/**
 * JSON logger whose lines are kept in memory.
 */
export function captureLogger(config: Partial<LoggerConfig> = {}): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = new Logger(
    { level: "trace", format: "json", ...config },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    }
  );
  return { logger, lines };
}

export function silentLogger(): Logger {
  return captureLogger({ level: "silent" }).logger;
}

export class FakeClock implements Clock {
  constructor(public time = 0) {}

  now(): number {
    return this.time;
  }
}

/**
 * Gateway that records its input and answers from a function.
 */
export class RecordingGateway implements PluginGateway {
  calls: Route[] = [];

  constructor(private respond: (route: Route) => Route[] | null = (route) => [route]) {}

  handleFileChange(route: Route): Route[] | null {
    this.calls.push(route);
    return this.respond(route);
  }
}
