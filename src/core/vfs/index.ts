/**
 * Virtual layer over named parts of the real filesystem.
 *
 * Routes are string segments relative to a partition, and a partition is an
 * absolute path on disk. Snapshots are read eagerly on demand; changes are
 * expanded through the plugin gateway and appended to the change log.
 */

import { UnsupportedOperationError } from "../errors";
import { Logger } from "../logger";
import { PluginGateway } from "../plugins/types";
import { ChangeLog, ChangeRetentionPolicy } from "./changeLog";
import { Clock, MonotonicClock } from "./clock";
import { PartitionTable } from "./partitions";
import { resolveRoute } from "./resolver";
import { TreeReader } from "./treeReader";
import { ReadReport, Route, VfsChange, VfsItem } from "./types";

export * from "./types";
export { PartitionTable } from "./partitions";
export { resolveRoute } from "./resolver";
export { TreeReader } from "./treeReader";
export { ChangeLog, keepAllChanges } from "./changeLog";
export type { ChangeLogConfig, ChangeRetentionPolicy } from "./changeLog";
export { MonotonicClock } from "./clock";
export type { Clock } from "./clock";

export interface VfsOptions {
  /** Log every change before and after plugin expansion. */
  verbose?: boolean;
  partitions?: Record<string, string>;
  logger?: Logger;
  clock?: Clock;
  retention?: ChangeRetentionPolicy;
  enforceMonotonicTimestamps?: boolean;
}

export class Vfs {
  readonly partitions: PartitionTable;
  private changeLog: ChangeLog;
  private clock: Clock;
  private logger: Logger;
  private verbose: boolean;

  constructor(private pluginGateway: PluginGateway, options: VfsOptions = {}) {
    this.partitions = new PartitionTable(options.partitions);
    this.clock = options.clock ?? new MonotonicClock();
    this.changeLog = new ChangeLog({
      retention: options.retention,
      enforceMonotonicTimestamps: options.enforceMonotonicTimestamps,
    });
    this.logger = options.logger ?? Logger.forSource("vfs");
    this.verbose = options.verbose ?? false;
  }

  addPartition(name: string, root: string): void {
    this.partitions.register(name, root);
  }

  resolve(route: Route): string {
    return resolveRoute(this.partitions, route);
  }

  /**
   * Snapshot the item at `route`.
   * @throws RouteError, ReadError or UnsupportedTypeError for the entry itself;
   * unreadable nested entries are omitted instead
   */
  read(route: Route): VfsItem {
    return this.readWithReport(route).item;
  }

  /**
   * Like {@link read}, also returning the nested entries that were left out.
   */
  readWithReport(route: Route): ReadReport {
    const physicalPath = this.resolve(route);
    const reader = new TreeReader();
    const item = reader.read([...route], physicalPath);

    if (reader.skipped.length > 0) {
      this.logger.debug("Skipped unreadable entries", {
        route,
        skipped: reader.skipped.map((s) => ({ route: s.route, reason: s.error.message })),
      });
    }

    return { item, skipped: reader.skipped };
  }

  write(route: Route, _item: VfsItem): never {
    throw new UnsupportedOperationError(`write ${JSON.stringify(route)}`);
  }

  delete(route: Route): never {
    throw new UnsupportedOperationError(`delete ${JSON.stringify(route)}`);
  }

  currentTime(): number {
    return this.clock.now();
  }

  /**
   * Record a raw change. The gateway decides which logical routes it
   * becomes; all of them share `timestamp`.
   */
  addChange(timestamp: number, route: Route): VfsChange[] {
    this.changeLog.assertOrdered(timestamp);

    if (this.verbose) {
      this.logger.info("Received change, running through plugins...", { route });
    }

    const routes = this.pluginGateway.handleFileChange(route);
    if (!routes || routes.length === 0) {
      return [];
    }

    if (this.verbose) {
      this.logger.info("Adding changes from plugin", { routes });
    }

    return this.changeLog.append(timestamp, routes);
  }

  /**
   * Changes with `timestamp >= since`, oldest first. Assumes changes were
   * added with non-decreasing timestamps.
   */
  changesSince(since: number): VfsChange[] {
    return this.changeLog.since(since);
  }

  get changeHistory(): readonly VfsChange[] {
    return this.changeLog.entries;
  }
}
