/**
 * Feeds filesystem notifications for registered partitions into the VFS
 * change log. One recursive fs.watch per partition; every reported file name
 * becomes a raw route stamped with the VFS clock.
 */

import * as fs from "fs";
import { Logger } from "../logger";
import { toError } from "../errors";
import { Vfs } from "../vfs";
import { Route } from "../vfs/types";

/**
 * Route for a path reported relative to a partition root.
 */
export function pathToRoute(partition: string, relativePath: string): Route {
  const segments = relativePath
    .split(/[\\/]+/)
    .filter((segment) => segment !== "" && segment !== ".");
  return [partition, ...segments];
}

export class PartitionWatcher {
  private watchers = new Map<string, fs.FSWatcher>();
  private readonly logger: Logger;

  constructor(private vfs: Vfs, logger?: Logger) {
    this.logger = (logger ?? Logger.forSource("watcher")).child({ component: "PartitionWatcher" });
  }

  get watching(): string[] {
    return Array.from(this.watchers.keys());
  }

  /**
   * Start watching a registered partition. Idempotent.
   */
  watch(partition: string): void {
    if (this.watchers.has(partition)) {
      this.logger.debug("Already watching partition, skipping", { partition });
      return;
    }

    const root = this.vfs.resolve([partition]);
    const watcher = fs.watch(root, { recursive: true }, (_eventType, filename) => {
      this.handleEvent(partition, filename ?? "");
    });

    watcher.on("error", (error) => {
      this.logger.error(error, { partition, root });
      this.unwatch(partition);
    });

    this.watchers.set(partition, watcher);
    this.logger.info("Watching partition", { partition, root });
  }

  watchAll(): void {
    for (const name of this.vfs.partitions.names()) {
      this.watch(name);
    }
  }

  unwatch(partition: string): void {
    const watcher = this.watchers.get(partition);
    if (!watcher) return;
    watcher.close();
    this.watchers.delete(partition);
    this.logger.debug("Stopped watching partition", { partition });
  }

  unwatchAll(): void {
    for (const partition of Array.from(this.watchers.keys())) {
      this.unwatch(partition);
    }
  }

  /**
   * Record one notification. Errors are logged; there is no caller to
   * return them to.
   */
  handleEvent(partition: string, filename: string): void {
    const route = pathToRoute(partition, filename);
    try {
      this.vfs.addChange(this.vfs.currentTime(), route);
    } catch (err) {
      this.logger.error(toError(err), { partition, route });
    }
  }
}
