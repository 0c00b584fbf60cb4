/**
 * Append-only, timestamp-ordered change history.
 * Modeled on the event bus history: entries are pushed in arrival order and
 * queried by time window.
 */

import { ChangeOrderError } from "../errors";
import { Route, VfsChange } from "./types";

/**
 * Hook run after every append. Receives the live history array and may
 * remove entries from its front; the default keeps everything.
 */
export interface ChangeRetentionPolicy {
  apply(history: VfsChange[]): void;
}

export const keepAllChanges: ChangeRetentionPolicy = {
  apply() {
    // unbounded
  },
};

export interface ChangeLogConfig {
  retention?: ChangeRetentionPolicy;
  /**
   * Reject appends whose timestamp is older than the newest entry.
   * Off by default: callers own the ordering contract.
   */
  enforceMonotonicTimestamps?: boolean;
}

export class ChangeLog {
  private history: VfsChange[] = [];
  private retention: ChangeRetentionPolicy;
  private enforceMonotonic: boolean;

  constructor(config: ChangeLogConfig = {}) {
    this.retention = config.retention ?? keepAllChanges;
    this.enforceMonotonic = config.enforceMonotonicTimestamps ?? false;
  }

  get entries(): readonly VfsChange[] {
    return this.history;
  }

  get length(): number {
    return this.history.length;
  }

  latestTimestamp(): number | undefined {
    return this.history[this.history.length - 1]?.timestamp;
  }

  /**
   * @throws ChangeOrderError when ordering is enforced and violated
   */
  assertOrdered(timestamp: number): void {
    if (!this.enforceMonotonic) return;
    const latest = this.latestTimestamp();
    if (latest !== undefined && timestamp < latest) {
      throw new ChangeOrderError(timestamp, latest);
    }
  }

  append(timestamp: number, routes: readonly Route[]): VfsChange[] {
    this.assertOrdered(timestamp);

    const added = routes.map((route) => ({ timestamp, route: [...route] }));
    this.history.push(...added);
    if (added.length > 0) {
      this.retention.apply(this.history);
    }
    return added;
  }

  /**
   * Every entry with `timestamp >= since`, oldest first.
   * Walks back from the newest entry and stops at the first older one, so it
   * relies on entries having been appended in non-decreasing order.
   */
  since(since: number): VfsChange[] {
    let start = this.history.length;
    for (let i = this.history.length - 1; i >= 0; i--) {
      if (this.history[i].timestamp >= since) {
        start = i;
      } else {
        break;
      }
    }
    return this.history.slice(start);
  }
}
