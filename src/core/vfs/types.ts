/**
 * VFS Type Definitions
 */

/**
 * Ordered path segments. The first segment names a partition, the rest is a
 * path relative to that partition's root.
 */
export type Route = string[];

export interface VfsFile {
  type: "file";
  route: Route;
  contents: string;
}

export interface VfsDir {
  type: "dir";
  route: Route;
  children: Record<string, VfsItem>;
}

export type VfsItem = VfsFile | VfsDir;

export interface VfsChange {
  /** Seconds since the owning VFS was constructed. */
  timestamp: number;
  route: Route;
}

/**
 * A nested entry left out of a directory snapshot because it could not be read.
 */
export interface SkippedEntry {
  route: Route;
  path: string;
  error: Error;
}

export interface ReadReport {
  item: VfsItem;
  skipped: SkippedEntry[];
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

export function itemRoute(item: VfsItem): Route {
  switch (item.type) {
    case "file":
      return item.route;
    case "dir":
      return item.route;
    default:
      return assertNever(item);
  }
}

/**
 * Last route segment. A bare partition route yields the partition name.
 */
export function itemName(item: VfsItem): string {
  const route = itemRoute(item);
  return route[route.length - 1] ?? "";
}

/**
 * Count files and directories in a snapshot, including the root.
 */
export function countItems(item: VfsItem): { files: number; dirs: number } {
  switch (item.type) {
    case "file":
      return { files: 1, dirs: 0 };
    case "dir": {
      let files = 0;
      let dirs = 1;
      for (const child of Object.values(item.children)) {
        const c = countItems(child);
        files += c.files;
        dirs += c.dirs;
      }
      return { files, dirs };
    }
    default:
      return assertNever(item);
  }
}
