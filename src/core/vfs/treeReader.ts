/**
 * Eager, synchronous snapshot of a physical path.
 *
 * Only the entry the caller asked for may fail the read. Nested entries that
 * cannot be read are left out of their parent's children and recorded in
 * `skipped`.
 */

import * as fs from "fs";
import path from "path";
import { TextDecoder } from "util";
import { ReadError, UnsupportedTypeError, toError } from "../errors";
import { Route, SkippedEntry, VfsDir, VfsFile, VfsItem } from "./types";

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export class TreeReader {
  readonly skipped: SkippedEntry[] = [];

  read(route: Route, physicalPath: string): VfsItem {
    let stats: fs.Stats;
    try {
      stats = fs.lstatSync(physicalPath);
    } catch (err) {
      throw new ReadError(`cannot stat ${physicalPath}`, physicalPath, toError(err));
    }

    if (stats.isDirectory()) {
      return this.readDir(route, physicalPath);
    }
    if (stats.isFile()) {
      return readFile(route, physicalPath);
    }
    throw new UnsupportedTypeError(physicalPath, describeEntry(stats));
  }

  private readDir(route: Route, dirPath: string): VfsDir {
    let names: string[];
    try {
      names = fs.readdirSync(dirPath);
    } catch (err) {
      throw new ReadError(`cannot list ${dirPath}`, dirPath, toError(err));
    }

    const children: Record<string, VfsItem> = {};
    for (const name of names) {
      const childRoute = [...route, name];
      const childPath = path.join(dirPath, name);
      try {
        // Names like `__proto__` must become own keys
        Object.defineProperty(children, name, {
          value: this.read(childRoute, childPath),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      } catch (err) {
        this.skipped.push({ route: childRoute, path: childPath, error: toError(err) });
      }
    }

    return { type: "dir", route: [...route], children };
  }
}

function readFile(route: Route, filePath: string): VfsFile {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (err) {
    throw new ReadError(`cannot read ${filePath}`, filePath, toError(err));
  }

  let contents: string;
  try {
    contents = utf8.decode(bytes);
  } catch (err) {
    throw new ReadError(`not valid UTF-8 text: ${filePath}`, filePath, toError(err));
  }

  return { type: "file", route: [...route], contents };
}

function describeEntry(stats: fs.Stats): string {
  if (stats.isSymbolicLink()) return "symlink";
  if (stats.isSocket()) return "socket";
  if (stats.isFIFO()) return "fifo";
  if (stats.isBlockDevice()) return "block-device";
  if (stats.isCharacterDevice()) return "character-device";
  return "unknown";
}
