/**
 * Snapshot reads against a real temporary directory
 */

import * as fs from "fs";
import * as path from "path";
import { Vfs } from "../src/core/vfs";
import { VfsItem, itemName, itemRoute, countItems } from "../src/core/vfs/types";
import { passthroughGateway } from "../src/core/plugins";
import {
  ReadError,
  RouteError,
  UnsupportedOperationError,
  UnsupportedTypeError,
} from "../src/core/errors";
import { cleanupDir, createTempDir, silentLogger, writeTree } from "./helpers";

function expectRoutesConsistent(item: VfsItem, expected: string[]) {
  expect(itemRoute(item)).toEqual(expected);
  if (item.type === "dir") {
    for (const [name, child] of Object.entries(item.children)) {
      expect(itemName(child)).toBe(name);
      expectRoutesConsistent(child, [...expected, name]);
    }
  }
}

describe("Vfs.read", () => {
  let root: string;
  let vfs: Vfs;

  beforeEach(() => {
    root = createTempDir();
    writeTree(root, {
      "index.html": "hi",
      "posts/foo.md": "# Foo",
      "posts/drafts": null,
    });
    vfs = new Vfs(passthroughGateway, { partitions: { site: root }, logger: silentLogger() });
  });

  afterEach(() => {
    cleanupDir(root);
  });

  test("should read a file", () => {
    expect(vfs.read(["site", "index.html"])).toEqual({
      type: "file",
      route: ["site", "index.html"],
      contents: "hi",
    });
  });

  test("should read a directory recursively", () => {
    expect(vfs.read(["site", "posts"])).toEqual({
      type: "dir",
      route: ["site", "posts"],
      children: {
        "foo.md": { type: "file", route: ["site", "posts", "foo.md"], contents: "# Foo" },
        drafts: { type: "dir", route: ["site", "posts", "drafts"], children: {} },
      },
    });
  });

  test("should read the partition root from a bare route", () => {
    const item = vfs.read(["site"]);
    expect(item.type).toBe("dir");
    expect(item.route).toEqual(["site"]);
    expect(countItems(item)).toEqual({ files: 2, dirs: 3 });
    expectRoutesConsistent(item, ["site"]);
  });

  test("should read a root registered with a trailing separator the same way", () => {
    vfs.addPartition("slash", root + path.sep);
    expect(vfs.resolve(["slash"])).toBe(root);
    const viaSlash = vfs.read(["slash"]);
    expect(viaSlash.type).toBe("dir");
    expect(Object.keys(viaSlash.type === "dir" ? viaSlash.children : {}).sort()).toEqual(["index.html", "posts"]);
  });

  test("should read a partition that points at a file", () => {
    vfs.addPartition("page", path.join(root, "index.html"));
    expect(vfs.read(["page"])).toEqual({ type: "file", route: ["page"], contents: "hi" });
  });

  test("should keep the file contents byte-exact, including a BOM", () => {
    writeTree(root, { "bom.txt": "\uFEFFtext" });
    const item = vfs.read(["site", "bom.txt"]);
    expect(item.type === "file" && item.contents).toBe("\uFEFFtext");
  });

  test("should fail with RouteError for an unknown partition", () => {
    expect(() => vfs.read(["unknown", "x"])).toThrow(RouteError);
  });

  test("should fail with ReadError for a missing top-level entry", () => {
    try {
      vfs.read(["site", "missing.txt"]);
      throw new Error("expected ReadError");
    } catch (err) {
      expect(err).toBeInstanceOf(ReadError);
      expect((err as ReadError).statusCode).toBe(404);
      expect((err as ReadError).details).toEqual({
        path: path.join(root, "missing.txt"),
        osCode: "ENOENT",
      });
    }
  });

  test("should fail with ReadError when the top-level file is not text", () => {
    writeTree(root, { "bad.bin": Buffer.from([0xff, 0xfe, 0xfd]) });
    expect(() => vfs.read(["site", "bad.bin"])).toThrow(ReadError);
  });

  test("should fail with UnsupportedTypeError for a top-level symlink", () => {
    fs.symlinkSync(path.join(root, "index.html"), path.join(root, "link"));
    try {
      vfs.read(["site", "link"]);
      throw new Error("expected UnsupportedTypeError");
    } catch (err) {
      expect(err).toBeInstanceOf(UnsupportedTypeError);
      expect((err as UnsupportedTypeError).entryType).toBe("symlink");
    }
  });

  test("should keep a child named __proto__ as an own entry", () => {
    const dir = path.join(root, "odd");
    fs.mkdirSync(dir);
    fs.writeFileSync(path.join(dir, "__proto__"), "evil");
    fs.writeFileSync(path.join(dir, "a.txt"), "a");

    const { item, skipped } = vfs.readWithReport(["site", "odd"]);
    expect(skipped).toEqual([]);
    expect(item.type).toBe("dir");
    if (item.type === "dir") {
      expect(Object.keys(item.children).sort()).toEqual(["__proto__", "a.txt"]);
      expect(Object.getOwnPropertyDescriptor(item.children, "__proto__")?.value).toEqual({
        type: "file",
        route: ["site", "odd", "__proto__"],
        contents: "evil",
      });
      expect(Object.getPrototypeOf(item.children)).toBe(Object.prototype);
      expect(JSON.parse(JSON.stringify(item)).children.__proto__.contents).toBe("evil");
    }
  });

  describe("unreadable children", () => {
    beforeEach(() => {
      writeTree(root, { "posts/bad.bin": Buffer.from([0xc3, 0x28]) });
      fs.symlinkSync(path.join(root, "index.html"), path.join(root, "posts", "link"));
    });

    test("should omit them and still return the directory", () => {
      const item = vfs.read(["site", "posts"]);
      expect(item.type).toBe("dir");
      if (item.type === "dir") {
        expect(Object.keys(item.children).sort()).toEqual(["drafts", "foo.md"]);
      }
    });

    test("should report them from readWithReport", () => {
      const { item, skipped } = vfs.readWithReport(["site"]);
      expect(item.type).toBe("dir");

      const byRoute = skipped
        .map((s) => ({ route: s.route.join("/"), error: s.error.name }))
        .sort((a, b) => a.route.localeCompare(b.route));
      expect(byRoute).toEqual([
        { route: "site/posts/bad.bin", error: "ReadError" },
        { route: "site/posts/link", error: "UnsupportedTypeError" },
      ]);
    });

    test("should omit an unreadable subdirectory entirely", () => {
      const drafts = path.join(root, "posts", "drafts");
      fs.rmdirSync(drafts);
      fs.symlinkSync(path.join(root, "posts"), drafts);
      const item = vfs.read(["site", "posts"]);
      expect(item.type === "dir" && Object.keys(item.children)).toEqual(["foo.md"]);
    });
  });

  test("should reject write", () => {
    expect(() => vfs.write(["site", "index.html"], { type: "file", route: ["site", "index.html"], contents: "x" })).toThrow(
      UnsupportedOperationError
    );
    expect(fs.readFileSync(path.join(root, "index.html"), "utf8")).toBe("hi");
  });

  test("should reject delete", () => {
    expect(() => vfs.delete(["site", "index.html"])).toThrow(UnsupportedOperationError);
    expect(fs.existsSync(path.join(root, "index.html"))).toBe(true);
  });
});
