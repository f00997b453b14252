import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { enumerateFiles } from "../enumerator.js";
import { createTree, removeTree } from "./fixtures.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    readdir: (...args: Parameters<typeof actual.readdir>) => {
      if (String(args[0]).includes("locked")) {
        return Promise.reject(Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" }));
      }
      return actual.readdir(...args);
    },
  };
});

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const item of iterable) {
    out.push(item);
  }
  return out;
}

describe("enumerateFiles", () => {
  let root: string;

  beforeEach(() => {
    root = createTree({
      "a.txt": "a",
      "b.txt": "b",
      "sub/c.txt": "c",
      "sub/deep/d.txt": "d",
      "other/e.txt": "e",
    });
  });

  afterEach(() => {
    removeTree(root);
  });

  it("yields every file below the root as an absolute path", async () => {
    const files = await collect(enumerateFiles(root));
    expect([...files].sort()).toEqual(
      ["a.txt", "b.txt", "other/e.txt", "sub/c.txt", "sub/deep/d.txt"].map((f) => path.join(root, f))
    );
  });

  it("yields the files of a directory before descending", async () => {
    const files = await collect(enumerateFiles(root));
    const rootFiles = [path.join(root, "a.txt"), path.join(root, "b.txt")];
    expect([...files.slice(0, 2)].sort()).toEqual(rootFiles);

    const sub = files.indexOf(path.join(root, "sub", "c.txt"));
    const deep = files.indexOf(path.join(root, "sub", "deep", "d.txt"));
    expect(sub).toBeLessThan(deep);
  });

  it("stays at the top level without recursion", async () => {
    const files = await collect(enumerateFiles(root, { recurse: false }));
    expect([...files].sort()).toEqual([path.join(root, "a.txt"), path.join(root, "b.txt")]);
  });

  it("resolves a relative root", async () => {
    const relative = path.relative(process.cwd(), root);
    const files = await collect(enumerateFiles(relative, { recurse: false }));
    expect(files.every((f) => path.isAbsolute(f))).toBe(true);
    expect(files).toHaveLength(2);
  });

  it("yields symbolic links without descending into linked directories", async () => {
    fs.symlinkSync(path.join(root, "a.txt"), path.join(root, "link.txt"));
    fs.symlinkSync(path.join(root, "sub"), path.join(root, "linked-dir"));

    const files = await collect(enumerateFiles(root));
    expect([...files].sort()).toEqual(
      ["a.txt", "b.txt", "link.txt", "linked-dir", "other/e.txt", "sub/c.txt", "sub/deep/d.txt"].map((f) =>
        path.join(root, f)
      )
    );
  });

  it("reports an unreadable directory and keeps walking", async () => {
    fs.mkdirSync(path.join(root, "locked"));
    fs.writeFileSync(path.join(root, "locked", "hidden.txt"), "x");

    const onDirectoryError = vi.fn();
    const files = await collect(enumerateFiles(root, { onDirectoryError }));

    expect(files).toHaveLength(5);
    expect(onDirectoryError).toHaveBeenCalledTimes(1);
    expect(onDirectoryError.mock.calls[0]?.[0]).toBe(path.join(root, "locked"));
  });

  it("yields nothing for a root that does not exist", async () => {
    const missing = path.join(root, "missing");
    const onDirectoryError = vi.fn();

    expect(await collect(enumerateFiles(missing, { onDirectoryError }))).toEqual([]);
    expect(onDirectoryError).toHaveBeenCalledWith(missing, expect.any(Error));
  });

  it("stops after the signal fires", async () => {
    const controller = new AbortController();
    const files: string[] = [];

    for await (const file of enumerateFiles(root, { signal: controller.signal })) {
      files.push(file);
      controller.abort();
    }

    expect(files).toHaveLength(1);
  });

  it("yields nothing when the signal fired beforehand", async () => {
    const controller = new AbortController();
    controller.abort();
    expect(await collect(enumerateFiles(root, { signal: controller.signal }))).toEqual([]);
  });
});
