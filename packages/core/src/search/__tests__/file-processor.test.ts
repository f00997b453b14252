import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AbortError } from "../../errors/abort.js";
import { createFileProcessor } from "../file-processor.js";
import { createTree, removeTree } from "./fixtures.js";

describe("createFileProcessor", () => {
  let root: string;

  beforeEach(() => {
    root = createTree({
      "app.log": "boot\nERROR: failed to bind\n",
      "image.bin": new Uint8Array([0x00, 0x01, 0x02]),
      ".profile": "export PATH\n",
    });
  });

  afterEach(() => {
    removeTree(root);
  });

  it("builds a match from file metadata", async () => {
    const processFile = createFileProcessor({ rootPath: root, recurse: true });
    const match = await processFile(path.join(root, "app.log"));

    expect(match).toEqual({
      name: "app.log",
      path: path.join(root, "app.log"),
      extension: ".log",
      size: 27,
      modified: fs.statSync(path.join(root, "app.log")).mtime,
      attributes: "Normal",
    });
  });

  it("has an empty extension for dot files", async () => {
    fs.chmodSync(path.join(root, ".profile"), 0o444);
    const match = await createFileProcessor({ rootPath: root, recurse: true })(path.join(root, ".profile"));

    expect(match?.extension).toBe("");
    expect(match?.attributes).toBe("ReadOnly, Hidden");
  });

  it("returns undefined when the metadata filter rejects the file", async () => {
    const processFile = createFileProcessor({ rootPath: root, recurse: true, extensions: [".txt"] });
    expect(await processFile(path.join(root, "app.log"))).toBeUndefined();
  });

  it("attaches the snippet of the first matching line", async () => {
    const processFile = createFileProcessor({ rootPath: root, recurse: true, contentQuery: "error" });
    const match = await processFile(path.join(root, "app.log"));
    expect(match?.snippet).toBe("...ERROR: failed to bind...");
  });

  it("skips binary files and files without the query", async () => {
    const processFile = createFileProcessor({ rootPath: root, recurse: true, contentQuery: "PATH" });
    expect(await processFile(path.join(root, "image.bin"))).toBeUndefined();
    expect(await processFile(path.join(root, "app.log"))).toBeUndefined();
  });

  it("returns undefined for a path that vanished", async () => {
    const processFile = createFileProcessor({ rootPath: root, recurse: true });
    expect(await processFile(path.join(root, "gone.txt"))).toBeUndefined();
    expect(await processFile(path.join(root, "app.log", "child"))).toBeUndefined();
  });

  it("returns undefined for a directory", async () => {
    fs.mkdirSync(path.join(root, "dir"));
    expect(await createFileProcessor({ rootPath: root, recurse: true })(path.join(root, "dir"))).toBeUndefined();
  });

  it("throws AbortError before reading content once aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const processFile = createFileProcessor({ rootPath: root, recurse: true, contentQuery: "error" });

    await expect(processFile(path.join(root, "app.log"), controller.signal)).rejects.toThrow(AbortError);
  });
});
