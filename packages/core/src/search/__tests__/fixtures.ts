import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * File contents keyed by root-relative path ("sub/dir/file.txt").
 */
export type TreeLayout = Record<string, string | Uint8Array>;

/**
 * Create a temp directory populated from `layout`. Every file gets mode 0o644.
 */
export function createTree(layout: TreeLayout): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "treescan-test-"));
  for (const [relative, content] of Object.entries(layout)) {
    const filePath = path.join(root, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    fs.chmodSync(filePath, 0o644);
  }
  return root;
}

export function removeTree(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

/**
 * Set the modification (and access) time of a file.
 */
export function touch(filePath: string, time: Date): void {
  fs.utimesSync(filePath, time, time);
}
