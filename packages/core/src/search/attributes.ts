/**
 * Render file permission bits and naming conventions as a flag list,
 * e.g. "ReadOnly, Hidden". A file with no flags is "Normal".
 *
 * @module search/attributes
 */

const OWNER_WRITE = 0o200;
const ANY_EXECUTE = 0o111;

export function describeAttributes(name: string, mode: number): string {
  const flags: string[] = [];

  if ((mode & OWNER_WRITE) === 0) {
    flags.push("ReadOnly");
  }
  if (name.startsWith(".")) {
    flags.push("Hidden");
  }
  if ((mode & ANY_EXECUTE) !== 0) {
    flags.push("Executable");
  }

  return flags.length > 0 ? flags.join(", ") : "Normal";
}
