import { describe, expect, it } from "vitest";
import { describeAttributes } from "../attributes.js";

describe("describeAttributes", () => {
  it("renders a writable, visible, non-executable file as Normal", () => {
    expect(describeAttributes("notes.txt", 0o100644)).toBe("Normal");
  });

  it("lists flags in a fixed order", () => {
    expect(describeAttributes(".env", 0o100444)).toBe("ReadOnly, Hidden");
    expect(describeAttributes("run.sh", 0o100755)).toBe("Executable");
    expect(describeAttributes(".hook", 0o100555)).toBe("ReadOnly, Hidden, Executable");
  });
});
