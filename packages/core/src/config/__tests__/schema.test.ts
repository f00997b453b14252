import { describe, expect, it } from "vitest";
import { ConfigSchema, LogLevelSchema, SearchConfigSchema } from "../schema.js";

describe("ConfigSchema", () => {
  it("fills defaults for an empty object", () => {
    expect(ConfigSchema.parse({})).toEqual({
      logLevel: "warn",
      logFormat: "text",
      search: { backoffMs: 50, recurse: true },
    });
  });

  it("rejects unknown log levels", () => {
    expect(LogLevelSchema.safeParse("verbose").success).toBe(false);
    expect(LogLevelSchema.safeParse("trace").success).toBe(true);
  });
});

describe("SearchConfigSchema", () => {
  it("accepts a positive integer worker count", () => {
    expect(SearchConfigSchema.parse({ workers: 3 }).workers).toBe(3);
  });

  it("rejects fractional or non-positive workers", () => {
    expect(SearchConfigSchema.safeParse({ workers: 1.5 }).success).toBe(false);
    expect(SearchConfigSchema.safeParse({ workers: -1 }).success).toBe(false);
  });

  it("caps the backoff at one second", () => {
    expect(SearchConfigSchema.safeParse({ backoffMs: 1000 }).success).toBe(true);
    expect(SearchConfigSchema.safeParse({ backoffMs: 1001 }).success).toBe(false);
  });
});
