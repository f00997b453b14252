import { describe, expect, it } from "vitest";
import { ErrorCode, isUserError } from "../codes.js";

describe("isUserError", () => {
  it("classifies input problems as user errors", () => {
    expect(isUserError(ErrorCode.SEARCH_INVALID_ROOT)).toBe(true);
    expect(isUserError(ErrorCode.SEARCH_INVALID_OPTIONS)).toBe(true);
  });

  it("does not classify cancellation as a user error", () => {
    expect(isUserError(ErrorCode.SEARCH_CANCELED)).toBe(false);
  });
});
