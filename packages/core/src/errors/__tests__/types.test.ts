import { describe, expect, it } from "vitest";
import { ErrorCode, isSearchError, SearchCanceledError, SearchError } from "../types.js";

describe("SearchError", () => {
  it("carries code, context and cause", () => {
    const cause = new Error("ENOENT");
    const error = new SearchError("Root path does not exist: /x", ErrorCode.SEARCH_INVALID_ROOT, {
      cause,
      context: { rootPath: "/x" },
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("SearchError");
    expect(error.code).toBe(ErrorCode.SEARCH_INVALID_ROOT);
    expect(error.context).toEqual({ rootPath: "/x" });
    expect(error.cause).toBe(cause);
  });

  it("classifies user errors by code", () => {
    expect(new SearchError("bad", ErrorCode.SEARCH_INVALID_OPTIONS).isUserError).toBe(true);
    expect(new SearchError("bad", ErrorCode.SEARCH_INVALID_ROOT).isUserError).toBe(true);
  });

  it("serializes to JSON with the cause message", () => {
    const error = new SearchError("failed", ErrorCode.SEARCH_INVALID_ROOT, {
      cause: new Error("disk gone"),
      context: { path: "/a" },
    });

    expect(error.toJSON()).toEqual({
      name: "SearchError",
      message: "failed",
      code: ErrorCode.SEARCH_INVALID_ROOT,
      context: { path: "/a" },
      cause: "disk gone",
    });
  });

  it("keeps a non-Error cause as is", () => {
    expect(new SearchError("failed", ErrorCode.SEARCH_INVALID_OPTIONS, { cause: 42 }).toJSON().cause).toBe(42);
  });
});

describe("SearchCanceledError", () => {
  it("uses the canceled code and default message", () => {
    const error = new SearchCanceledError();

    expect(error).toBeInstanceOf(SearchError);
    expect(error.name).toBe("SearchCanceledError");
    expect(error.message).toBe("Search canceled");
    expect(error.code).toBe(ErrorCode.SEARCH_CANCELED);
    expect(error.isUserError).toBe(false);
  });
});

describe("isSearchError", () => {
  it("narrows SearchError and subclasses only", () => {
    expect(isSearchError(new SearchCanceledError())).toBe(true);
    expect(isSearchError(new Error("plain"))).toBe(false);
    expect(isSearchError(undefined)).toBe(false);
  });
});
