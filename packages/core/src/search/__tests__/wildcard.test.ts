import { describe, expect, it } from "vitest";
import { Wildcard } from "../wildcard.js";

describe("Wildcard", () => {
  describe("matches", () => {
    it("matches * against any run of characters", () => {
      expect(Wildcard.matches("annual_report_final.txt", "*report*.txt")).toBe(true);
      expect(Wildcard.matches("report.txt", "*report*.txt")).toBe(true);
      expect(Wildcard.matches("annual_report_final.md", "*report*.txt")).toBe(false);
    });

    it("matches ? against exactly one character", () => {
      expect(Wildcard.matches("a.log", "?.log")).toBe(true);
      expect(Wildcard.matches("ab.log", "?.log")).toBe(false);
      expect(Wildcard.matches(".log", "?.log")).toBe(false);
    });

    it("compares case-insensitively", () => {
      expect(Wildcard.matches("ANNUAL_REPORT.TXT", "*report*.txt")).toBe(true);
      expect(Wildcard.matches("readme.md", "README.*")).toBe(true);
    });

    it("requires the whole name to match", () => {
      expect(Wildcard.matches("notes.md.bak", "*.md")).toBe(false);
      expect(Wildcard.matches("old-notes.md", "notes.md")).toBe(false);
    });

    it("treats regex syntax as literal characters", () => {
      expect(Wildcard.matches("file(1).txt", "file(1).*")).toBe(true);
      expect(Wildcard.matches("a+b.txt", "a+b.txt")).toBe(true);
      expect(Wildcard.matches("aab.txt", "a+b.txt")).toBe(false);
      expect(Wildcard.matches("readme_md", "*.md")).toBe(false);
      expect(Wildcard.matches("[draft] notes.md", "[draft]*")).toBe(true);
      expect(Wildcard.matches("d notes.md", "[draft]*")).toBe(false);
      expect(Wildcard.matches("price$^.csv", "price$^.csv")).toBe(true);
    });

    it("matches everything for empty, blank or absent patterns", () => {
      expect(Wildcard.matches("anything.bin", undefined)).toBe(true);
      expect(Wildcard.matches("anything.bin", "")).toBe(true);
      expect(Wildcard.matches("anything.bin", "   ")).toBe(true);
    });

    it("lets ? consume one non-BMP character", () => {
      expect(Wildcard.matches("😀.txt", "?.txt")).toBe(true);
    });
  });

  describe("compile", () => {
    it("returns a reusable predicate", () => {
      const matcher = Wildcard.compile("*.log");
      expect(["a.log", "b.txt", "C.LOG"].filter(matcher)).toEqual(["a.log", "C.LOG"]);
    });
  });

  describe("toRegex", () => {
    it("anchors the expression", () => {
      expect(Wildcard.toRegex("*.ts").source).toBe("^.*\\.ts$");
    });
  });
});
