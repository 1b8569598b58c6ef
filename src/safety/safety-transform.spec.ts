import { describe, it, expect } from "vitest";
import { applySafetyTransform, isFullyCommented, splitLines } from "./safety-transform";

describe("applySafetyTransform", () => {
  it("puts the checklist first, then a separator, then the commented SQL", () => {
    const out = applySafetyTransform("select 1\n\n-- note\nfrom x", "- check a\n- check b");

    expect(splitLines(out)).toEqual([
      "-- - check a",
      "-- - check b",
      "--",
      "-- select 1",
      "--",
      "-- -- note",
      "-- from x",
    ]);
  });

  it("keeps lines(checklist) + 1 + lines(sql) lines", () => {
    const sql = "select\n  a,\n  b\nfrom t\n";
    const checklist = "1. run tests\n2. check grain";

    expect(splitLines(applySafetyTransform(sql, checklist))).toHaveLength(
      splitLines(checklist).length + 1 + splitLines(sql).length
    );
  });

  it("accepts CRLF line endings", () => {
    expect(applySafetyTransform("select a\r\nfrom t", "ok")).toBe("-- ok\n--\n-- select a\n-- from t");
  });

  it("treats a bare carriage return as a line break", () => {
    const out = applySafetyTransform("select 1\rdrop table orders", "ok");

    expect(out).toBe("-- ok\n--\n-- select 1\n-- drop table orders");
    expect(out.split(/\r\n|\r|\n/).every((line) => line.startsWith("--"))).toBe(true);
  });

  it("breaks on form feeds and unicode line separators", () => {
    expect(splitLines(applySafetyTransform("a\fb\u2028c", "ok"))).toEqual(["-- ok", "--", "-- a", "-- b", "-- c"]);
  });

  it("comments out every line, even with an empty checklist", () => {
    const out = applySafetyTransform("select 1", "");

    expect(out).toBe("--\n--\n-- select 1");
    expect(isFullyCommented(out)).toBe(true);
  });
});

describe("isFullyCommented", () => {
  it("spots a live line", () => {
    expect(isFullyCommented("-- a\nselect 1")).toBe(false);
  });

  it("spots a live line hidden behind a bare carriage return", () => {
    expect(isFullyCommented("-- select 1\rdrop table orders")).toBe(false);
  });
});
