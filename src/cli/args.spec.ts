import { describe, it, expect } from "vitest";
import { parseArgs } from "./args";

describe("parseArgs", () => {
  it.each([
    ["--externalTables", "externalTables"],
    ["--models", "models"],
    ["--generate", "generate"],
  ])("maps %s to a mode", (flag, mode) => {
    expect(parseArgs([flag])).toEqual({ mode });
  });

  it("requires a mode", () => {
    expect(() => parseArgs([])).toThrow("No mode specified. Use one of: --externalTables | --models | --generate");
  });

  it("refuses more than one mode", () => {
    expect(() => parseArgs(["--models", "--externalTables"])).toThrow(/^Multiple modes specified/);
  });
});
