import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { GenerationLogEntry } from "../ai/ai.types";
import type { ModelOutcome } from "../orchestrator/orchestrator.types";
import { FsArtifactWriter } from "./fs-writer";
import { renderModelFiles } from "./project-files";

function skippedRun(prompt: string): ModelOutcome[] {
  const entry: GenerationLogEntry = {
    model: "fct_orders",
    kind: "model-generation",
    attempt: 1,
    timestamp: "2026-01-01T00:00:00.000Z",
    prompt,
    response: "",
    outcome: "transport-error",
    error: "down",
  };
  return [
    {
      status: "skipped",
      model: "fct_orders",
      kind: "complex",
      directory: "models/marts",
      description: "",
      reason: "TransportError: down",
      warnings: [],
      log: [entry],
    },
  ];
}

describe("FsArtifactWriter", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "scaffold-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("creates directories as needed", () => {
    new FsArtifactWriter(root).write([
      { path: "models/marts/finance/fct_orders.sql", contents: "-- select 1" },
      { path: "run-report.json", contents: "{}\n" },
    ]);

    expect(fs.readFileSync(path.join(root, "models/marts/finance/fct_orders.sql"), "utf8")).toBe("-- select 1");
    expect(fs.readFileSync(path.join(root, "run-report.json"), "utf8")).toBe("{}\n");
  });

  it("keeps attempt logs from earlier runs", () => {
    const writer = new FsArtifactWriter(root);
    writer.write(renderModelFiles(skippedRun("first run")));
    writer.write(renderModelFiles(skippedRun("second run")));

    const lines = fs.readFileSync(path.join(root, "logs/model_generation_fct_orders.log"), "utf8").trimEnd().split("\n");
    expect(lines.map((line) => JSON.parse(line).prompt)).toEqual(["first run", "second run"]);
  });

  it("removes files and ignores ones that are already gone", () => {
    const writer = new FsArtifactWriter(root);
    writer.write([{ path: "models/marts/fct_orders.sql", contents: "-- select 1" }]);

    writer.remove(["models/marts/fct_orders.sql", "models/marts/never_written.sql"]);

    expect(fs.existsSync(path.join(root, "models/marts/fct_orders.sql"))).toBe(false);
  });

  it("refuses paths that leave the project root", () => {
    expect(() => new FsArtifactWriter(root).write([{ path: "../escape.txt", contents: "x" }])).toThrow(
      "Refusing to write outside project root: ../escape.txt"
    );
  });
});
