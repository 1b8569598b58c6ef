import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect } from "vitest";
import { CompositionFailure } from "../errors";
import { DEFAULT_TEMPLATES, DirectoryTemplateSource, InMemoryTemplateSource, PromptComposer, placeholdersOf } from "./ai.prompts";

function compositionFailureOf(fn: () => unknown): CompositionFailure {
  try {
    fn();
  } catch (err) {
    if (err instanceof CompositionFailure) return err;
    throw err;
  }
  throw new Error("expected a CompositionFailure");
}

describe("PromptComposer", () => {
  const composer = new PromptComposer(undefined, { greet: "Hello {name}", twice: "{a}-{a}" });

  it("fails with MissingVariable naming the absent variable", () => {
    const failure = compositionFailureOf(() => composer.compose("greet", {}));

    expect(failure.kind).toBe("MissingVariable");
    expect(failure.missing).toEqual(["name"]);
    expect(failure.message).toBe('Template "greet" is missing variable(s): name');
  });

  it("substitutes every occurrence and ignores extra variables", () => {
    expect(composer.compose("twice", { a: "x", unused: "y" })).toBe("x-x");
  });

  it("does not expand placeholders inside substituted values", () => {
    expect(composer.compose("greet", { name: "{name}" })).toBe("Hello {name}");
  });

  it("fails with UnknownTemplate for a name it does not have", () => {
    expect(compositionFailureOf(() => composer.compose("nope", {})).kind).toBe("UnknownTemplate");
  });

  it("does not fall back to defaults once overrides are configured", () => {
    const overridden = new PromptComposer(new InMemoryTemplateSource({}));
    const failure = compositionFailureOf(() =>
      overridden.compose("tester_checklist", { model_name: "m", model_sql: "select 1" })
    );

    expect(failure.kind).toBe("UnknownTemplate");
  });

  it("reads overrides from a directory", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "prompts-"));
    fs.writeFileSync(path.join(dir, "tester_checklist.txt"), "Check {model_name}");

    const fromDir = new PromptComposer(new DirectoryTemplateSource(dir));
    expect(fromDir.compose("tester_checklist", { model_name: "fct_orders" })).toBe("Check fct_orders");

    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe("DEFAULT_TEMPLATES", () => {
  it("uses the variables the orchestrator supplies", () => {
    expect(placeholdersOf(DEFAULT_TEMPLATES.model_generation)).toEqual([
      "model_name",
      "model_type",
      "description",
      "source_tables",
      "columns",
      "business_logic",
      "expected_behavior",
    ]);
    expect(placeholdersOf(DEFAULT_TEMPLATES.tester_checklist)).toEqual(["model_name", "model_sql"]);
    expect(placeholdersOf(DEFAULT_TEMPLATES.code_review)).toEqual(["model_name", "model_sql"]);
  });
});
