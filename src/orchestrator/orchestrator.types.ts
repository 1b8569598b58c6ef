import type { GenerationLogEntry } from "../ai/ai.types";
import type { TestDeclaration } from "../schema/constraint-tests";

export type ModelKind = "staging" | "complex";

export type ColumnTests = {
  column: string;
  description: string;
  dataType?: string;
  tests: readonly TestDeclaration[];
};

type OutcomeBase = {
  model: string;
  kind: ModelKind;
  /** Directory the model's files belong in, relative to the project root. */
  directory: string;
  description: string;
  warnings: readonly string[];
  log: readonly GenerationLogEntry[];
};

export type SucceededModel = OutcomeBase & {
  status: "succeeded";
  artifact: string;
  columns: readonly ColumnTests[];
};

export type SkippedModel = OutcomeBase & {
  status: "skipped";
  reason: string;
};

export type ModelOutcome = SucceededModel | SkippedModel;
