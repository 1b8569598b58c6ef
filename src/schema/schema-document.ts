import type { ModelOutcome, SucceededModel } from "../orchestrator/orchestrator.types";
import type { TestDeclaration } from "./constraint-tests";

export type RenderedTest = Record<string, Record<string, unknown>>;

export type SchemaColumnEntry = {
  name: string;
  description?: string;
  data_type?: string;
  tests?: RenderedTest[];
};

export type SchemaModelEntry = {
  name: string;
  description?: string;
  columns: SchemaColumnEntry[];
};

export type SchemaDocument = {
  version: 2;
  models: SchemaModelEntry[];
};

export function renderTest(test: TestDeclaration): RenderedTest {
  return {
    [test.test]: {
      ...(test.args ?? {}),
      config: { severity: test.severity },
    },
  };
}

function modelEntry(outcome: SucceededModel): SchemaModelEntry {
  return {
    name: outcome.model,
    ...(outcome.description ? { description: outcome.description } : {}),
    columns: outcome.columns.map((c) => ({
      name: c.column,
      ...(c.description ? { description: c.description } : {}),
      ...(c.dataType ? { data_type: c.dataType } : {}),
      ...(c.tests.length > 0 ? { tests: c.tests.map(renderTest) } : {}),
    })),
  };
}

/**
 * One schema.yml per model directory, models in outcome order. Skipped models have
 * no artifact and are left out.
 */
export function buildSchemaDocuments(
  outcomes: readonly ModelOutcome[]
): { directory: string; document: SchemaDocument }[] {
  const byDirectory = new Map<string, SchemaDocument>();

  for (const outcome of outcomes) {
    if (outcome.status !== "succeeded") continue;

    let doc = byDirectory.get(outcome.directory);
    if (!doc) {
      doc = { version: 2, models: [] };
      byDirectory.set(outcome.directory, doc);
    }
    doc.models.push(modelEntry(outcome));
  }

  return [...byDirectory].map(([directory, document]) => ({ directory, document }));
}
