import { toYamlString } from "../config/config-io";
import type { ModelOutcome } from "../orchestrator/orchestrator.types";
import { buildRunReport, renderJsonReport } from "../reporting/report-writer";
import { buildSchemaDocuments } from "../schema/schema-document";
import type { SourceDocument } from "../sources/source-builder";

/** A file to write, with a forward-slash path relative to the project root. */
export type GeneratedFile = {
  path: string;
  contents: string;
  /** Append to an existing file instead of replacing it. Attempt logs only. */
  append?: boolean;
};

export const SOURCES_FILE = "models/sources.yml";
export const RUN_REPORT_FILE = "run-report.json";

export function modelFilePath(outcome: ModelOutcome): string {
  return `${outcome.directory}/${outcome.model}.sql`;
}

export function logFilePath(model: string): string {
  return `logs/model_generation_${model}.log`;
}

export function renderSourceFiles(doc: SourceDocument): GeneratedFile[] {
  return [{ path: SOURCES_FILE, contents: toYamlString(doc) }];
}

/**
 * Everything a model run persists: SQL for each succeeded model, one schema.yml per
 * model directory, the attempt log of every model that called the generation
 * service (skipped ones included), and the run report.
 */
export function renderModelFiles(outcomes: readonly ModelOutcome[], now: Date = new Date()): GeneratedFile[] {
  const files: GeneratedFile[] = [];

  for (const o of outcomes) {
    if (o.status === "succeeded") {
      files.push({ path: modelFilePath(o), contents: o.artifact });
    }
  }

  for (const { directory, document } of buildSchemaDocuments(outcomes)) {
    files.push({ path: `${directory}/schema.yml`, contents: toYamlString(document) });
  }

  for (const o of outcomes) {
    if (o.log.length === 0) continue;
    const lines = o.log.map((entry) => JSON.stringify(entry));
    files.push({ path: logFilePath(o.model), contents: `${lines.join("\n")}\n`, append: true });
  }

  files.push({ path: RUN_REPORT_FILE, contents: renderJsonReport(buildRunReport(outcomes, now)) });
  return files;
}

/**
 * SQL a skipped model may have left behind on an earlier run. The schema.yml written
 * alongside no longer describes it.
 */
export function staleModelFiles(outcomes: readonly ModelOutcome[]): string[] {
  return outcomes.filter((o) => o.status === "skipped").map(modelFilePath);
}
