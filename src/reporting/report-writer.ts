import type { ModelOutcome } from "../orchestrator/orchestrator.types";

export type RunReportEntry = {
  model: string;
  kind: ModelOutcome["kind"];
  directory: string;
  status: ModelOutcome["status"];
  reason?: string;
  warnings: readonly string[];
  attempts: number;
};

export type RunReport = {
  generatedAt: string;
  summary: { total: number; succeeded: number; skipped: number };
  models: RunReportEntry[];
};

export function buildRunReport(outcomes: readonly ModelOutcome[], now: Date = new Date()): RunReport {
  const models = outcomes.map((o): RunReportEntry => ({
    model: o.model,
    kind: o.kind,
    directory: o.directory,
    status: o.status,
    ...(o.status === "skipped" ? { reason: o.reason } : {}),
    warnings: o.warnings,
    attempts: o.log.length,
  }));

  const skipped = models.filter((m) => m.status === "skipped").length;

  return {
    generatedAt: now.toISOString(),
    summary: { total: models.length, succeeded: models.length - skipped, skipped },
    models,
  };
}

export function renderJsonReport(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}
