import { relationFor, resolveReference } from "../catalog/catalog-refs";
import {
  tableKey,
  type CatalogModel,
  type ColumnSpec,
  type ComplexModelSpec,
  type StagingModelSpec,
} from "../catalog/catalog.types";
import type { GenerationClient } from "../ai/ai.client";
import type { PromptComposer } from "../ai/ai.prompts";
import type { GenerationLogEntry } from "../ai/ai.types";
import { CompositionFailure, GenerationFailure, RunCancelled, errorMessage } from "../errors";
import type { SqlFormatter } from "../format/sql-formatter";
import { applySafetyTransform, isFullyCommented } from "../safety/safety-transform";
import { deriveColumnTests } from "../schema/constraint-tests";
import { buildSourceDocument, type SourceDocument } from "../sources/source-builder";
import { buildStagingSql } from "../staging/staging-sql";
import { logger } from "../utils/logger";
import type { ColumnTests, ModelOutcome } from "./orchestrator.types";

export type OrchestratorDeps = {
  generation: Pick<GenerationClient, "generate">;
  prompts: PromptComposer;
  formatter: SqlFormatter;
  /** Complex models generated at the same time. */
  concurrency: number;
  codeReview: boolean;
};

export const STAGING_DIRECTORY = "models/staging";

function chunkArray<T>(arr: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < arr.length; i += size) {
    chunks.push(arr.slice(i, i + size));
  }
  return chunks;
}

export function modelDirectory(model: ComplexModelSpec): string {
  if (model.type === "marts" && model.martType) return `models/marts/${model.martType}`;
  return `models/${model.type}`;
}

/** Pull the SQL out of a chat response, dropping a surrounding markdown fence. */
export function extractSql(response: string): string {
  const fenced = /```[A-Za-z]*[ \t]*\r?\n([\s\S]*?)```/.exec(response);
  return (fenced ? fenced[1] : response).trim();
}

function columnTests(column: ColumnSpec): ColumnTests {
  return {
    column: column.name,
    description: column.description,
    ...(column.dataType ? { dataType: column.dataType } : {}),
    tests: deriveColumnTests(column),
  };
}

function describeColumns(columns: readonly ColumnSpec[]): string {
  if (columns.length === 0) return "(not specified)";
  return columns
    .map((c) => `- ${c.name}${c.dataType ? ` (${c.dataType})` : ""}${c.description ? `: ${c.description}` : ""}`)
    .join("\n");
}

export class ArtifactOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  generateExternalTables(catalog: CatalogModel): SourceDocument {
    return buildSourceDocument(catalog.sources.values(), catalog.tables);
  }

  /**
   * Staging models first, then complex models in catalog order. A model that cannot be
   * composed or generated is skipped; the rest carry on.
   */
  async generateModels(catalog: CatalogModel, signal?: AbortSignal): Promise<ModelOutcome[]> {
    const outcomes: ModelOutcome[] = catalog.stagingModels.map((m) => this.stagingOutcome(catalog, m));

    const concurrency = Math.max(1, this.deps.concurrency);
    for (const batch of chunkArray(catalog.models, concurrency)) {
      if (signal?.aborted) throw new RunCancelled();
      const results = await Promise.all(batch.map((m) => this.complexOutcome(catalog, m, signal)));
      outcomes.push(...results);
    }

    const skipped = outcomes.filter((o) => o.status === "skipped").length;
    logger.info(`Generated ${outcomes.length - skipped} model(s), skipped ${skipped}`);
    return outcomes;
  }

  private stagingOutcome(catalog: CatalogModel, model: StagingModelSpec): ModelOutcome {
    const ref = resolveReference(catalog, model.sourceTable);
    const table = ref.kind === "source" ? catalog.tables.get(tableKey(ref.source.schema, ref.source.name)) : undefined;

    const columns = model.columns.map((t): ColumnTests => {
      const spec = table?.columns.find((c) => c.name === t.column);
      return spec ? columnTests(spec) : { column: t.column, description: "", tests: [] };
    });

    return {
      status: "succeeded",
      model: model.name,
      kind: "staging",
      directory: STAGING_DIRECTORY,
      description: `Staging model for ${model.sourceTable}`,
      artifact: buildStagingSql(catalog, model),
      columns,
      warnings: [],
      log: [],
    };
  }

  private async complexOutcome(
    catalog: CatalogModel,
    model: ComplexModelSpec,
    signal?: AbortSignal
  ): Promise<ModelOutcome> {
    const log: GenerationLogEntry[] = [];
    const warnings: string[] = [];
    const base = {
      model: model.name,
      kind: "complex" as const,
      directory: modelDirectory(model),
      description: model.description,
      warnings,
      log,
    };

    try {
      const sql = await this.generateSql(catalog, model, log, signal);
      const checklist = await this.generateChecklist(model, sql, log, signal);
      const artifact = await this.polish(applySafetyTransform(sql, checklist), sql, warnings);

      logger.info(`[${model.name}] generated in ${base.directory}`);
      return {
        ...base,
        status: "succeeded",
        artifact,
        columns: model.columns.map(columnTests),
      };
    } catch (err) {
      if (!(err instanceof GenerationFailure || err instanceof CompositionFailure)) throw err;
      if (err instanceof GenerationFailure) log.push(...err.log);
      logger.warn(`[${model.name}] skipped: ${err.message}`);
      return { ...base, status: "skipped", reason: err.message };
    }
  }

  private async call(
    model: string,
    prompt: string,
    kind: GenerationLogEntry["kind"],
    log: GenerationLogEntry[],
    signal?: AbortSignal
  ): Promise<string> {
    const result = await this.deps.generation.generate(model, prompt, kind, signal);
    log.push(...result.log);
    return result.text;
  }

  private async generateSql(
    catalog: CatalogModel,
    model: ComplexModelSpec,
    log: GenerationLogEntry[],
    signal?: AbortSignal
  ): Promise<string> {
    const sourceTables = model.sourceTables
      .map((name) => `- ${name}: ${relationFor(resolveReference(catalog, name))}`)
      .join("\n");

    const prompt = this.deps.prompts.compose("model_generation", {
      model_name: model.name,
      model_type: model.martType ? `${model.type} (${model.martType})` : model.type,
      description: model.description,
      source_tables: sourceTables,
      columns: describeColumns(model.columns),
      business_logic: model.businessLogic,
      expected_behavior: model.expectedBehavior,
    });

    const sql = extractSql(await this.call(model.name, prompt, "model-generation", log, signal));
    if (!sql) {
      throw new GenerationFailure("ServiceError", "response contained no SQL", []);
    }
    return sql;
  }

  private async generateChecklist(
    model: ComplexModelSpec,
    sql: string,
    log: GenerationLogEntry[],
    signal?: AbortSignal
  ): Promise<string> {
    const vars = { model_name: model.name, model_sql: sql };

    const checklistPrompt = this.deps.prompts.compose("tester_checklist", vars);
    let checklist = (await this.call(model.name, checklistPrompt, "tester-checklist", log, signal)).trim();

    if (this.deps.codeReview) {
      const reviewPrompt = this.deps.prompts.compose("code_review", vars);
      const review = (await this.call(model.name, reviewPrompt, "code-review", log, signal)).trim();
      if (review) checklist = `${checklist}\n\nCode review:\n${review}`;
    }

    return checklist;
  }

  /**
   * Lint findings on the generated SQL become warnings. The formatted artifact is kept
   * only while it stays fully commented.
   */
  private async polish(artifact: string, sql: string, warnings: string[]): Promise<string> {
    try {
      for (const d of await this.deps.formatter.lint(sql)) {
        warnings.push(`lint ${d.code} line ${d.line}: ${d.description}`);
      }
    } catch (err) {
      warnings.push(`lint failed: ${errorMessage(err)}`);
    }

    try {
      const formatted = await this.deps.formatter.format(artifact);
      if (isFullyCommented(formatted)) return formatted;
      warnings.push("formatter output discarded: it left uncommented lines");
    } catch (err) {
      warnings.push(`format failed: ${errorMessage(err)}`);
    }
    return artifact;
  }
}
