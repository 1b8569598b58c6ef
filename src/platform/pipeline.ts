import { GenerationClient } from "../ai/ai.client";
import { createTransport } from "../ai/ai.llm";
import { createPromptComposer } from "../ai/ai.prompts";
import type { GenerationTransport } from "../ai/ai.types";
import { loadCatalog, type RawRow } from "../catalog/catalog-loader";
import type { CatalogModel } from "../catalog/catalog.types";
import { readCsvRows, readYamlDocument } from "../config/config-io";
import type { PathsConfig, ToolConfig } from "../config/tool.config";
import { RunCancelled } from "../errors";
import { PassthroughFormatter, SqlFluffFormatter, type SqlFormatter } from "../format/sql-formatter";
import { ArtifactOrchestrator } from "../orchestrator/artifact-orchestrator";
import type { ModelOutcome } from "../orchestrator/orchestrator.types";
import { renderModelFiles, renderSourceFiles, staleModelFiles, type GeneratedFile } from "./project-files";

export type CatalogInputs = {
  schemaRows: RawRow[];
  sourceRows: RawRow[];
  mapping: unknown;
};

export function readCatalogInputs(paths: PathsConfig): CatalogInputs {
  return {
    schemaRows: readCsvRows(paths.schemaCsv),
    sourceRows: readCsvRows(paths.sourceCsv),
    mapping: readYamlDocument(paths.mappingYaml),
  };
}

export function loadCatalogInputs(inputs: CatalogInputs): CatalogModel {
  return loadCatalog(inputs.schemaRows, inputs.sourceRows, inputs.mapping);
}

export type OrchestratorOverrides = {
  transport?: GenerationTransport;
  formatter?: SqlFormatter;
};

export function buildOrchestrator(cfg: ToolConfig, overrides: OrchestratorOverrides = {}): ArtifactOrchestrator {
  const generation = new GenerationClient(overrides.transport ?? createTransport(cfg.llm), {
    model: cfg.llm.model,
    maxTokens: cfg.llm.maxTokens,
    temperature: cfg.llm.temperature,
    topP: cfg.llm.topP,
    timeoutMs: cfg.llm.timeoutMs,
    retries: cfg.llm.retries,
    retryDelayMs: cfg.llm.retryDelayMs,
  });

  const formatter =
    overrides.formatter ??
    (cfg.sqlfluff.enabled ? new SqlFluffFormatter(cfg.sqlfluff.dialect) : new PassthroughFormatter());

  return new ArtifactOrchestrator({
    generation,
    prompts: createPromptComposer(cfg.paths.promptsDir),
    formatter,
    concurrency: cfg.generation.concurrency,
    codeReview: cfg.generation.codeReview,
  });
}

export function externalTableFiles(orchestrator: ArtifactOrchestrator, catalog: CatalogModel): GeneratedFile[] {
  return renderSourceFiles(orchestrator.generateExternalTables(catalog));
}

export type ModelRun = {
  outcomes: ModelOutcome[];
  files: GeneratedFile[];
  /** Earlier SQL of models skipped this time, to delete before writing. */
  stale: string[];
};

/**
 * Generates every model and renders the files to persist. Nothing is rendered when
 * the run is cancelled part-way.
 */
export async function modelFiles(
  orchestrator: ArtifactOrchestrator,
  catalog: CatalogModel,
  signal?: AbortSignal
): Promise<ModelRun> {
  const outcomes = await orchestrator.generateModels(catalog, signal);
  if (signal?.aborted) throw new RunCancelled();
  return { outcomes, files: renderModelFiles(outcomes), stale: staleModelFiles(outcomes) };
}
