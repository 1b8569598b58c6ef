#!/usr/bin/env node
import "dotenv/config";
import { parseArgs } from "./cli/args";
import { loadToolConfig } from "./config/tool.config";
import { RunCancelled, ValidationFailure } from "./errors";
import { FsArtifactWriter } from "./platform/fs-writer";
import {
  buildOrchestrator,
  externalTableFiles,
  loadCatalogInputs,
  modelFiles,
  readCatalogInputs,
} from "./platform/pipeline";
import type { GeneratedFile } from "./platform/project-files";
import { logger } from "./utils/logger";
import { preflightValidate } from "./validators/preflight";

async function main(): Promise<number> {
  const { mode } = parseArgs(process.argv.slice(2));
  const toolConfig = loadToolConfig();

  logger.info(`Running scaffolder in "${mode}" mode`);

  // -----------------------------
  // LOAD + VALIDATE
  // -----------------------------
  const catalog = loadCatalogInputs(readCatalogInputs(toolConfig.paths));
  preflightValidate(catalog, toolConfig, mode);

  logger.info(
    `Catalog loaded: ${catalog.sources.size} source table(s), ` +
      `${catalog.stagingModels.length} staging model(s), ${catalog.models.length} model(s)`
  );

  const orchestrator = buildOrchestrator(toolConfig);
  const writer = new FsArtifactWriter(toolConfig.paths.projectRoot);
  const files: GeneratedFile[] = [];
  const stale: string[] = [];
  let skipped = 0;

  // -----------------------------
  // EXTERNAL TABLES
  // -----------------------------
  if (mode === "externalTables" || mode === "generate") {
    files.push(...externalTableFiles(orchestrator, catalog));
  }

  // -----------------------------
  // MODELS
  // -----------------------------
  if (mode === "models" || mode === "generate") {
    const controller = new AbortController();
    const onSigint = () => {
      logger.warn("Interrupted, cancelling run...");
      controller.abort();
    };
    process.once("SIGINT", onSigint);

    try {
      const run = await modelFiles(orchestrator, catalog, controller.signal);
      files.push(...run.files);
      stale.push(...run.stale);
      skipped = run.outcomes.filter((o) => o.status === "skipped").length;
    } finally {
      process.removeListener("SIGINT", onSigint);
    }
  }

  // -----------------------------
  // WRITE
  // -----------------------------
  writer.remove(stale);
  writer.write(files);
  logger.info(`Wrote ${files.length} file(s) under ${toolConfig.paths.projectRoot}`);

  if (skipped > 0) {
    logger.warn(`${skipped} model(s) skipped, see run-report.json`);
    return 1;
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof ValidationFailure) {
      logger.error(`Validation failed with ${err.issues.length} issue(s)`);
      for (const issue of err.issues) {
        logger.error(`[${issue.rule}] ${issue.entity}: ${issue.message}`);
      }
    } else if (err instanceof RunCancelled) {
      logger.warn("Run cancelled, nothing was written");
    } else if (err instanceof Error) {
      logger.error(err.stack ?? err.message);
    } else {
      logger.error(String(err));
    }
    process.exit(1);
  });
