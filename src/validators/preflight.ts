import fs from "fs";
import type { CatalogModel } from "../catalog/catalog.types";
import type { CliMode } from "../cli/args";
import type { ToolConfig } from "../config/tool.config";

/**
 * Checks that need both the catalog and the runtime configuration, run before any
 * generation starts.
 */
export function preflightValidate(catalog: CatalogModel, cfg: ToolConfig, mode: CliMode) {
  const wantsSources = mode === "externalTables" || mode === "generate";
  const wantsModels = mode === "models" || mode === "generate";

  if (wantsSources && catalog.sources.size === 0) {
    throw new Error(`No source tables found in ${cfg.paths.sourceCsv}`);
  }

  if (wantsModels) {
    if (catalog.stagingModels.length === 0 && catalog.models.length === 0) {
      throw new Error(`No models defined in ${cfg.paths.mappingYaml}`);
    }

    if (catalog.models.length > 0 && cfg.llm.provider === "openai" && !cfg.llm.apiKey) {
      throw new Error("LLM_API_KEY is required to generate models with the openai provider");
    }

    if (cfg.paths.promptsDir && !fs.existsSync(cfg.paths.promptsDir)) {
      throw new Error(`PROMPTS_PATH does not exist: ${cfg.paths.promptsDir}`);
    }
  }
}
