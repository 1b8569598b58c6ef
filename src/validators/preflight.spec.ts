import { describe, it, expect } from "vitest";
import { loadCatalog } from "../catalog/catalog-loader";
import { loadToolConfig } from "../config/tool.config";
import { preflightValidate } from "./preflight";

const sources = [{ table_name: "orders", source_schema: "raw", file_format: "csv", location: "s3://test-bucket/orders/" }];

describe("preflightValidate", () => {
  const withModel = loadCatalog([], sources, { models: [{ name: "fct_orders", source_tables: ["orders"] }] });

  it("needs an API key before calling the openai provider", () => {
    expect(() => preflightValidate(withModel, loadToolConfig({}), "models")).toThrow(
      "LLM_API_KEY is required to generate models with the openai provider"
    );
    expect(() => preflightValidate(withModel, loadToolConfig({ LLM_API_KEY: "test-secret" }), "models")).not.toThrow();
    expect(() => preflightValidate(withModel, loadToolConfig({ LLM_PROVIDER: "ollama" }), "generate")).not.toThrow();
  });

  it("does not need a key for external tables alone", () => {
    expect(() => preflightValidate(withModel, loadToolConfig({}), "externalTables")).not.toThrow();
  });

  it("refuses to run with nothing to generate", () => {
    const empty = loadCatalog([], [], {});
    expect(() => preflightValidate(empty, loadToolConfig({}), "externalTables")).toThrow(
      "No source tables found in ./config/source_tables.csv"
    );
    expect(() => preflightValidate(empty, loadToolConfig({}), "models")).toThrow(
      "No models defined in ./config/table_mappings.yaml"
    );
  });
});
