import { describe, it, expect } from "vitest";
import { loadToolConfig } from "./tool.config";

describe("loadToolConfig", () => {
  it("fills in defaults", () => {
    const cfg = loadToolConfig({});

    expect(cfg.paths).toEqual({
      projectRoot: "./dbt_project",
      sourceCsv: "./config/source_tables.csv",
      schemaCsv: "./config/schema_definitions.csv",
      mappingYaml: "./config/table_mappings.yaml",
      promptsDir: undefined,
    });
    expect(cfg.llm).toMatchObject({
      provider: "openai",
      apiUrl: "https://api.openai.com/v1/chat/completions",
      model: "gpt-4",
      maxTokens: 4000,
      temperature: 0.1,
      topP: 1,
      timeoutMs: 60000,
      retries: 2,
      retryDelayMs: 1000,
    });
    expect(cfg.generation).toEqual({ concurrency: 4, codeReview: false });
    expect(cfg.sqlfluff).toEqual({ enabled: false, dialect: "snowflake" });
    expect(cfg.platform.port).toBe(5050);
  });

  it("switches defaults for the ollama provider", () => {
    const cfg = loadToolConfig({ LLM_PROVIDER: "ollama" });

    expect(cfg.llm.apiUrl).toBe("http://localhost:11434/api/generate");
    expect(cfg.llm.model).toBe("phi3:mini");
  });

  it("reads overrides and flags", () => {
    const cfg = loadToolConfig({
      PROMPTS_PATH: "./prompts",
      LLM_API_KEY: "test-secret",
      LLM_RETRIES: "0",
      GENERATION_CONCURRENCY: "1",
      CODE_REVIEW_ENABLED: "yes",
      SQLFLUFF_ENABLED: "true",
    });

    expect(cfg.paths.promptsDir).toBe("./prompts");
    expect(cfg.llm.apiKey).toBe("test-secret");
    expect(cfg.llm.retries).toBe(0);
    expect(cfg.generation).toEqual({ concurrency: 1, codeReview: true });
    expect(cfg.sqlfluff.enabled).toBe(true);
  });

  it("rejects values that do not parse", () => {
    expect(() => loadToolConfig({ GENERATION_CONCURRENCY: "many" })).toThrow(
      /^Invalid configuration: generation\.concurrency: /
    );
    expect(() => loadToolConfig({ LLM_PROVIDER: "mystery" })).toThrow(/llm\.provider/);
  });
});
