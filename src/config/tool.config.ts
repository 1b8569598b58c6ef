import { z } from "zod";

export type LlmProvider = "openai" | "ollama";

export type LlmConfig = {
  provider: LlmProvider;
  apiUrl: string;
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type PathsConfig = {
  projectRoot: string;
  sourceCsv: string;
  schemaCsv: string;
  mappingYaml: string;
  /** Set only when the user asked for prompt overrides. */
  promptsDir?: string;
};

export type ToolConfig = {
  paths: PathsConfig;
  llm: LlmConfig;
  generation: {
    concurrency: number;
    codeReview: boolean;
  };
  sqlfluff: {
    enabled: boolean;
    dialect: string;
  };
  platform: {
    port: number;
  };
};

type Env = Record<string, string | undefined>;

const DEFAULT_API_URLS: Record<LlmProvider, string> = {
  openai: "https://api.openai.com/v1/chat/completions",
  ollama: "http://localhost:11434/api/generate",
};

const ToolConfigZ = z.object({
  paths: z.object({
    projectRoot: z.string().min(1),
    sourceCsv: z.string().min(1),
    schemaCsv: z.string().min(1),
    mappingYaml: z.string().min(1),
    promptsDir: z.string().min(1).optional(),
  }),
  llm: z.object({
    provider: z.enum(["openai", "ollama"]),
    apiUrl: z.string().url(),
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1),
    maxTokens: z.number().int().positive(),
    temperature: z.number().min(0).max(2),
    topP: z.number().min(0).max(1),
    timeoutMs: z.number().int().positive(),
    retries: z.number().int().min(0),
    retryDelayMs: z.number().int().min(0),
  }),
  generation: z.object({
    concurrency: z.number().int().positive(),
    codeReview: z.boolean(),
  }),
  sqlfluff: z.object({
    enabled: z.boolean(),
    dialect: z.string().min(1),
  }),
  platform: z.object({
    port: z.number().int().positive(),
  }),
});

function envReader(source: Env) {
  function env(name: string, fallback?: string): string {
    const v = source[name] ?? fallback;
    if (v === undefined) throw new Error(`Missing env var: ${name}`);
    return v;
  }

  function optional(name: string): string | undefined {
    const v = source[name];
    return v === undefined || v.trim() === "" ? undefined : v;
  }

  function bool(name: string, fallback: boolean): boolean {
    const v = optional(name);
    if (v === undefined) return fallback;
    return ["true", "1", "yes"].includes(v.toLowerCase());
  }

  return { env, optional, bool };
}

export function loadToolConfig(source: Env = process.env): ToolConfig {
  const { env, optional, bool } = envReader(source);

  const provider = env("LLM_PROVIDER", "openai").toLowerCase();
  const knownProvider: LlmProvider = provider === "ollama" ? "ollama" : "openai";

  const config = {
    paths: {
      projectRoot: env("PROJECT_ROOT", "./dbt_project"),
      sourceCsv: env("SOURCE_CSV_PATH", "./config/source_tables.csv"),
      schemaCsv: env("SCHEMA_DEFINITIONS_PATH", "./config/schema_definitions.csv"),
      mappingYaml: env("MAPPING_YAML_PATH", "./config/table_mappings.yaml"),
      promptsDir: optional("PROMPTS_PATH"),
    },
    llm: {
      provider,
      apiUrl: env("LLM_API_URL", DEFAULT_API_URLS[knownProvider]),
      apiKey: optional("LLM_API_KEY"),
      model: env("LLM_MODEL", knownProvider === "ollama" ? "phi3:mini" : "gpt-4"),
      maxTokens: Number(env("LLM_MAX_TOKENS", "4000")),
      temperature: Number(env("LLM_TEMPERATURE", "0.1")),
      topP: Number(env("LLM_TOP_P", "1")),
      timeoutMs: Number(env("LLM_TIMEOUT_MS", "60000")),
      retries: Number(env("LLM_RETRIES", "2")),
      retryDelayMs: Number(env("LLM_RETRY_DELAY_MS", "1000")),
    },
    generation: {
      concurrency: Number(env("GENERATION_CONCURRENCY", "4")),
      codeReview: bool("CODE_REVIEW_ENABLED", false),
    },
    sqlfluff: {
      enabled: bool("SQLFLUFF_ENABLED", false),
      dialect: env("SQLFLUFF_DIALECT", "snowflake"),
    },
    platform: {
      port: Number(env("PLATFORM_PORT", "5050")),
    },
  };

  const parsed = ToolConfigZ.safeParse(config);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
