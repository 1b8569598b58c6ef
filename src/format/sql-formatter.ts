import { spawn } from "child_process";
import { z } from "zod";
import { logger } from "../utils/logger";

export type Diagnostic = {
  line: number;
  code: string;
  description: string;
};

export interface SqlFormatter {
  format(sql: string): Promise<string>;
  lint(sql: string): Promise<Diagnostic[]>;
}

/** Leaves SQL untouched and reports nothing. Used when no formatter is configured. */
export class PassthroughFormatter implements SqlFormatter {
  async format(sql: string): Promise<string> {
    return sql;
  }

  async lint(): Promise<Diagnostic[]> {
    return [];
  }
}

const LintViolationZ = z.object({
  line_no: z.number().optional(),
  start_line_no: z.number().optional(),
  code: z.string(),
  description: z.string(),
});

const LintOutputZ = z.array(
  z.object({
    filepath: z.string().optional(),
    violations: z.array(LintViolationZ),
  })
);

/**
 * Parses `sqlfluff lint --format json` output. Older releases report `line_no`,
 * newer ones `start_line_no`.
 */
export function parseLintOutput(stdout: string): Diagnostic[] {
  const trimmed = stdout.trim();
  if (!trimmed) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    throw new Error("sqlfluff lint output is not JSON");
  }

  const parsed = LintOutputZ.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`unexpected sqlfluff lint output: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  return parsed.data.flatMap((file) =>
    file.violations.map((v) => ({
      line: v.start_line_no ?? v.line_no ?? 0,
      code: v.code,
      description: v.description,
    }))
  );
}

type ProcessResult = { code: number | null; stdout: string; stderr: string };

function runWithStdin(command: string, args: string[], input: string): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });

    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (data) => (stdout += data.toString()));
    child.stderr.on("data", (data) => (stderr += data.toString()));

    child.on("error", reject);
    child.on("close", (code) => resolve({ code, stdout, stderr }));

    child.stdin.end(input);
  });
}

/**
 * Runs sqlfluff over stdin. A missing binary or failed fix returns the input
 * unchanged; lint exits 1 when it finds violations, which is not a failure.
 */
export class SqlFluffFormatter implements SqlFormatter {
  constructor(
    private readonly dialect: string,
    private readonly command = "sqlfluff"
  ) {}

  async format(sql: string): Promise<string> {
    try {
      const res = await runWithStdin(
        this.command,
        ["fix", "-", "--dialect", this.dialect, "--disable-progress-bar"],
        sql
      );
      if (res.code !== 0 || !res.stdout.trim()) {
        logger.warn(`sqlfluff fix exited with ${res.code}: ${res.stderr.trim()}`);
        return sql;
      }
      return res.stdout;
    } catch (err) {
      logger.warn(`sqlfluff fix unavailable: ${err instanceof Error ? err.message : String(err)}`);
      return sql;
    }
  }

  async lint(sql: string): Promise<Diagnostic[]> {
    const res = await runWithStdin(
      this.command,
      ["lint", "-", "--dialect", this.dialect, "--format", "json", "--disable-progress-bar"],
      sql
    );
    if (res.code !== 0 && res.code !== 1) {
      throw new Error(`sqlfluff lint exited with ${res.code}: ${res.stderr.trim()}`);
    }
    return parseLintOutput(res.stdout);
  }
}
