import fs from "fs";
import path from "path";
import { CompositionFailure } from "../errors";

export type TemplateName = "model_generation" | "tester_checklist" | "code_review";

export const DEFAULT_TEMPLATES: Readonly<Record<TemplateName, string>> = {
  model_generation: `You are an expert dbt developer. Create a production-ready dbt model.

Model: {model_name}
Model type: {model_type}
Description: {description}

Source tables:
{source_tables}

Output columns:
{columns}

Business logic:
{business_logic}

Expected behavior:
{expected_behavior}

Rules:
- Reference every table through the dbt source() or ref() macro shown above
- Output exactly the listed columns, in order
- Return SQL only, no explanations`,

  tester_checklist: `Suggest checks a developer should do before deploying the dbt model {model_name}.
Return as a checklist.

Model SQL:
{model_sql}`,

  code_review: `You are a senior dbt developer. Review the following code for quality and best practices.

Model: {model_name}

{model_sql}

Return a short list of findings.`,
};

/** Looks up raw template text by name. */
export interface TemplateSource {
  lookup(name: string): string | undefined;
}

export class DirectoryTemplateSource implements TemplateSource {
  constructor(private readonly dir: string) {}

  lookup(name: string): string | undefined {
    const file = path.join(this.dir, `${name}.txt`);
    if (!fs.existsSync(file)) return undefined;
    return fs.readFileSync(file, "utf8");
  }
}

export class InMemoryTemplateSource implements TemplateSource {
  constructor(private readonly templates: Readonly<Record<string, string>>) {}

  lookup(name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.templates, name)
      ? this.templates[name]
      : undefined;
  }
}

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function placeholdersOf(template: string): string[] {
  const names = new Set<string>();
  for (const m of template.matchAll(PLACEHOLDER)) names.add(m[1]);
  return [...names];
}

/**
 * Renders named prompt templates.
 *
 * With an override source, every template must come from it: a name it lacks is an
 * UnknownTemplate failure even when a built-in default exists. Built-in defaults are
 * only consulted when no override was configured.
 */
export class PromptComposer {
  private readonly defaults: TemplateSource;

  constructor(
    private readonly overrides?: TemplateSource,
    defaults: Readonly<Record<string, string>> = DEFAULT_TEMPLATES
  ) {
    this.defaults = new InMemoryTemplateSource(defaults);
  }

  compose(templateName: string, variables: Readonly<Record<string, string>>): string {
    const template = this.overrides
      ? this.overrides.lookup(templateName)
      : this.defaults.lookup(templateName);

    if (template === undefined) {
      throw new CompositionFailure("UnknownTemplate", templateName);
    }

    const has = (name: string) => Object.prototype.hasOwnProperty.call(variables, name);

    const missing = placeholdersOf(template).filter((name) => !has(name));
    if (missing.length > 0) {
      throw new CompositionFailure("MissingVariable", templateName, missing);
    }

    // Single pass: substituted values are never scanned for placeholders again.
    return template.replace(PLACEHOLDER, (_match, name: string) => variables[name]);
  }
}

export function createPromptComposer(promptsDir?: string): PromptComposer {
  return new PromptComposer(promptsDir ? new DirectoryTemplateSource(promptsDir) : undefined);
}
