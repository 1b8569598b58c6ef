import type { CatalogModel, RelationTarget, SourceTableSpec } from "./catalog.types";

export type ResolvedReference =
  | { kind: "source"; name: string; source: SourceTableSpec }
  | { kind: "model"; name: string };

/**
 * Sources win over models when a name is both. The loader has already rejected
 * names that resolve to neither.
 */
export function resolveReference(catalog: CatalogModel, name: string): ResolvedReference {
  const source = catalog.sources.get(name);
  if (source) return { kind: "source", name, source };
  return { kind: "model", name };
}

function quoteJinjaArg(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

export function targetOf(ref: ResolvedReference): RelationTarget {
  if (ref.kind === "source") return { kind: "source", schema: ref.source.schema, name: ref.source.name };
  return { kind: "model", name: ref.name };
}

/** Macro call without the Jinja braces, as dbt test arguments take it. */
export function relationCall(target: RelationTarget): string {
  if (target.kind === "source") {
    return `source(${quoteJinjaArg(target.schema)}, ${quoteJinjaArg(target.name)})`;
  }
  return `ref(${quoteJinjaArg(target.name)})`;
}

/** Jinja relation expression, e.g. `{{ source('raw', 'orders') }}` or `{{ ref('stg_orders') }}`. */
export function relationFor(ref: ResolvedReference): string {
  return `{{ ${relationCall(targetOf(ref))} }}`;
}
