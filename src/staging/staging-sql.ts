import { relationFor, resolveReference } from "../catalog/catalog-refs";
import type { CatalogModel, ColumnTransformation, StagingModelSpec } from "../catalog/catalog.types";

const INDENT = "    ";

function selectItem(t: ColumnTransformation): string {
  const expr = t.expression.trim();
  if (expr === "" || expr === t.column) return t.column;
  return `${expr} as ${t.column}`;
}

/**
 * Staging models are derived mechanically: one select item per declared
 * transformation, read from the referenced source (or prior model).
 */
export function buildStagingSql(catalog: CatalogModel, model: StagingModelSpec): string {
  const relation = relationFor(resolveReference(catalog, model.sourceTable));

  const selectList =
    model.columns.length === 0
      ? [`${INDENT}${INDENT}*`]
      : model.columns.map(
          (c, i) => `${INDENT}${INDENT}${selectItem(c)}${i < model.columns.length - 1 ? "," : ""}`
        );

  return [
    "with source as (",
    `${INDENT}select * from ${relation}`,
    "),",
    "",
    "renamed as (",
    `${INDENT}select`,
    ...selectList,
    `${INDENT}from source`,
    ")",
    "",
    "select * from renamed",
    "",
  ].join("\n");
}
