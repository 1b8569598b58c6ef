import { relationCall } from "../catalog/catalog-refs";
import type { ColumnSpec } from "../catalog/catalog.types";

export type TestSeverity = "error" | "warn";

export type TestKind =
  | "type_check"
  | "not_null"
  | "unique"
  | "range"
  | "pattern"
  | "max_length"
  | "accepted_values"
  | "relationships";

export type TestArgValue = string | number | readonly string[];

export type TestDeclaration = {
  kind: TestKind;
  /** Test name as it appears in schema.yml. */
  test: string;
  severity: TestSeverity;
  args?: Readonly<Record<string, TestArgValue>>;
};

function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function rangeExpression(min?: number, max?: number): string | null {
  if (min !== undefined && max !== undefined) return `between ${min} and ${max}`;
  if (min !== undefined) return `>= ${min}`;
  if (max !== undefined) return `<= ${max}`;
  return null;
}

/**
 * Map a column's constraints to test declarations.
 *
 * Order is fixed: type check, not null, unique, range, pattern, max length,
 * accepted values, relationships. A primary key contributes not null + unique,
 * each emitted once. Structural tests are `error`; data-quality checks are `warn`.
 * Constraint names this function does not know are skipped.
 */
export function deriveColumnTests(column: ColumnSpec): TestDeclaration[] {
  const constraints = new Set(column.constraints);
  const tests: TestDeclaration[] = [];

  if (constraints.has("type_check") && column.dataType) {
    tests.push({
      kind: "type_check",
      test: "dbt_expectations.expect_column_values_to_be_of_type",
      severity: "error",
      args: { column_type: column.dataType },
    });
  }

  if (constraints.has("not_null") || constraints.has("primary_key")) {
    tests.push({ kind: "not_null", test: "not_null", severity: "error" });
  }

  if (constraints.has("unique") || constraints.has("primary_key")) {
    tests.push({ kind: "unique", test: "unique", severity: "error" });
  }

  const range = column.range ? rangeExpression(column.range.min, column.range.max) : null;
  if (range) {
    tests.push({
      kind: "range",
      test: "dbt_utils.expression_is_true",
      severity: "warn",
      args: { expression: range },
    });
  }

  if (column.pattern) {
    tests.push({
      kind: "pattern",
      test: "dbt_utils.expression_is_true",
      severity: "warn",
      args: { expression: `rlike ${sqlString(column.pattern)}` },
    });
  }

  if (column.maxLength !== undefined) {
    tests.push({
      kind: "max_length",
      test: "dbt_expectations.expect_column_value_lengths_to_be_between",
      severity: "warn",
      args: { max_value: column.maxLength },
    });
  }

  if (column.acceptedValues && column.acceptedValues.length > 0) {
    tests.push({
      kind: "accepted_values",
      test: "accepted_values",
      severity: "warn",
      args: { values: column.acceptedValues },
    });
  }

  if (column.foreignKey) {
    tests.push({
      kind: "relationships",
      test: "relationships",
      severity: "error",
      args: { to: relationCall(column.foreignKey.target), field: column.foreignKey.column },
    });
  }

  return tests;
}
