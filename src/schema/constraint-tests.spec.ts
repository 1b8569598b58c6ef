import { describe, it, expect } from "vitest";
import type { ColumnSpec } from "../catalog/catalog.types";
import { deriveColumnTests } from "./constraint-tests";

function column(overrides: Partial<ColumnSpec>): ColumnSpec {
  return {
    name: "col",
    dataType: "varchar",
    nullable: true,
    primaryKey: false,
    unique: false,
    description: "",
    constraints: [],
    ...overrides,
  };
}

describe("deriveColumnTests", () => {
  it("derives not_null, unique and pattern for an email column, in that order", () => {
    const tests = deriveColumnTests(
      column({
        name: "email",
        nullable: false,
        unique: true,
        constraints: ["not_null", "unique"],
        pattern: "^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}$",
      })
    );

    expect(tests).toEqual([
      { kind: "not_null", test: "not_null", severity: "error" },
      { kind: "unique", test: "unique", severity: "error" },
      {
        kind: "pattern",
        test: "dbt_utils.expression_is_true",
        severity: "warn",
        args: { expression: "rlike '^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}$'" },
      },
    ]);
  });

  it("emits not_null and unique once for a primary key that also lists them", () => {
    const tests = deriveColumnTests(
      column({ primaryKey: true, unique: true, nullable: false, constraints: ["not_null", "unique", "primary_key"] })
    );
    expect(tests.map((t) => t.kind)).toEqual(["not_null", "unique"]);
  });

  it("keeps the fixed order whatever order constraints are listed in", () => {
    const spec = column({
      constraints: ["unique", "type_check", "not_null"],
      range: { min: 0, max: 100 },
      maxLength: 20,
      acceptedValues: ["a", "b"],
      foreignKey: { target: { kind: "model", name: "dim_customers" }, column: "customer_id" },
    });

    expect(deriveColumnTests(spec).map((t) => t.kind)).toEqual([
      "type_check",
      "not_null",
      "unique",
      "range",
      "max_length",
      "accepted_values",
      "relationships",
    ]);
    expect(deriveColumnTests(spec)).toEqual(deriveColumnTests(spec));
  });

  it("renders open-ended ranges", () => {
    expect(deriveColumnTests(column({ range: { min: 1 } }))[0].args).toEqual({ expression: ">= 1" });
    expect(deriveColumnTests(column({ range: { max: 9 } }))[0].args).toEqual({ expression: "<= 9" });
    expect(deriveColumnTests(column({ range: { min: 1, max: 9 } }))[0].args).toEqual({
      expression: "between 1 and 9",
    });
  });

  it("escapes quotes in patterns", () => {
    const [test] = deriveColumnTests(column({ pattern: "it's" }));
    expect(test.args).toEqual({ expression: "rlike 'it''s'" });
  });

  it("skips type_check without a data type and ignores unknown constraint names", () => {
    expect(deriveColumnTests(column({ dataType: "", constraints: ["type_check", "sorted"] }))).toEqual([]);
  });

  it("points relationships at the referenced model", () => {
    const [test] = deriveColumnTests(
      column({ foreignKey: { target: { kind: "model", name: "dim_customers" }, column: "id" } })
    );
    expect(test).toEqual({
      kind: "relationships",
      test: "relationships",
      severity: "error",
      args: { to: "ref('dim_customers')", field: "id" },
    });
  });

  it("points relationships at a source table through source()", () => {
    const [test] = deriveColumnTests(
      column({ foreignKey: { target: { kind: "source", schema: "raw", name: "customers" }, column: "customer_id" } })
    );
    expect(test.args).toEqual({ to: "source('raw', 'customers')", field: "customer_id" });
  });
});
