import { describe, it, expect } from "vitest";
import YAML from "yaml";
import type { SourceTableSpec, TableSpec } from "../catalog/catalog.types";
import { toYamlString } from "../config/config-io";
import { buildSourceDocument } from "./source-builder";

const orders: SourceTableSpec = {
  name: "orders",
  schema: "raw",
  database: "analytics",
  fileFormat: "PARQUET",
  location: "s3://test-bucket/orders/",
  partitionBy: "order_date",
  refreshFrequency: "daily",
  description: "Order events",
};

const customers: SourceTableSpec = {
  name: "customers",
  schema: "crm",
  fileFormat: "CSV",
  location: "s3://test-bucket/customers/",
  clusterBy: "region",
  description: "",
};

const payments: SourceTableSpec = {
  name: "payments",
  schema: "raw",
  database: "other_db",
  fileFormat: "JSON",
  location: "s3://test-bucket/payments/",
  description: "Payments",
};

describe("buildSourceDocument", () => {
  it("describes an external table", () => {
    expect(buildSourceDocument([orders])).toEqual({
      version: 2,
      sources: [
        {
          name: "raw",
          database: "analytics",
          description: "External tables in raw schema",
          tables: [
            {
              name: "orders",
              description: "Order events",
              external: {
                location: "s3://test-bucket/orders/",
                file_format: "PARQUET",
                partitions: [{ name: "order_date", data_type: "date" }],
                refresh_frequency: "daily",
              },
            },
          ],
        },
      ],
    });
  });

  it("groups by schema in order of first appearance and keeps the first database", () => {
    const doc = buildSourceDocument([orders, customers, payments]);

    expect(doc.sources.map((s) => s.name)).toEqual(["raw", "crm"]);
    expect(doc.sources[0].database).toBe("analytics");
    expect(doc.sources[0].tables.map((t) => t.name)).toEqual(["orders", "payments"]);
    expect(doc.sources[1].tables[0].external.cluster_by).toEqual(["region"]);
    expect(doc.sources[1]).not.toHaveProperty("database");
  });

  it("lists columns when the schema catalog describes the table", () => {
    const table: TableSpec = {
      schema: "raw",
      name: "orders",
      description: "",
      columns: [
        {
          name: "order_id",
          dataType: "varchar",
          nullable: false,
          primaryKey: true,
          unique: true,
          description: "Order id",
          constraints: ["not_null", "unique", "primary_key"],
        },
      ],
    };

    const doc = buildSourceDocument([orders], new Map([["raw.orders", table]]));
    expect(doc.sources[0].tables[0].columns).toEqual([
      { name: "order_id", data_type: "varchar", description: "Order id" },
    ]);
  });

  it("renders the same YAML every time", () => {
    const first = toYamlString(buildSourceDocument([orders, customers, payments]));
    const second = toYamlString(buildSourceDocument([orders, customers, payments]));

    expect(second).toBe(first);
    expect(YAML.parse(first)).toEqual(buildSourceDocument([orders, customers, payments]));
  });
});
