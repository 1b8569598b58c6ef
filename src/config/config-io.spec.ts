import { describe, it, expect } from "vitest";
import { parseCsvRows, parseYamlDocument } from "./config-io";

describe("parseCsvRows", () => {
  it("keys rows by trimmed header and skips blank lines", () => {
    const rows = parseCsvRows(" table_name ,location\norders,s3://test-bucket/orders/\n\n,\n");
    expect(rows).toEqual([{ table_name: "orders", location: "s3://test-bucket/orders/" }]);
  });

  it("keeps quoted commas inside a field", () => {
    const rows = parseCsvRows('name,accepted_values\nstatus,"open,closed"\n');
    expect(rows[0].accepted_values).toBe("open,closed");
  });
});

describe("parseYamlDocument", () => {
  it("names the file when the YAML is broken", () => {
    expect(() => parseYamlDocument("models: [", "table_mappings.yaml")).toThrow(
      /^Failed to parse table_mappings\.yaml: /
    );
  });
});
