import fs from "fs";
import path from "path";
import Papa from "papaparse";
import YAML from "yaml";
import type { RawRow } from "../catalog/catalog-loader";

export function parseCsvRows(text: string, label = "csv"): RawRow[] {
  const result = Papa.parse<RawRow>(text, {
    header: true,
    delimiter: ",",
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim(),
  });

  // Ragged rows are tolerated; anything else means the file is not CSV we can trust.
  const fatal = result.errors.filter((e) => e.type !== "FieldMismatch");
  if (fatal.length > 0) {
    const first = fatal[0];
    const where = first.row !== undefined ? ` (row ${first.row + 1})` : "";
    throw new Error(`Failed to parse ${label}${where}: ${first.message}`);
  }

  return result.data;
}

export function parseYamlDocument(text: string, label = "yaml"): unknown {
  try {
    return YAML.parse(text);
  } catch (err) {
    throw new Error(`Failed to parse ${label}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function readCsvRows(filePath: string): RawRow[] {
  const raw = fs.readFileSync(filePath, "utf8");
  return parseCsvRows(raw, path.basename(filePath));
}

export function readYamlDocument(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, "utf8");
  return parseYamlDocument(raw, path.basename(filePath));
}

export function toYamlString(obj: unknown): string {
  const doc = new YAML.Document(obj);
  return doc.toString({ indent: 2 });
}
