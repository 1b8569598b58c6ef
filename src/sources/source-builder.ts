import { tableKey, type SourceTableSpec, type TableSpec } from "../catalog/catalog.types";

export type SourceColumnEntry = {
  name: string;
  data_type: string;
  description?: string;
};

export type SourceTableEntry = {
  name: string;
  description: string;
  external: {
    location: string;
    file_format: string;
    partitions?: { name: string; data_type: string }[];
    cluster_by?: string[];
    refresh_frequency?: string;
  };
  columns?: SourceColumnEntry[];
};

export type SourceGroup = {
  name: string;
  database?: string;
  description: string;
  tables: SourceTableEntry[];
};

export type SourceDocument = {
  version: 2;
  sources: SourceGroup[];
};

function tableEntry(spec: SourceTableSpec, table: TableSpec | undefined): SourceTableEntry {
  const external: SourceTableEntry["external"] = {
    location: spec.location,
    file_format: spec.fileFormat,
  };
  if (spec.partitionBy) external.partitions = [{ name: spec.partitionBy, data_type: "date" }];
  if (spec.clusterBy) external.cluster_by = [spec.clusterBy];
  if (spec.refreshFrequency) external.refresh_frequency = spec.refreshFrequency;

  const entry: SourceTableEntry = {
    name: spec.name,
    description: spec.description,
    external,
  };

  if (table && table.columns.length > 0) {
    entry.columns = table.columns.map((c) => ({
      name: c.name,
      data_type: c.dataType,
      ...(c.description ? { description: c.description } : {}),
    }));
  }

  return entry;
}

/**
 * Build the external-table source document.
 *
 * One group per source schema, in order of first appearance; tables keep catalog order.
 * A group's database is the first one declared for that schema. When the schema catalog
 * describes the same `schema.table`, its columns are listed on the entry.
 */
export function buildSourceDocument(
  sourceTables: Iterable<SourceTableSpec>,
  tables: ReadonlyMap<string, TableSpec> = new Map()
): SourceDocument {
  const groups = new Map<string, SourceGroup>();

  for (const spec of sourceTables) {
    let group = groups.get(spec.schema);
    if (!group) {
      group = {
        name: spec.schema,
        ...(spec.database ? { database: spec.database } : {}),
        description: `External tables in ${spec.schema} schema`,
        tables: [],
      };
      groups.set(spec.schema, group);
    }
    group.tables.push(tableEntry(spec, tables.get(tableKey(spec.schema, spec.name))));
  }

  return { version: 2, sources: [...groups.values()] };
}
