export const FILE_FORMATS = ["CSV", "JSON", "PARQUET", "AVRO", "ORC", "DELTA"] as const;

export type FileFormat = (typeof FILE_FORMATS)[number];

export type ConstraintName =
  | "not_null"
  | "unique"
  | "primary_key"
  | "type_check"
  // anything else is carried along and ignored by test derivation
  | (string & {});

export type NumericRange = {
  min?: number;
  max?: number;
};

/** A relation a dbt test can point at: an external source table or a model. */
export type RelationTarget =
  | { kind: "source"; schema: string; name: string }
  | { kind: "model"; name: string };

export type ForeignKeyRef = {
  target: RelationTarget;
  column: string;
};

export type ColumnSpec = {
  name: string;
  dataType: string;
  nullable: boolean;
  primaryKey: boolean;
  unique: boolean;
  defaultValue?: string;
  description: string;
  constraints: readonly ConstraintName[];
  range?: NumericRange;
  pattern?: string;
  maxLength?: number;
  acceptedValues?: readonly string[];
  foreignKey?: ForeignKeyRef;
  indexHint?: string;
};

export type TableSpec = {
  schema: string;
  name: string;
  description: string;
  columns: readonly ColumnSpec[];
};

export type SourceTableSpec = {
  name: string;
  schema: string;
  database?: string;
  fileFormat: FileFormat;
  location: string;
  partitionBy?: string;
  clusterBy?: string;
  refreshFrequency?: string;
  description: string;
};

export type ColumnTransformation = {
  column: string;
  /** Opaque SQL expression, kept verbatim. Empty means the column is selected as-is. */
  expression: string;
};

export type StagingModelSpec = {
  name: string;
  sourceTable: string;
  columns: readonly ColumnTransformation[];
};

export type ModelType = "staging" | "intermediate" | "marts" | (string & {});

export type ComplexModelSpec = {
  name: string;
  type: ModelType;
  martType?: string;
  description: string;
  sourceTables: readonly string[];
  businessLogic: string;
  expectedBehavior: string;
  columns: readonly ColumnSpec[];
};

export type CatalogModel = {
  /** Keyed by `schema.table`. */
  tables: ReadonlyMap<string, TableSpec>;
  sources: ReadonlyMap<string, SourceTableSpec>;
  stagingModels: readonly StagingModelSpec[];
  models: readonly ComplexModelSpec[];
};

export function tableKey(schema: string, table: string): string {
  return `${schema}.${table}`;
}
