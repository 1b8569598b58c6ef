import { z } from "zod";
import {
  FILE_FORMATS,
  tableKey,
  type CatalogModel,
  type ColumnSpec,
  type ColumnTransformation,
  type ComplexModelSpec,
  type RelationTarget,
  type SourceTableSpec,
  type StagingModelSpec,
  type TableSpec,
} from "./catalog.types";
import { errorMessage, ValidationFailure, type ValidationIssue } from "../errors";

export type RawRow = Record<string, unknown>;

// -----------------------------
// FIELD NORMALIZERS
// -----------------------------

const TRUE_WORDS = new Set(["true", "yes", "y", "1"]);
const FALSE_WORDS = new Set(["false", "no", "n", "0"]);

function normalizeText(v: unknown): unknown {
  if (v === null) return undefined;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  if (typeof v === "string") {
    const t = v.trim();
    return t === "" ? undefined : t;
  }
  return v;
}

function normalizeFlag(v: unknown): unknown {
  if (v === null) return undefined;
  if (typeof v === "number") return v === 1 ? true : v === 0 ? false : v;
  if (typeof v === "string") {
    const t = v.trim().toLowerCase();
    if (t === "") return undefined;
    if (TRUE_WORDS.has(t)) return true;
    if (FALSE_WORDS.has(t)) return false;
  }
  return v;
}

function normalizeNumber(v: unknown): unknown {
  if (v === null) return undefined;
  if (typeof v === "string") {
    const t = v.trim();
    if (t === "") return undefined;
    const n = Number(t);
    return Number.isFinite(n) ? n : v;
  }
  return v;
}

function normalizeList(v: unknown): unknown {
  if (v === null) return undefined;
  if (typeof v === "string") {
    const items = v
      .split(/[|,]/)
      .map((s) => s.trim())
      .filter((s) => s !== "");
    return items.length ? items : undefined;
  }
  if (Array.isArray(v)) {
    return v.map((item) =>
      typeof item === "number" || typeof item === "boolean" ? String(item) : item
    );
  }
  return v;
}

const requiredText = z.preprocess(
  normalizeText,
  z.string({ required_error: "is required", invalid_type_error: "must be text" })
);

const optionalText = z.preprocess(
  normalizeText,
  z.string({ invalid_type_error: "must be text" }).optional()
);

const identifier = z.preprocess(
  normalizeText,
  z
    .string({ required_error: "is required", invalid_type_error: "must be text" })
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must contain only letters, digits and underscores")
);

const pathSegment = z.preprocess(
  normalizeText,
  z
    .string({ invalid_type_error: "must be text" })
    .regex(/^[A-Za-z0-9_-]+$/, "must contain only letters, digits, underscores and dashes")
    .optional()
);

const flag = z.preprocess(
  normalizeFlag,
  z.boolean({ invalid_type_error: "must be true or false" }).optional()
);

const optionalNumber = z.preprocess(
  normalizeNumber,
  z.number({ invalid_type_error: "must be a number" }).optional()
);

const optionalLength = z.preprocess(
  normalizeNumber,
  z
    .number({ invalid_type_error: "must be a number" })
    .int("must be a whole number")
    .positive("must be positive")
    .optional()
);

const optionalList = z.preprocess(
  normalizeList,
  z.array(z.string({ invalid_type_error: "must be text" })).optional()
);

const fileFormat = z.preprocess(
  (v) => (typeof v === "string" ? normalizeText(v.toUpperCase()) : normalizeText(v)),
  z.enum(FILE_FORMATS, {
    errorMap: (issue, ctx) =>
      issue.code === "invalid_type" && ctx.data === undefined
        ? { message: "is required" }
        : { message: `must be one of ${FILE_FORMATS.join(", ")}` },
  })
);

// -----------------------------
// ROW / DOCUMENT SHAPES
// -----------------------------

const SchemaRowZ = z.object({
  schema_name: requiredText,
  table_name: requiredText,
  table_description: optionalText,
  column_name: requiredText,
  data_type: requiredText,
  is_nullable: flag,
  is_primary_key: flag,
  is_unique: flag,
  default_value: optionalText,
  description: optionalText,
  constraints: optionalList,
  min_value: optionalNumber,
  max_value: optionalNumber,
  max_length: optionalLength,
  pattern: optionalText,
  accepted_values: optionalList,
  references: optionalText,
  index_hint: optionalText,
});

const SourceRowZ = z.object({
  table_name: requiredText,
  source_schema: requiredText,
  source_database: optionalText,
  file_format: fileFormat,
  location: requiredText,
  description: optionalText,
  partition_by: optionalText,
  cluster_by: optionalText,
  refresh_frequency: optionalText,
});

const RelationshipZ = z.object({
  to: requiredText,
  field: requiredText,
});

const ModelColumnZ = z.object({
  name: requiredText,
  data_type: optionalText,
  type: optionalText,
  description: optionalText,
  nullable: flag,
  required: flag,
  primary_key: flag,
  unique: flag,
  default_value: optionalText,
  constraints: optionalList,
  min_value: optionalNumber,
  max_value: optionalNumber,
  max_length: optionalLength,
  pattern: optionalText,
  accepted_values: optionalList,
  references: optionalText,
  relationship: RelationshipZ.optional(),
  index_hint: optionalText,
});

const TransformationZ = z.object({
  name: requiredText,
  transformation: optionalText,
  expression: optionalText,
});

const StagingModelZ = z.object({
  name: identifier,
  source_table: requiredText,
  columns: z.array(TransformationZ, { invalid_type_error: "must be a list" }).nullish(),
});

const ComplexModelZ = z.object({
  name: identifier,
  type: pathSegment,
  mart_type: pathSegment,
  description: optionalText,
  source_tables: optionalList,
  business_logic: optionalText,
  expected_behavior: optionalText,
  columns: z.array(ModelColumnZ, { invalid_type_error: "must be a list" }).nullish(),
});

const MappingDocumentZ = z.object(
  {
    staging_models: z.array(z.unknown(), { invalid_type_error: "must be a list" }).nullish(),
    models: z.array(z.unknown(), { invalid_type_error: "must be a list" }).nullish(),
  },
  { invalid_type_error: "mapping document must be a mapping" }
);

// -----------------------------
// HELPERS
// -----------------------------

function zodIssues(entity: string, error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => {
    const field = issue.path.join(".");
    const missing = issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined";
    return {
      entity,
      rule: missing ? "required" : "invalid_value",
      message: field ? `${field} ${issue.message}` : issue.message,
    };
  });
}

function rawText(row: RawRow, field: string): string | undefined {
  const v = normalizeText(row[field]);
  return typeof v === "string" ? v : undefined;
}

function asRecord(v: unknown): RawRow {
  return typeof v === "object" && v !== null && !Array.isArray(v) ? { ...v } : {};
}

type UnresolvedForeignKey = {
  table: string;
  column: string;
};

/** Maps a referenced table name to the source or model it means. */
type TargetResolver = (name: string) => RelationTarget | undefined;

/**
 * `schema.table.column` or `table.column`; the last segment is the column.
 */
function parseReference(ref: string): UnresolvedForeignKey | null {
  const idx = ref.lastIndexOf(".");
  if (idx <= 0 || idx === ref.length - 1) return null;
  return { table: ref.slice(0, idx), column: ref.slice(idx + 1) };
}

/** `ref('x')` → `x`, `source('s', 't')` → `s.t`; anything else is taken as written. */
function relationName(to: string): string {
  const ref = /^ref\(\s*['"](.+)['"]\s*\)$/.exec(to);
  if (ref) return ref[1];
  const source = /^source\(\s*['"](.+?)['"]\s*,\s*['"](.+?)['"]\s*\)$/.exec(to);
  if (source) return tableKey(source[1], source[2]);
  return to;
}

/**
 * A source table is found by its name or by `schema.table`; a model by its name.
 */
function targetResolver(
  sources: ReadonlyMap<string, SourceTableSpec>,
  modelNames: ReadonlySet<string>
): TargetResolver {
  return (name) => {
    const source =
      sources.get(name) ?? [...sources.values()].find((s) => tableKey(s.schema, s.name) === name);
    if (source) return { kind: "source", schema: source.schema, name: source.name };
    if (modelNames.has(name)) return { kind: "model", name };
    return undefined;
  };
}

function declaredModelNames(document: unknown): Set<string> {
  const doc = asRecord(document);
  const names = new Set<string>();
  for (const section of [doc.staging_models, doc.models]) {
    if (!Array.isArray(section)) continue;
    for (const item of section) {
      const name = rawText(asRecord(item), "name");
      if (name) names.add(name);
    }
  }
  return names;
}

type RawColumn = {
  name: string;
  dataType: string;
  description?: string;
  nullable?: boolean;
  primaryKey?: boolean;
  unique?: boolean;
  defaultValue?: string;
  constraints?: string[];
  min?: number;
  max?: number;
  maxLength?: number;
  pattern?: string;
  acceptedValues?: string[];
  references?: string;
  relationship?: UnresolvedForeignKey;
  indexHint?: string;
};

/**
 * Folds the boolean flags into the constraint set and checks the column-level rules.
 * Violations are recorded, never corrected.
 */
function buildColumn(
  raw: RawColumn,
  entity: string,
  issues: ValidationIssue[],
  resolveTarget: TargetResolver
): ColumnSpec {
  const listed = raw.constraints ?? [];
  const primaryKey = raw.primaryKey === true || listed.includes("primary_key");
  const unique = raw.unique === true || listed.includes("unique");
  const nullable = (raw.nullable ?? true) && !listed.includes("not_null");

  const constraints = new Set<string>(listed);
  if (!nullable) constraints.add("not_null");
  if (unique) constraints.add("unique");
  if (primaryKey) constraints.add("primary_key");

  if (primaryKey && nullable) {
    issues.push({ entity, rule: "primary_key", message: "primary key column must not be nullable" });
  }
  if (primaryKey && !unique) {
    issues.push({ entity, rule: "primary_key", message: "primary key column must be unique" });
  }

  if (raw.min !== undefined && raw.max !== undefined && raw.min > raw.max) {
    issues.push({
      entity,
      rule: "range",
      message: `min_value ${raw.min} is greater than max_value ${raw.max}`,
    });
  }

  if (raw.pattern !== undefined) {
    try {
      new RegExp(raw.pattern);
    } catch (err) {
      issues.push({
        entity,
        rule: "pattern",
        message: `pattern is not a valid regular expression: ${errorMessage(err)}`,
      });
    }
  }

  let unresolved = raw.relationship;
  if (!unresolved && raw.references !== undefined) {
    const parsed = parseReference(raw.references);
    if (parsed) {
      unresolved = parsed;
    } else {
      issues.push({
        entity,
        rule: "invalid_value",
        message: `references "${raw.references}" must be written as table.column`,
      });
    }
  }

  let foreignKey: ColumnSpec["foreignKey"];
  if (unresolved) {
    const target = resolveTarget(unresolved.table);
    if (target) {
      foreignKey = Object.freeze({ target, column: unresolved.column });
    } else {
      issues.push({
        entity,
        rule: "dangling_reference",
        message: `foreign key table "${unresolved.table}" does not match a source table or a model`,
      });
    }
  }

  const range =
    raw.min !== undefined || raw.max !== undefined ? { min: raw.min, max: raw.max } : undefined;

  return Object.freeze({
    name: raw.name,
    dataType: raw.dataType,
    nullable,
    primaryKey,
    unique,
    defaultValue: raw.defaultValue,
    description: raw.description ?? "",
    constraints: Object.freeze([...constraints]),
    range,
    pattern: raw.pattern,
    maxLength: raw.maxLength,
    acceptedValues: raw.acceptedValues ? Object.freeze([...raw.acceptedValues]) : undefined,
    foreignKey,
    indexHint: raw.indexHint,
  });
}

// -----------------------------
// SECTIONS
// -----------------------------

function loadTables(
  rows: readonly RawRow[],
  issues: ValidationIssue[],
  resolveTarget: TargetResolver
): Map<string, TableSpec> {
  const building = new Map<string, { schema: string; name: string; description: string; columns: ColumnSpec[] }>();

  rows.forEach((row, i) => {
    const schema = rawText(row, "schema_name");
    const table = rawText(row, "table_name");
    const column = rawText(row, "column_name");
    const entity =
      schema && table && column ? `${schema}.${table}.${column}` : `schema_definitions[${i}]`;

    const parsed = SchemaRowZ.safeParse(row);
    if (!parsed.success) {
      issues.push(...zodIssues(entity, parsed.error));
      return;
    }
    const r = parsed.data;

    const key = tableKey(r.schema_name, r.table_name);
    let spec = building.get(key);
    if (!spec) {
      spec = { schema: r.schema_name, name: r.table_name, description: "", columns: [] };
      building.set(key, spec);
    }
    if (!spec.description && r.table_description) spec.description = r.table_description;

    if (spec.columns.some((c) => c.name === r.column_name)) {
      issues.push({
        entity,
        rule: "duplicate",
        message: `column "${r.column_name}" is declared more than once in ${key}`,
      });
      return;
    }

    spec.columns.push(
      buildColumn(
        {
          name: r.column_name,
          dataType: r.data_type,
          description: r.description,
          nullable: r.is_nullable,
          primaryKey: r.is_primary_key,
          unique: r.is_unique,
          defaultValue: r.default_value,
          constraints: r.constraints,
          min: r.min_value,
          max: r.max_value,
          maxLength: r.max_length,
          pattern: r.pattern,
          acceptedValues: r.accepted_values,
          references: r.references,
          indexHint: r.index_hint,
        },
        entity,
        issues,
        resolveTarget
      )
    );
  });

  const tables = new Map<string, TableSpec>();
  for (const [key, spec] of building) {
    tables.set(key, Object.freeze({ ...spec, columns: Object.freeze([...spec.columns]) }));
  }
  return tables;
}

function loadSources(
  rows: readonly RawRow[],
  issues: ValidationIssue[]
): Map<string, SourceTableSpec> {
  const sources = new Map<string, SourceTableSpec>();

  rows.forEach((row, i) => {
    const name = rawText(row, "table_name");
    const entity = name ? `source:${name}` : `source_tables[${i}]`;

    const parsed = SourceRowZ.safeParse(row);
    if (!parsed.success) {
      issues.push(...zodIssues(entity, parsed.error));
      return;
    }
    const r = parsed.data;

    if (sources.has(r.table_name)) {
      issues.push({
        entity,
        rule: "duplicate",
        message: `source table "${r.table_name}" is declared more than once`,
      });
      return;
    }

    sources.set(
      r.table_name,
      Object.freeze({
        name: r.table_name,
        schema: r.source_schema,
        database: r.source_database,
        fileFormat: r.file_format,
        location: r.location,
        partitionBy: r.partition_by,
        clusterBy: r.cluster_by,
        refreshFrequency: r.refresh_frequency,
        description: r.description ?? "",
      })
    );
  });

  return sources;
}

type ModelSections = {
  stagingModels: StagingModelSpec[];
  models: ComplexModelSpec[];
};

function loadMapping(
  document: unknown,
  sources: ReadonlyMap<string, SourceTableSpec>,
  issues: ValidationIssue[],
  resolveTarget: TargetResolver
): ModelSections {
  const sections: ModelSections = { stagingModels: [], models: [] };

  const doc = MappingDocumentZ.safeParse(document ?? {});
  if (!doc.success) {
    issues.push(...zodIssues("mapping", doc.error));
    return sections;
  }

  // Models may only reference sources or models declared before them.
  const declared = new Set<string>();

  const checkName = (entity: string, name: string) => {
    if (declared.has(name)) {
      issues.push({ entity, rule: "duplicate", message: `model "${name}" is declared more than once` });
    }
  };

  const checkReference = (entity: string, field: string, ref: string) => {
    if (!sources.has(ref) && !declared.has(ref)) {
      issues.push({
        entity,
        rule: "dangling_reference",
        message: `${field} "${ref}" does not match a source table or a prior model`,
      });
    }
  };

  (doc.data.staging_models ?? []).forEach((item, i) => {
    const name = rawText(asRecord(item), "name");
    const entity = name ? `staging_models.${name}` : `staging_models[${i}]`;

    const parsed = StagingModelZ.safeParse(item);
    if (!parsed.success) {
      issues.push(...zodIssues(entity, parsed.error));
      return;
    }
    const m = parsed.data;

    checkName(entity, m.name);
    checkReference(entity, "source_table", m.source_table);
    declared.add(m.name);

    const columns: ColumnTransformation[] = (m.columns ?? []).map((c) =>
      Object.freeze({ column: c.name, expression: c.transformation ?? c.expression ?? "" })
    );

    sections.stagingModels.push(
      Object.freeze({ name: m.name, sourceTable: m.source_table, columns: Object.freeze(columns) })
    );
  });

  (doc.data.models ?? []).forEach((item, i) => {
    const name = rawText(asRecord(item), "name");
    const entity = name ? `models.${name}` : `models[${i}]`;

    const parsed = ComplexModelZ.safeParse(item);
    if (!parsed.success) {
      issues.push(...zodIssues(entity, parsed.error));
      return;
    }
    const m = parsed.data;

    checkName(entity, m.name);
    const sourceTables = m.source_tables ?? [];
    sourceTables.forEach((ref, j) => checkReference(entity, `source_tables[${j}]`, ref));
    declared.add(m.name);

    const columns = (m.columns ?? []).map((c) => {
      const columnEntity = `${entity}.columns.${c.name}`;
      const nullable = c.nullable ?? (c.required === undefined ? undefined : !c.required);
      return buildColumn(
        {
          name: c.name,
          dataType: c.data_type ?? c.type ?? "",
          description: c.description,
          nullable,
          primaryKey: c.primary_key,
          unique: c.unique,
          defaultValue: c.default_value,
          constraints: c.constraints,
          min: c.min_value,
          max: c.max_value,
          maxLength: c.max_length,
          pattern: c.pattern,
          acceptedValues: c.accepted_values,
          references: c.references,
          relationship: c.relationship
            ? { table: relationName(c.relationship.to), column: c.relationship.field }
            : undefined,
          indexHint: c.index_hint,
        },
        columnEntity,
        issues,
        resolveTarget
      );
    });

    const seen = new Set<string>();
    for (const c of columns) {
      if (seen.has(c.name)) {
        issues.push({
          entity: `${entity}.columns.${c.name}`,
          rule: "duplicate",
          message: `column "${c.name}" is declared more than once in model ${m.name}`,
        });
      }
      seen.add(c.name);
    }

    sections.models.push(
      Object.freeze({
        name: m.name,
        type: m.type ?? "marts",
        martType: m.mart_type,
        description: m.description ?? "",
        sourceTables: Object.freeze([...sourceTables]),
        businessLogic: m.business_logic ?? "",
        expectedBehavior: m.expected_behavior ?? "",
        columns: Object.freeze(columns),
      })
    );
  });

  return sections;
}

// -----------------------------
// ENTRY POINT
// -----------------------------

/**
 * Parse the three input catalogs into a CatalogModel.
 *
 * Every violation across all three inputs is collected before anything is returned;
 * on any violation a ValidationFailure is thrown and no catalog is produced.
 */
export function loadCatalog(
  schemaRows: readonly RawRow[],
  sourceRows: readonly RawRow[],
  mappingDocument: unknown
): CatalogModel {
  const tableIssues: ValidationIssue[] = [];
  const sourceIssues: ValidationIssue[] = [];
  const mappingIssues: ValidationIssue[] = [];

  // Foreign keys may point at any source or model, so those names are known up front.
  const sources = loadSources(sourceRows, sourceIssues);
  const resolveTarget = targetResolver(sources, declaredModelNames(mappingDocument));

  const tables = loadTables(schemaRows, tableIssues, resolveTarget);
  const { stagingModels, models } = loadMapping(mappingDocument, sources, mappingIssues, resolveTarget);

  const issues = [...tableIssues, ...sourceIssues, ...mappingIssues];

  if (issues.length > 0) {
    throw new ValidationFailure(issues);
  }

  return Object.freeze({
    tables,
    sources,
    stagingModels: Object.freeze(stagingModels),
    models: Object.freeze(models),
  });
}
