import crypto from "crypto";
import type { RawRow } from "../catalog/catalog-loader";
import type { RunReport } from "../reporting/report-writer";

export type UploadKind = "schema" | "sources" | "mapping";

type Project = {
  id: string;
  createdAt: string;

  schemaRows?: RawRow[];
  sourceRows?: RawRow[];
  mapping?: unknown;

  lastRun?: RunReport;
};

export class ProjectNotFound extends Error {
  public readonly code = "PROJECT_NOT_FOUND";

  constructor(public readonly projectId: string) {
    super("Project not found");
    this.name = "ProjectNotFound";
    Object.setPrototypeOf(this, ProjectNotFound.prototype);
  }
}

const store = new Map<string, Project>();

export const projectStore = {
  createProject(): Project {
    const id = crypto.randomBytes(8).toString("hex");
    const p: Project = { id, createdAt: new Date().toISOString() };
    store.set(id, p);
    return p;
  },

  getProject(id: string): Project {
    const p = store.get(id);
    if (!p) throw new ProjectNotFound(id);
    return p;
  },

  setSchemaRows(id: string, rows: RawRow[]) {
    const p = this.getProject(id);
    p.schemaRows = rows;
  },

  setSourceRows(id: string, rows: RawRow[]) {
    const p = this.getProject(id);
    p.sourceRows = rows;
  },

  setMapping(id: string, mapping: unknown) {
    const p = this.getProject(id);
    p.mapping = mapping;
  },

  setLastRun(id: string, report: RunReport) {
    const p = this.getProject(id);
    p.lastRun = report;
  },
};
