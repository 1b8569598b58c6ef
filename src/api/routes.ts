import type { Express, Response } from "express";
import { z } from "zod";
import multer from "multer";
import archiver from "archiver";
import { validate } from "./validators";
import { projectStore, type UploadKind } from "../platform/project-store";
import { loadCatalog } from "../catalog/catalog-loader";
import { parseCsvRows, parseYamlDocument } from "../config/config-io";
import { errorMessage } from "../errors";
import type { ArtifactOrchestrator } from "../orchestrator/artifact-orchestrator";
import { externalTableFiles, modelFiles } from "../platform/pipeline";
import type { GeneratedFile } from "../platform/project-files";
import { buildRunReport } from "../reporting/report-writer";
import { logger } from "../utils/logger";

const upload = multer({ storage: multer.memoryStorage() });

const ProjectParamsZ = z.object({
  params: z.object({ id: z.string().min(1) }),
});

const UploadParamsZ = z.object({
  params: z.object({
    id: z.string().min(1),
    kind: z.enum(["schema", "sources", "mapping"]),
  }),
});

async function sendZip(res: Response, zipName: string, files: readonly GeneratedFile[]) {
  res.setHeader("Content-Type", "application/zip");
  res.setHeader("Content-Disposition", `attachment; filename="${zipName}"`);

  const archive = archiver("zip", { zlib: { level: 9 } });
  const failed = new Promise<never>((_resolve, reject) => archive.on("error", reject));

  archive.pipe(res);

  for (const f of files) {
    archive.append(f.contents, { name: f.path });
  }

  await Promise.race([archive.finalize(), failed]);
}

function storeUpload(id: string, kind: UploadKind, text: string) {
  switch (kind) {
    case "schema":
      projectStore.setSchemaRows(id, parseCsvRows(text, "schema_definitions.csv"));
      return;
    case "sources":
      projectStore.setSourceRows(id, parseCsvRows(text, "source_tables.csv"));
      return;
    case "mapping":
      projectStore.setMapping(id, parseYamlDocument(text, "table_mappings.yaml"));
      return;
  }
}

export function registerRoutes(app: Express, orchestrator: ArtifactOrchestrator) {
  // 1) Create project
  app.post("/projects", (_req, res) => {
    const p = projectStore.createProject();
    res.json({ id: p.id, createdAt: p.createdAt });
  });

  // 2) Upload one of the three input catalogs
  app.post(
    "/projects/:id/upload/:kind",
    upload.single("file"),
    validate(UploadParamsZ, (input, req, res) => {
      const { id, kind } = input.params;
      projectStore.getProject(id);

      if (!req.file) {
        res.status(400).json({ error: "Missing file" });
        return;
      }

      try {
        storeUpload(id, kind, req.file.buffer.toString("utf8"));
      } catch (err) {
        res.status(400).json({ error: errorMessage(err) });
        return;
      }

      res.json({ ok: true, kind });
    })
  );

  // 3) External tables → sources.yml text
  app.post(
    "/projects/:id/external-tables",
    validate(ProjectParamsZ, (input, _req, res) => {
      const project = projectStore.getProject(input.params.id);

      if (!project.sourceRows) {
        res.status(400).json({ error: "Upload sources first" });
        return;
      }

      const catalog = loadCatalog(project.schemaRows ?? [], project.sourceRows, project.mapping ?? {});
      const [file] = externalTableFiles(orchestrator, catalog);

      res.setHeader("Content-Type", "text/yaml; charset=utf-8");
      res.send(file.contents);
    })
  );

  // 4) Models → ZIP of every generated file
  app.post(
    "/projects/:id/models",
    validate(ProjectParamsZ, async (input, _req, res) => {
      const id = input.params.id;
      const project = projectStore.getProject(id);

      if (!project.sourceRows || project.mapping === undefined) {
        res.status(400).json({ error: "Upload sources and mapping first" });
        return;
      }

      const catalog = loadCatalog(project.schemaRows ?? [], project.sourceRows, project.mapping);

      // Client went away before the run finished: stop calling the generation service.
      const controller = new AbortController();
      const onClose = () => {
        if (!res.writableEnded) controller.abort();
      };
      res.once("close", onClose);

      const run = await modelFiles(orchestrator, catalog, controller.signal);
      res.removeListener("close", onClose);

      projectStore.setLastRun(id, buildRunReport(run.outcomes));
      const files = [...externalTableFiles(orchestrator, catalog), ...run.files];

      logger.info(`Models generated for project ${id}: ${run.outcomes.length} model(s)`);
      await sendZip(res, `dbt-project-${id}.zip`, files);
    })
  );

  // 5) Report of the last models run
  app.get(
    "/projects/:id/report",
    validate(ProjectParamsZ, (input, _req, res) => {
      const project = projectStore.getProject(input.params.id);

      if (!project.lastRun) {
        res.status(404).json({ error: "No models run yet" });
        return;
      }

      res.json(project.lastRun);
    })
  );
}
