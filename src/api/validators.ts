import type { Request, RequestHandler, Response } from "express";
import type { z, ZodTypeAny } from "zod";

export type ValidatedHandler<T> = (input: T, req: Request, res: Response) => Promise<void> | void;

/**
 * Parses `{ body, query, params }` against the schema and hands the typed result to
 * the handler. Invalid requests get a 400 and never reach it.
 */
export function validate<S extends ZodTypeAny>(schema: S, handler: ValidatedHandler<z.infer<S>>): RequestHandler {
  return async (req, res) => {
    const parsed = schema.safeParse({
      body: req.body,
      query: req.query,
      params: req.params,
    });

    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid request",
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      return;
    }

    await handler(parsed.data, req, res);
  };
}
