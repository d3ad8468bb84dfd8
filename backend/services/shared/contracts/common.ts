// backend/services/shared/contracts/common.ts
import { z, type ZodError } from "zod";
import type { Request, Response } from "express";

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  // app-specific extras (optional)
  code: z.string().optional(),
  issues: z
    .array(z.object({ path: z.string(), code: z.string(), message: z.string() }))
    .optional(),
});

export type Problem = z.infer<typeof zProblem>;

/** 400 Problem+JSON for a failed zod parse. */
export function zodBadRequest(req: Request, res: Response, error: ZodError) {
  const issues = error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
  const body: Problem = {
    type: "about:blank",
    title: "Bad Request",
    status: 400,
    code: "BAD_REQUEST",
    detail: "Validation failed",
    instance: typeof req.id === "string" ? req.id : undefined,
    issues,
  };
  res.status(400).type("application/problem+json").json(body);
}
