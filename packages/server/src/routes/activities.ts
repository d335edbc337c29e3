/**
 * Activity routes: listing and signup management.
 *
 * Handlers validate the query with zod, call the injected registry and
 * translate its result into a JSON response.
 */

import { Router } from "express";
import type { Response } from "express";
import { z } from "zod";
import type { ErrorBody, MessageBody, ValidationIssue } from "@mergington/schema";
import type { ActivityRegistry, RegistryErrorKind, RegistryResult } from "../state/registry.js";

/** HTTP status per registry failure. */
export const ERROR_STATUS: Readonly<Record<RegistryErrorKind, number>> = {
  activity_not_found: 404,
  already_registered: 400,
  not_registered: 404,
};

/** A repeated `?email=` keeps its last value. */
function lastValue(value: unknown): unknown {
  return Array.isArray(value) ? value[value.length - 1] : value;
}

const signupQuerySchema = z.object({
  email: z.preprocess(
    lastValue,
    z.string({
      required_error: "Field required",
      invalid_type_error: "Expected a string",
    }),
  ),
});

/** Turn zod issues into `{ loc, msg }` entries rooted at the query string. */
function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    loc: ["query", ...issue.path.map(String)],
    msg: issue.message,
  }));
}

/**
 * Parse `?email=` or answer 422 and return undefined.
 * Any string is accepted, including the empty string.
 */
function readEmail(query: unknown, res: Response<ErrorBody>): string | undefined {
  const parsed = signupQuerySchema.safeParse(query);
  if (!parsed.success) {
    res.status(422).json({ detail: toValidationIssues(parsed.error) });
    return undefined;
  }
  return parsed.data.email;
}

function sendResult(res: Response<MessageBody | ErrorBody>, result: RegistryResult): void {
  if (result.ok) {
    res.json({ message: result.message });
    return;
  }
  res.status(ERROR_STATUS[result.error.kind]).json({ detail: result.error.detail });
}

export function createActivityRoutes(registry: ActivityRegistry): Router {
  const router = Router({ caseSensitive: true, strict: true });

  // -----------------------------------------------------------------------
  // GET /activities: every activity keyed by name
  // -----------------------------------------------------------------------
  router.get("/activities", (_req, res) => {
    res.json(registry.listActivities());
  });

  // -----------------------------------------------------------------------
  // POST /activities/:activityName/signup?email=
  // -----------------------------------------------------------------------
  router.post("/activities/:activityName/signup", (req, res) => {
    const email = readEmail(req.query, res);
    if (email === undefined) return;
    // Express has already percent-decoded the path segment.
    sendResult(res, registry.signup(req.params.activityName, email));
  });

  // -----------------------------------------------------------------------
  // DELETE /activities/:activityName/signup?email=
  // -----------------------------------------------------------------------
  router.delete("/activities/:activityName/signup", (req, res) => {
    const email = readEmail(req.query, res);
    if (email === undefined) return;
    sendResult(res, registry.unregister(req.params.activityName, email));
  });

  return router;
}
