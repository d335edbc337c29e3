/**
 * Express application. Mounts all route modules.
 *
 * Provides:
 * - Activity listing and signup management (JSON)
 * - The static front end under /static
 *
 * The registry is passed in, so each server (and each test) owns its state.
 */

import express from "express";
import type { Request, Response, NextFunction } from "express";
import type { ErrorBody } from "@mergington/schema";
import { createActivityRoutes } from "./routes/activities.js";
import { createRootRoutes } from "./routes/root.js";
import { DEFAULT_STATIC_DIR } from "./config.js";
import type { ActivityRegistry } from "./state/registry.js";

export { ActivityRegistry } from "./state/registry.js";
export type {
  RegistryChange,
  RegistryError,
  RegistryErrorKind,
  RegistryResult,
  RegistrySubscriber,
} from "./state/registry.js";
export { loadSeed, parseSeed } from "./state/seed.js";
export { parseConfig } from "./config.js";
export type { ServerConfig } from "./config.js";

/** Options for {@link createApp}. */
export interface AppOptions {
  /** Activity state served and mutated by the routes. */
  readonly registry: ActivityRegistry;
  /** Directory served under /static. Defaults to the bundled front end. */
  readonly staticDir?: string;
}

/** Simple CORS middleware. Allows all origins. */
function corsMiddleware(req: Request, res: Response, next: NextFunction): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
  res.setHeader("Access-Control-Max-Age", "86400");

  if (req.method === "OPTIONS") {
    res.status(204).end();
    return;
  }
  next();
}

/** Status carried by errors that body-parser, static or the router raise. */
function statusOf(error: unknown): number {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 600
  ) {
    return error.status;
  }
  return 500;
}

/**
 * Unmatched paths with a trailing slash redirect (307) to the same path
 * without it, query string kept. Routes themselves match exactly.
 */
function redirectTrailingSlash(req: Request, res: Response, next: NextFunction): void {
  if (req.path.length > 1 && req.path.endsWith("/")) {
    const queryStart = req.originalUrl.indexOf("?");
    const query = queryStart === -1 ? "" : req.originalUrl.slice(queryStart);
    const path = req.originalUrl.slice(0, queryStart === -1 ? undefined : queryStart);
    res.redirect(307, (path.replace(/\/+$/, "") || "/") + query);
    return;
  }
  next();
}

function notFound(_req: Request, res: Response<ErrorBody>): void {
  res.status(404).json({ detail: "Not Found" });
}

function errorHandler(
  error: unknown,
  req: Request,
  res: Response<ErrorBody>,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  const status = statusOf(error);
  if (status >= 500) {
    process.stderr.write(
      `[mergington] ${req.method} ${req.originalUrl} failed: ${error instanceof Error ? error.message : String(error)}\n`,
    );
    res.status(status).json({ detail: "Internal Server Error" });
    return;
  }
  res.status(status).json({ detail: error instanceof Error ? error.message : "Bad Request" });
}

/** Create the Express app with all routes mounted. */
export function createApp(options: AppOptions): express.Express {
  const app = express();

  app.disable("x-powered-by");
  app.set("case sensitive routing", true);
  app.set("strict routing", true);

  // Global middleware
  app.use(corsMiddleware);

  // Mount all route modules
  app.use(createRootRoutes(options.staticDir ?? DEFAULT_STATIC_DIR));
  app.use(createActivityRoutes(options.registry));

  app.use(redirectTrailingSlash);
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
