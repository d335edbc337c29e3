/**
 * Front-end routes: `/` redirects to the static page, `/static/*` serves it.
 */

import express, { Router } from "express";

export const INDEX_PATH = "/static/index.html";

export function createRootRoutes(staticDir: string): Router {
  const router = Router({ caseSensitive: true, strict: true });

  // Temporary redirect: the method is kept.
  router.get("/", (_req, res) => {
    res.redirect(307, INDEX_PATH);
  });

  router.use("/static", express.static(staticDir));

  return router;
}
