/**
 * Mergington activity server entry point.
 *
 * Usage:
 *   npm start                              → http://127.0.0.1:8000
 *   npm start -- --port 8080               → custom port
 *   MERGINGTON_SEED=./seed.json npm start
 *
 * See config.ts for every flag and environment variable.
 */

import { createApp } from "./app.js";
import { parseConfig } from "./config.js";
import { ActivityRegistry } from "./state/registry.js";
import { loadSeed } from "./state/seed.js";

async function main(): Promise<void> {
  const config = parseConfig(process.argv);
  const seed = await loadSeed(config.seedPath);
  const registry = new ActivityRegistry(seed);

  registry.subscribe((change) => {
    const arrow = change.type === "signup" ? "→" : "←";
    process.stderr.write(
      `[mergington] ${change.type} ${change.email} ${arrow} ${change.activity} (v${change.version})\n`,
    );
  });

  const app = createApp({ registry, staticDir: config.staticDir });

  const httpServer = app.listen(config.port, config.host, () => {
    const base = `http://${config.host}:${config.port}`;
    process.stderr.write(`[mergington] Server started on ${base}\n`);
    process.stderr.write(`[mergington]   Activities: ${registry.size} loaded from ${config.seedPath}\n`);
    process.stderr.write(`[mergington]   Front end:  ${base}/static/index.html\n`);
  });

  httpServer.on("error", (error: Error) => {
    process.stderr.write(`[mergington] Fatal error: ${error.message}\n`);
    process.exit(1);
  });

  const shutdown = (): void => {
    httpServer.close(() => {
      process.exit(0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  process.stderr.write(
    `[mergington] Fatal error: ${error instanceof Error ? error.message : String(error)}\n`,
  );
  process.exit(1);
});
