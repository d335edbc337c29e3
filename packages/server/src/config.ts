/**
 * Server configuration from command-line flags and environment variables.
 *
 * Supports:
 *   npm start
 *   npm start -- --port 8080 --host 0.0.0.0
 *   npm start -- --seed ./my-activities.json --static ./public
 *
 * Flags win over environment variables, which win over defaults.
 */

import { fileURLToPath } from "node:url";

/** Parsed configuration for a server process. */
export interface ServerConfig {
  /** TCP port to listen on. */
  port: number;
  /** Interface to bind. */
  host: string;
  /** Path of the JSON activity seed. */
  seedPath: string;
  /** Directory served under `/static`. */
  staticDir: string;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = "127.0.0.1";

/** Seed shipped with the package. */
export const DEFAULT_SEED_PATH = fileURLToPath(new URL("../data/activities.json", import.meta.url));

/** Front end shipped with the package. */
export const DEFAULT_STATIC_DIR = fileURLToPath(new URL("../static/", import.meta.url));

type Env = Readonly<Record<string, string | undefined>>;

/** Parse a TCP port, or undefined when the value is not a usable port. */
function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  const port = parseInt(value, 10);
  return port > 0 && port < 65536 ? port : undefined;
}

/**
 * Parses process.argv and the environment into a ServerConfig.
 *
 * @param argv - The full process.argv array
 * @param env - Environment variables, usually process.env
 */
export function parseConfig(argv: readonly string[], env: Env = process.env): ServerConfig {
  const args = argv.slice(2); // skip node + script

  let port: string | undefined;
  let host: string | undefined;
  let seedPath: string | undefined;
  let staticDir: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (next === undefined || next.startsWith("--")) continue;

    if (arg === "--port") {
      port = next;
      i++;
    } else if (arg === "--host") {
      host = next;
      i++;
    } else if (arg === "--seed") {
      seedPath = next;
      i++;
    } else if (arg === "--static") {
      staticDir = next;
      i++;
    }
  }

  return {
    port: parsePort(port) ?? parsePort(env["MERGINGTON_PORT"]) ?? DEFAULT_PORT,
    host: host ?? env["MERGINGTON_HOST"] ?? DEFAULT_HOST,
    seedPath: seedPath ?? env["MERGINGTON_SEED"] ?? DEFAULT_SEED_PATH,
    staticDir: staticDir ?? env["MERGINGTON_STATIC_DIR"] ?? DEFAULT_STATIC_DIR,
  };
}
