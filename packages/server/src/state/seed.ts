/**
 * Startup seed: reads the activity list from a JSON file.
 *
 * The file is an object keyed by activity name. Each entry is validated
 * with zod; any problem aborts startup with a message naming the entry.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { ActivityMap } from "@mergington/schema";

const activitySchema = z.object({
  description: z.string(),
  schedule: z.string(),
  max_participants: z.number().int().positive(),
  participants: z
    .array(z.string())
    .refine((list) => new Set(list).size === list.length, {
      message: "participants must not contain duplicates",
    }),
});

/** Seed file shape: activity name → activity. */
export const seedSchema = z.record(z.string().min(1), activitySchema);

/** Format a zod error as `<path>: <message>` lines. */
function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Validate already-parsed seed data. Throws on invalid input. */
export function parseSeed(data: unknown): ActivityMap {
  const result = seedSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid activity seed: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Read and validate the seed file at `path`. */
export async function loadSeed(path: string): Promise<ActivityMap> {
  const raw = await readFile(path, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error: unknown) {
    throw new Error(
      `Seed file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseSeed(data);
}
