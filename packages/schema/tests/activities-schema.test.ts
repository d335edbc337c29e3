/**
 * Tests for activities.schema.json.
 *
 * Uses ajv to check that GET /activities payloads pass and malformed ones
 * are rejected.
 */

import { describe, it, expect, beforeAll } from "vitest";
import { Ajv2020 } from "ajv/dist/2020.js";
import type { ValidateFunction } from "ajv/dist/2020.js";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { ActivityMap } from "../src/index.js";

let validate: ValidateFunction;

beforeAll(() => {
  const schemaPath = fileURLToPath(new URL("../src/activities.schema.json", import.meta.url));
  const schema = JSON.parse(readFileSync(schemaPath, "utf-8"));
  const ajv = new Ajv2020({ allErrors: true });
  validate = ajv.compile(schema);
});

const chess = {
  description: "Learn strategies and compete in chess tournaments",
  schedule: "Fridays, 3:30 PM - 5:00 PM",
  max_participants: 12,
  participants: ["michael@mergington.edu", "daniel@mergington.edu"],
};

describe("Valid activity maps", () => {
  it("accepts a typed ActivityMap", () => {
    const activities: ActivityMap = { "Chess Club": chess };
    expect(validate(activities)).toBe(true);
  });

  it("accepts an empty map", () => {
    expect(validate({})).toBe(true);
  });

  it("accepts an activity without participants", () => {
    expect(validate({ "Art Club": { ...chess, participants: [] } })).toBe(true);
  });
});

describe("Invalid activity maps", () => {
  it("rejects a missing field", () => {
    const { participants: _participants, ...rest } = chess;
    expect(validate({ "Chess Club": rest })).toBe(false);
    expect(validate.errors?.[0]?.keyword).toBe("required");
  });

  it("rejects unknown fields", () => {
    expect(validate({ "Chess Club": { ...chess, room: "B12" } })).toBe(false);
    expect(validate.errors?.[0]?.keyword).toBe("additionalProperties");
  });

  it("rejects duplicate participants", () => {
    const dup = { ...chess, participants: ["a@mergington.edu", "a@mergington.edu"] };
    expect(validate({ "Chess Club": dup })).toBe(false);
    expect(validate.errors?.[0]?.keyword).toBe("uniqueItems");
  });

  it("rejects a zero capacity", () => {
    expect(validate({ "Chess Club": { ...chess, max_participants: 0 } })).toBe(false);
    expect(validate.errors?.[0]?.instancePath).toBe("/Chess Club/max_participants");
  });

  it("rejects a fractional capacity", () => {
    expect(validate({ "Chess Club": { ...chess, max_participants: 1.5 } })).toBe(false);
    expect(validate.errors?.[0]?.keyword).toBe("type");
  });

  it("rejects an empty activity name", () => {
    expect(validate({ "": chess })).toBe(false);
  });

  it("rejects a list instead of a map", () => {
    expect(validate([chess])).toBe(false);
  });
});
