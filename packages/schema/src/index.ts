/**
 * @mergington/schema: wire types and JSON Schema for the activity signup API.
 *
 * Shared contract between the server, its tests and any client.
 * `activities.schema.json` is the source of truth; the types follow it.
 */

export type {
  Activity,
  ActivityMap,
  ParticipantEmail,
  MessageBody,
  ValidationIssue,
  ErrorBody,
} from "./activity-types.js";
