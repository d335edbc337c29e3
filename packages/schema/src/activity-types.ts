/**
 * Activity signup wire types.
 *
 * These mirror `activities.schema.json`. The schema is the source of truth
 * for the `GET /activities` payload; keep both in sync.
 */

// ---------------------------------------------------------------------------
// Activities
// ---------------------------------------------------------------------------

/** Email address identifying a signed-up participant. Compared verbatim. */
export type ParticipantEmail = string;

/**
 * An extracurricular activity as served by `GET /activities`.
 *
 * The activity name is not part of the record: it is the key under which
 * the record sits in an {@link ActivityMap}.
 */
export interface Activity {
  /** Free-form description shown on the activity card. */
  readonly description: string;
  /** Human-readable meeting times, e.g. "Fridays, 3:30 PM - 5:00 PM". */
  readonly schedule: string;
  /** Advertised capacity. Informational: signup does not check it. */
  readonly max_participants: number;
  /** Signed-up emails in signup order, without duplicates. */
  readonly participants: readonly ParticipantEmail[];
}

/** All activities keyed by their exact, case-sensitive name. */
export type ActivityMap = Readonly<Record<string, Activity>>;

// ---------------------------------------------------------------------------
// Response bodies
// ---------------------------------------------------------------------------

/** Body of a successful signup or unregister. */
export interface MessageBody {
  readonly message: string;
}

/** One entry of a request validation failure. */
export interface ValidationIssue {
  /** Where the bad value sits, e.g. `["query", "email"]`. */
  readonly loc: readonly string[];
  readonly msg: string;
}

/**
 * Body of every error response.
 *
 * Domain failures carry a string; request validation failures carry the
 * list of offending fields.
 */
export interface ErrorBody {
  readonly detail: string | readonly ValidationIssue[];
}
