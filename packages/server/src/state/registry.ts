/**
 * In-memory activity registry.
 *
 * Owns the activity map for the lifetime of the process. Routes receive an
 * instance by injection; there is no module-level registry. Activities are
 * fixed at construction; only participant lists change.
 *
 * Every method is synchronous. Handlers run on a single event loop, so a
 * signup or unregister completes before any other request sees the list.
 */

import type { Activity, ActivityMap } from "@mergington/schema";

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** Why a signup or unregister was rejected. */
export type RegistryErrorKind =
  | "activity_not_found"
  | "already_registered"
  | "not_registered";

/** A rejected operation, with the text sent back to the caller. */
export interface RegistryError {
  readonly kind: RegistryErrorKind;
  readonly detail: string;
}

/** Outcome of a signup or unregister. */
export type RegistryResult =
  | { readonly ok: true; readonly message: string }
  | { readonly ok: false; readonly error: RegistryError };

/** Detail strings per error kind. */
export const REGISTRY_ERROR_DETAILS: Readonly<Record<RegistryErrorKind, string>> = {
  activity_not_found: "Activity not found",
  already_registered: "Student is already signed up",
  not_registered: "Student is not registered for this activity",
};

function fail(kind: RegistryErrorKind): RegistryResult {
  return { ok: false, error: { kind, detail: REGISTRY_ERROR_DETAILS[kind] } };
}

// ---------------------------------------------------------------------------
// Change notifications
// ---------------------------------------------------------------------------

/** Emitted after every successful mutation. */
export interface RegistryChange {
  readonly type: "signup" | "unregister";
  readonly activity: string;
  readonly email: string;
  /** Registry version after the change. */
  readonly version: number;
}

export type RegistrySubscriber = (change: RegistryChange) => void;

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/** Mutable internal form of an activity. */
interface ActivityRecord {
  readonly description: string;
  readonly schedule: string;
  readonly max_participants: number;
  readonly participants: string[];
}

function toRecord(activity: Activity): ActivityRecord {
  return {
    description: activity.description,
    schedule: activity.schedule,
    max_participants: activity.max_participants,
    participants: [...activity.participants],
  };
}

function toActivity(record: ActivityRecord): Activity {
  return {
    description: record.description,
    schedule: record.schedule,
    max_participants: record.max_participants,
    participants: [...record.participants],
  };
}

export class ActivityRegistry {
  private readonly activities = new Map<string, ActivityRecord>();
  private readonly subscribers = new Set<RegistrySubscriber>();
  private _version = 0;

  /** The seed is copied; later mutations never touch it. */
  constructor(seed: ActivityMap) {
    for (const [name, activity] of Object.entries(seed)) {
      this.activities.set(name, toRecord(activity));
    }
  }

  /** Incremented on every successful signup or unregister. */
  get version(): number {
    return this._version;
  }

  /** Number of activities. */
  get size(): number {
    return this.activities.size;
  }

  /** Snapshot of every activity, in seed order. */
  listActivities(): ActivityMap {
    const out: Record<string, Activity> = {};
    for (const [name, record] of this.activities) {
      out[name] = toActivity(record);
    }
    return out;
  }

  /** Snapshot of one activity, or undefined when the name is unknown. */
  getActivity(name: string): Activity | undefined {
    const record = this.activities.get(name);
    return record ? toActivity(record) : undefined;
  }

  /**
   * Append `email` to the activity's participants.
   * `max_participants` is not checked.
   */
  signup(activityName: string, email: string): RegistryResult {
    const record = this.activities.get(activityName);
    if (!record) return fail("activity_not_found");
    if (record.participants.includes(email)) return fail("already_registered");

    record.participants.push(email);
    this.notify({ type: "signup", activity: activityName, email });
    return { ok: true, message: `Signed up ${email} for ${activityName}` };
  }

  /** Remove one occurrence of `email`, keeping the order of the rest. */
  unregister(activityName: string, email: string): RegistryResult {
    const record = this.activities.get(activityName);
    if (!record) return fail("activity_not_found");

    const index = record.participants.indexOf(email);
    if (index === -1) return fail("not_registered");

    record.participants.splice(index, 1);
    this.notify({ type: "unregister", activity: activityName, email });
    return { ok: true, message: `Removed ${email} from ${activityName}` };
  }

  /** Subscribe to successful mutations. Returns an unsubscribe function. */
  subscribe(fn: RegistrySubscriber): () => void {
    this.subscribers.add(fn);
    return () => { this.subscribers.delete(fn); };
  }

  private notify(change: Omit<RegistryChange, "version">): void {
    this._version++;
    const event: RegistryChange = { ...change, version: this._version };
    for (const fn of this.subscribers) {
      try {
        fn(event);
      } catch (error: unknown) {
        // Subscriber errors must not undo or block the mutation.
        process.stderr.write(
          `[mergington] Subscriber error: ${error instanceof Error ? error.message : String(error)}\n`,
        );
      }
    }
  }
}
