import type { RetrievalMode } from "../config";

export type RetrievalTrigger = "mode" | "override" | "error";

export type StatusEntry = {
  atMs: number;
  scenario: string | null;
  kind: "fetched" | "reused" | "skipped" | "admin";
  mode?: RetrievalMode;
  trigger?: RetrievalTrigger;
  reason?: string;
  detail?: string;
};

/** Recent retrieval outcomes and admin notices, newest last. */
export class StatusBoard {
  private entries: StatusEntry[] = [];

  constructor(private readonly capacity = 50) {}

  record(entry: Omit<StatusEntry, "atMs">): StatusEntry {
    const stamped: StatusEntry = { atMs: Date.now(), ...entry };
    this.entries.push(stamped);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
    return stamped;
  }

  /** Admin-only notice (e.g. a pin that was cleared); never shown to learners. */
  notice(detail: string, scenario: string | null = null): StatusEntry {
    return this.record({ scenario, kind: "admin", detail });
  }

  getRecent(limit = 20): StatusEntry[] {
    return this.entries.slice(-limit);
  }

  latest(): StatusEntry | null {
    return this.entries[this.entries.length - 1] ?? null;
  }
}
