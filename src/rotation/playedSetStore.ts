import { z } from "zod";
import { getFirestore, serverTimestamp, type FirestoreInstance } from "../persistence/firestore";
import { withPersistence } from "../persistence/scenarioRepository";

/**
 * Storage for the ids drawn in the current rotation cycle.
 *
 * `update` is the only write path: it hands the current set to `fn` and
 * stores whatever `fn` returns, so a store can make the pair atomic.
 */
export interface PlayedSetStore {
  readonly kind: "memory" | "firestore";
  load(): Promise<string[]>;
  update<T>(fn: (played: ReadonlySet<string>) => { next: Set<string>; result: T }): Promise<T>;
}

/** Process-lifetime store; a restart begins a fresh cycle. */
export class InMemoryPlayedSetStore implements PlayedSetStore {
  readonly kind = "memory" as const;
  private played = new Set<string>();

  async load(): Promise<string[]> {
    return [...this.played];
  }

  async update<T>(fn: (played: ReadonlySet<string>) => { next: Set<string>; result: T }): Promise<T> {
    const { next, result } = fn(new Set(this.played));
    this.played = new Set(next);
    return result;
  }
}

const playedDocSchema = z.object({ ids: z.array(z.string()).catch([]) }).passthrough();

function readIds(raw: unknown): string[] {
  const parsed = playedDocSchema.safeParse(raw ?? {});
  return parsed.success ? parsed.data.ids : [];
}

/**
 * Firestore-backed store (`rotation/playedSet`). Each update runs in a
 * transaction, so gateways sharing the project resume one rotation cycle and
 * concurrent marks are retried by Firestore instead of lost.
 */
export class FirestorePlayedSetStore implements PlayedSetStore {
  readonly kind = "firestore" as const;

  constructor(private readonly resolveDb: () => FirestoreInstance | null = getFirestore) {}

  async load(): Promise<string[]> {
    return withPersistence("rotation.load", this.resolveDb, async (db) => {
      const snap = await db.collection("rotation").doc("playedSet").get();
      return readIds(snap.data());
    });
  }

  async update<T>(fn: (played: ReadonlySet<string>) => { next: Set<string>; result: T }): Promise<T> {
    return withPersistence("rotation.update", this.resolveDb, async (db) => {
      const ref = db.collection("rotation").doc("playedSet");
      return db.runTransaction(async (tx) => {
        const snap = await tx.get(ref);
        const { next, result } = fn(new Set(readIds(snap.data())));
        tx.set(ref, { ids: [...next].sort(), updated_at: serverTimestamp() });
        return result;
      });
    });
  }
}
