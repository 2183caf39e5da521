/**
 * Scenario rotation shared by every learner session.
 *
 * Draws exclude scenarios already played in the current cycle; once every
 * available scenario has been played, the next draw starts a fresh cycle.
 * All reads and writes of the played set go through one keyed lock entry.
 */

import { EmptyPoolError } from "../errors";
import { KeyedLock } from "../keyedLock";
import { scopedLogger } from "../logger";
import type { PlayedSetStore } from "./playedSetStore";

const LOCK_KEY = "rotation";
const logger = scopedLogger("rotation");

export type PoolSnapshot = {
  available: string[];
  played: string[];
};

export class ScenarioPool {
  private all: string[] = [];

  constructor(
    private readonly store: PlayedSetStore,
    private readonly lock: KeyedLock,
    private readonly random: () => number = Math.random
  ) {}

  /** Replace the available ids; played ids that disappeared are pruned. */
  async setAvailable(ids: readonly string[]): Promise<void> {
    const next = [...new Set(ids.map((id) => id.trim()).filter((id) => id.length > 0))];
    await this.lock.run(LOCK_KEY, "setAvailable", async () => {
      const allowed = new Set(next);
      await this.store.update((played) => {
        const pruned = new Set([...played].filter((id) => allowed.has(id)));
        return { next: pruned, result: undefined };
      });
      this.all = next;
    });
  }

  /**
   * Pick the next scenario id.
   * A non-empty pin is returned as is and leaves the rotation untouched.
   *
   * @throws EmptyPoolError when no ids are available
   */
  async drawNext(pinnedId?: string | null): Promise<string> {
    const pin = pinnedId?.trim();
    if (pin) {
      logger.log("Pinned scenario bypasses rotation", pin);
      return pin;
    }

    return this.lock.run(LOCK_KEY, "drawNext", async () => {
      const all = this.all;
      if (all.length === 0) throw new EmptyPoolError();

      return this.store.update((played) => {
        let candidates = all.filter((id) => !played.has(id));
        let next = new Set([...played].filter((id) => all.includes(id)));
        if (candidates.length === 0) {
          logger.log("Rotation cycle complete, starting over", { size: all.length });
          next = new Set();
          candidates = all;
        }
        const index = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
        return { next, result: candidates[index] };
      });
    });
  }

  /** Idempotent; ids outside the available set are ignored. */
  async markPlayed(id: string): Promise<void> {
    await this.lock.run(LOCK_KEY, "markPlayed", async () => {
      if (!this.all.includes(id)) {
        logger.warn("Ignoring markPlayed for unknown scenario", id);
        return;
      }
      await this.store.update((played) => {
        const next = new Set(played);
        next.add(id);
        return { next, result: undefined };
      });
    });
  }

  async snapshot(): Promise<PoolSnapshot> {
    const played = await this.store.load();
    return { available: [...this.all], played: played.filter((id) => this.all.includes(id)).sort() };
  }

  get storeKind(): PlayedSetStore["kind"] {
    return this.store.kind;
  }
}
