/**
 * Retrieval Policy Engine
 *
 * Decides per case preparation whether a scenario's reference text is
 * fetched again or the stored value is reused. Failures never surface to the
 * learner: the stored value stays and the outcome lands on the status board.
 */

import type { RetrievalMode } from "../config";
import { describeError, isGatewayError } from "../errors";
import { logEvent, scopedLogger } from "../logger";
import type { ScenarioRepository } from "../persistence/types";
import type { ReferenceFetcher } from "./referenceFetcher";
import type { RetrievalTrigger, StatusBoard } from "./statusBoard";

export type SkipReason = "fetch_error" | "persistence_error";

export type RetrievalOutcome =
  | { kind: "fetched"; text: string }
  | { kind: "reused"; text: string | null }
  | { kind: "skipped"; reason: SkipReason; text: string | null };

export type RetrievalTarget = {
  id: string;
  name: string;
  age: number | null;
  referenceText: string | null;
};

export interface RetrievalPolicyDeps {
  fetcher: ReferenceFetcher;
  repository: Pick<ScenarioRepository, "setReferenceText">;
  board: StatusBoard;
  random?: () => number;
}

const logger = scopedLogger("retrieval");

export class RetrievalPolicyEngine {
  private readonly random: () => number;

  constructor(private readonly deps: RetrievalPolicyDeps) {
    this.random = deps.random ?? Math.random;
  }

  shouldFetch(mode: RetrievalMode, existing: string | null, probability: number): boolean {
    switch (mode) {
      case "always-refresh":
        return true;
      case "if-empty":
        return !existing || existing.trim().length === 0;
      case "probabilistic":
        return this.random() < probability;
    }
  }

  /**
   * @param source "override" when the mode came from the admin pin
   */
  async resolve(
    scenario: RetrievalTarget,
    mode: RetrievalMode,
    probability: number,
    source: Exclude<RetrievalTrigger, "error"> = "mode"
  ): Promise<RetrievalOutcome> {
    const existing = scenario.referenceText;
    const base = { scenario: scenario.name, mode };

    if (!this.shouldFetch(mode, existing, probability)) {
      this.deps.board.record({ ...base, kind: "reused", trigger: source });
      return { kind: "reused", text: existing };
    }

    let text: string;
    try {
      text = await this.deps.fetcher.fetch({ name: scenario.name, age: scenario.age });
    } catch (err) {
      return this.skip("fetch_error", scenario, mode, err);
    }

    try {
      await this.deps.repository.setReferenceText(scenario.id, text);
    } catch (err) {
      return this.skip("persistence_error", scenario, mode, err);
    }

    this.deps.board.record({ ...base, kind: "fetched", trigger: source });
    logEvent("retrieval.fetched", { scenario: scenario.name, mode, chars: text.length });
    return { kind: "fetched", text };
  }

  private skip(reason: SkipReason, scenario: RetrievalTarget, mode: RetrievalMode, err: unknown): RetrievalOutcome {
    const detail = describeError(err);
    logger.warn(`Reference ${reason}; keeping stored text`, scenario.name, detail);
    if (!isGatewayError(err)) logger.error(err);
    this.deps.board.record({ scenario: scenario.name, mode, kind: "skipped", trigger: "error", reason, detail });
    return { kind: "skipped", reason, text: scenario.referenceText };
  }
}
