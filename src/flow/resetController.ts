import { describeError } from "../errors";
import { logError, logEvent } from "../logger";
import type { ScenarioPool } from "../rotation/scenarioPool";
import type { SessionStore } from "../session/sessionStore";
import { ENTRY_PAGE, type Page } from "./accessGuard";
import type { CaseFlow } from "./caseFlow";
import { MESSAGES } from "./messages";

export type ResetResult = {
  page: Page;
  markedScenario: string | null;
  warning: string | null;
};

/**
 * Ends the current case: mark it played, clear case state, return to the
 * entry page. Marking is best effort; the learner always gets a clean session.
 */
export class ResetController {
  constructor(private readonly pool: Pick<ScenarioPool, "markPlayed">) {}

  async startNewScenario(sessionId: string, store: SessionStore, flow: CaseFlow): Promise<ResetResult> {
    flow.send("resetStarted");

    const scenario = store.get("activeScenario")?.name ?? null;
    let warning: string | null = null;
    let markedScenario: string | null = null;

    if (scenario) {
      try {
        await this.pool.markPlayed(scenario);
        markedScenario = scenario;
      } catch (err) {
        logError("[reset] markPlayed failed; continuing reset", sessionId, describeError(err));
        warning = MESSAGES.resetMarkFailed;
      }
    }

    store.clearCaseKeys();
    flow.send("resetFinished");
    logEvent("case.reset", { sessionId, scenario, marked: markedScenario !== null });
    return { page: ENTRY_PAGE, markedScenario, warning };
  }
}
