import { scopedLogger } from "../logger";

export type FlowState = "preparing" | "in_module" | "evaluating" | "resetting";

export type FlowEvent =
  | "caseReady"
  | "enterModule"
  | "evaluationComplete"
  | "resetStarted"
  | "resetFinished"
  | "redirected";

const ALL_STATES: FlowState[] = ["preparing", "in_module", "evaluating", "resetting"];

const TRANSITIONS: Record<FlowEvent, { from: FlowState[]; to: FlowState }> = {
  caseReady: { from: ["preparing"], to: "in_module" },
  enterModule: { from: ["in_module", "evaluating"], to: "in_module" },
  evaluationComplete: { from: ["in_module"], to: "evaluating" },
  resetStarted: { from: ["in_module", "evaluating"], to: "resetting" },
  resetFinished: { from: ["resetting"], to: "preparing" },
  redirected: { from: ALL_STATES, to: "preparing" },
};

const logger = scopedLogger("caseFlow");

/** Lifecycle of the case a learner is working on. One instance per session. */
export class CaseFlow {
  private state: FlowState = "preparing";

  constructor(private readonly sessionId = "") {}

  getState(): FlowState {
    return this.state;
  }

  can(event: FlowEvent): boolean {
    return TRANSITIONS[event].from.includes(this.state);
  }

  /** Apply `event`; rejected transitions leave the state unchanged. */
  send(event: FlowEvent): boolean {
    if (!this.can(event)) {
      logger.warn("Rejected transition", { sessionId: this.sessionId, state: this.state, event });
      return false;
    }
    this.state = TRANSITIONS[event].to;
    return true;
  }
}
