/**
 * Learner Flow Handler
 * Page entry, case preparation, module artifacts, evaluation and reset.
 */

import { enterPage, type Page } from "../flow/accessGuard";
import type { CasePreparation } from "../flow/casePreparation";
import { MESSAGES } from "../flow/messages";
import { buildProtocol } from "../flow/protocol";
import type { ResetController } from "../flow/resetController";
import type { Artifact, DebugSnapshot } from "../messageTypes";
import type { SessionKey } from "../session/sessionState";
import type { HandlerContext } from "./context";

const log = (...args: unknown[]) => console.log("[learner-flow]", ...args);

export interface LearnerFlowDeps {
  preparation: Pick<CasePreparation, "prepare">;
  reset: Pick<ResetController, "startNewScenario">;
  debugSnapshots: boolean;
}

export interface LearnerFlowHandlers {
  handleNavigate: (ctx: HandlerContext, page: Page) => void;
  handlePrepareCase: (ctx: HandlerContext) => Promise<void>;
  handleRecordArtifact: (ctx: HandlerContext, artifact: Artifact) => void;
  handleCompleteEvaluation: (ctx: HandlerContext) => void;
  handleStartNewScenario: (ctx: HandlerContext) => Promise<void>;
  handleDownloadProtocol: (ctx: HandlerContext) => void;
  handleDebugSnapshot: (ctx: HandlerContext) => void;
}

export function protocolFilename(scenarioName: string): string {
  const slug = scenarioName
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `fallprotokoll_${slug || "fall"}.txt`;
}

/** Store an artifact; returns the key it was written under. */
function applyArtifact(ctx: HandlerContext, artifact: Artifact): SessionKey {
  const { store } = ctx;
  switch (artifact.kind) {
    case "message":
      store.set("messages", [...store.get("messages", []), { role: artifact.role, content: artifact.content }]);
      return "messages";
    case "diagnosticRound": {
      const rounds = store.get("diagnosticRounds", []);
      store.set("diagnosticRounds", [
        ...rounds,
        { round: rounds.length + 1, request: artifact.request, findings: artifact.findings ?? null },
      ]);
      return "diagnosticRounds";
    }
    case "physicalExam":
    case "differentials":
    case "finalDiagnosis":
    case "therapy":
    case "feedback":
      store.set(artifact.kind, artifact.text);
      return artifact.kind;
    case "instructionsConfirmed":
      store.set("instructionsConfirmed", true);
      return "instructionsConfirmed";
    case "offlineMode":
      store.set("offlineMode", artifact.enabled);
      return "offlineMode";
  }
}

/**
 * Factory function to create learner flow handlers with injected dependencies
 */
export function createLearnerFlowHandler(deps: LearnerFlowDeps): LearnerFlowHandlers {
  const { preparation, reset, debugSnapshots } = deps;

  function handleNavigate(ctx: HandlerContext, page: Page) {
    const result = enterPage(page, ctx.store, ctx.flow);
    switch (result.kind) {
      case "entry":
        ctx.reply({ type: "entry", warning: result.warning });
        return;
      case "page":
        ctx.reply({ type: "page", page: result.page });
        return;
      case "redirect":
        log("Redirected to entry", ctx.sessionId, { requested: page });
        ctx.reply({ type: "redirect", page: result.page, message: result.message });
        return;
    }
  }

  async function handlePrepareCase(ctx: HandlerContext) {
    const result = await preparation.prepare(ctx.sessionId, ctx.store, ctx.flow);
    if (result.kind === "blocked") {
      ctx.reply({ type: "case_blocked", reason: result.reason, message: result.message });
      return;
    }
    ctx.reply({ type: "case_ready", scenario: result.scenario, patient: result.patient, resumed: result.resumed });
    if (!result.resumed) {
      ctx.broadcastOthers({ type: "case_updated", keys: ctx.store.keys() });
    }
  }

  function handleRecordArtifact(ctx: HandlerContext, artifact: Artifact) {
    const sessionScoped = artifact.kind === "offlineMode" || artifact.kind === "instructionsConfirmed";
    if (!sessionScoped && !ctx.store.has("activeScenario")) {
      ctx.reply({ type: "error", message: MESSAGES.caseNotLoaded });
      return;
    }
    const key = applyArtifact(ctx, artifact);
    ctx.reply({ type: "case_updated", keys: [key] });
    ctx.broadcastOthers({ type: "case_updated", keys: [key] });
  }

  function handleCompleteEvaluation(ctx: HandlerContext) {
    if (!ctx.store.has("activeScenario") || !ctx.store.get("feedback", "").trim()) {
      ctx.reply({ type: "error", message: MESSAGES.feedbackMissing });
      return;
    }
    ctx.store.set("evaluationDone", true);
    if (ctx.flow.can("evaluationComplete")) ctx.flow.send("evaluationComplete");
    ctx.reply({ type: "case_updated", keys: ["evaluationDone"] });
    ctx.broadcastOthers({ type: "case_updated", keys: ["evaluationDone"] });
  }

  async function handleStartNewScenario(ctx: HandlerContext) {
    if (!ctx.store.get("evaluationDone", false)) {
      ctx.reply({ type: "error", message: MESSAGES.resetNotAvailable });
      return;
    }
    const result = await reset.startNewScenario(ctx.sessionId, ctx.store, ctx.flow);
    const message = { type: "reset_done" as const, page: result.page, warning: result.warning };
    ctx.reply(message);
    ctx.broadcastOthers(message);
  }

  function handleDownloadProtocol(ctx: HandlerContext) {
    const text = buildProtocol(ctx.store);
    const scenario = ctx.store.get("activeScenario");
    if (text === null || !scenario) {
      ctx.reply({ type: "error", message: MESSAGES.protocolNotReady });
      return;
    }
    ctx.reply({ type: "protocol", filename: protocolFilename(scenario.name), text });
  }

  function handleDebugSnapshot(ctx: HandlerContext) {
    if (!debugSnapshots) {
      ctx.reply({ type: "error", message: "Debug snapshots are disabled" });
      return;
    }
    const { store } = ctx;
    const snapshot: DebugSnapshot = {
      sessionId: ctx.sessionId,
      flowState: ctx.flow.getState(),
      keys: store.keys(),
      scenario: store.get("activeScenario")?.name ?? null,
      messageCount: store.get("messages", []).length,
      diagnosticRoundCount: store.get("diagnosticRounds", []).length,
      hasFeedback: store.get("feedback", "").trim().length > 0,
      evaluationDone: store.get("evaluationDone", false),
      pendingWarning: store.has("pendingWarning"),
      sockets: ctx.socketCount,
    };
    ctx.reply({ type: "debug_snapshot", snapshot });
  }

  return {
    handleNavigate,
    handlePrepareCase,
    handleRecordArtifact,
    handleCompleteEvaluation,
    handleStartNewScenario,
    handleDownloadProtocol,
    handleDebugSnapshot,
  };
}
