/**
 * Case preparation for the entry page.
 *
 * Loads the scenario list, applies admin pins, draws a scenario from the
 * shared rotation, derives the simulated patient and runs the reference
 * retrieval policy. Failures that keep a case from starting are returned as
 * blocking learner messages; admin-only problems go to the status board.
 */

import type { RetrievalMode } from "../config";
import { EmptyPoolError, describeError, isGatewayError } from "../errors";
import { logEvent, scopedLogger } from "../logger";
import {
  EMPTY_ADMIN_SETTINGS,
  type AdminSettings,
  type AdminSettingsPatch,
  type AdminSettingsRepository,
  type Scenario,
  type ScenarioRepository,
} from "../persistence/types";
import type { RetrievalOutcome, RetrievalPolicyEngine } from "../retrieval/retrievalPolicy";
import type { StatusBoard } from "../retrieval/statusBoard";
import type { ScenarioPool } from "../rotation/scenarioPool";
import type { PatientProfile, ScenarioSnapshot } from "../session/sessionState";
import type { SessionStore } from "../session/sessionStore";
import type { CaseFlow } from "./caseFlow";
import { MESSAGES } from "./messages";
import { derivePatient, type RandomSource } from "./patientProfile";

const logger = scopedLogger("preparation");

export type PreparationResult =
  | {
      kind: "ready";
      scenario: ScenarioSnapshot;
      patient: PatientProfile;
      retrieval: RetrievalOutcome | null;
      resumed: boolean;
    }
  | { kind: "blocked"; reason: "empty_pool" | "persistence_unavailable"; message: string };

export interface CasePreparationDeps {
  scenarios: ScenarioRepository;
  settings: AdminSettingsRepository;
  pool: Pick<ScenarioPool, "setAvailable" | "drawNext">;
  retrieval: Pick<RetrievalPolicyEngine, "resolve">;
  board: StatusBoard;
  retrievalDefaults: { mode: RetrievalMode; probability: number };
  random?: RandomSource;
}

export function toSnapshot(scenario: Scenario): ScenarioSnapshot {
  return {
    id: scenario.id,
    name: scenario.name,
    description: scenario.description,
    physicalExam: scenario.physicalExam,
    specialNote: scenario.specialNote,
    age: scenario.age,
    sex: scenario.sex,
    referenceText: scenario.referenceText,
  };
}

function blocked(err: unknown): PreparationResult {
  if (err instanceof EmptyPoolError) {
    return { kind: "blocked", reason: "empty_pool", message: MESSAGES.emptyPool };
  }
  return { kind: "blocked", reason: "persistence_unavailable", message: MESSAGES.casesUnavailable };
}

export class CasePreparation {
  private readonly random: RandomSource;

  constructor(private readonly deps: CasePreparationDeps) {
    this.random = deps.random ?? Math.random;
  }

  async prepare(sessionId: string, store: SessionStore, flow: CaseFlow): Promise<PreparationResult> {
    const existingScenario = store.get("activeScenario");
    const existingPatient = store.get("patient");
    if (store.get("preparationComplete", false) && existingScenario && existingPatient) {
      if (flow.can("caseReady")) flow.send("caseReady");
      return { kind: "ready", scenario: existingScenario, patient: existingPatient, retrieval: null, resumed: true };
    }

    try {
      return await this.prepareFresh(sessionId, store, flow);
    } catch (err) {
      if (!isGatewayError(err)) throw err;
      logger.warn("Case preparation blocked", sessionId, describeError(err));
      return blocked(err);
    }
  }

  private async prepareFresh(sessionId: string, store: SessionStore, flow: CaseFlow): Promise<PreparationResult> {
    const { scenarios: repository, pool, retrieval, retrievalDefaults } = this.deps;

    const scenarios = await repository.list();
    const names = scenarios.map((scenario) => scenario.name);
    await pool.setAvailable(names);

    const settings = await this.loadSettings();
    const patch: AdminSettingsPatch = {};

    let scenarioPin = settings.scenarioPin;
    if (scenarioPin && !names.includes(scenarioPin)) {
      this.deps.board.notice(`Scenario pin '${scenarioPin}' no longer exists and was cleared`, scenarioPin);
      patch.scenarioPin = null;
      scenarioPin = null;
    }

    const drawn = await pool.drawNext(scenarioPin);
    const scenario = scenarios.find((candidate) => candidate.name === drawn);
    if (!scenario) throw new EmptyPoolError();

    const snapshot = toSnapshot(scenario);
    const { patient, behaviorPinValid } = derivePatient(snapshot, settings.behaviorPin, this.random);
    if (!behaviorPinValid) {
      this.deps.board.notice(`Behavior pin '${settings.behaviorPin}' is unknown and was cleared`);
      patch.behaviorPin = null;
    }
    await this.clearInvalidPins(patch);

    const mode = settings.retrievalModePin ?? retrievalDefaults.mode;
    const probability = settings.retrievalProbability ?? retrievalDefaults.probability;
    const outcome = await retrieval.resolve(
      snapshot,
      mode,
      probability,
      settings.retrievalModePin ? "override" : "mode"
    );
    const active: ScenarioSnapshot = { ...snapshot, referenceText: outcome.text };

    store.clearCaseKeys();
    store.set("activeScenario", active);
    store.set("patient", patient);
    store.set("messages", []);
    store.set("diagnosticRounds", []);
    store.set("evaluationDone", false);
    store.set("preparationComplete", true);
    flow.send("caseReady");

    logEvent("case.prepared", {
      sessionId,
      scenario: active.name,
      pinned: Boolean(scenarioPin),
      retrieval: outcome.kind,
    });
    return { kind: "ready", scenario: active, patient, retrieval: outcome, resumed: false };
  }

  private async loadSettings(): Promise<AdminSettings> {
    try {
      return await this.deps.settings.load();
    } catch (err) {
      logger.warn("Admin settings unavailable, preparing without pins", describeError(err));
      return EMPTY_ADMIN_SETTINGS;
    }
  }

  private async clearInvalidPins(patch: AdminSettingsPatch): Promise<void> {
    if (Object.keys(patch).length === 0) return;
    try {
      await this.deps.settings.update(patch);
    } catch (err) {
      logger.warn("Could not clear invalid pins", describeError(err));
    }
  }
}
