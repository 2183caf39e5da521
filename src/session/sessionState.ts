import type { Scenario } from "../persistence/types";

export const BEHAVIORS = ["knapp", "redselig", "ängstlich", "wissbegierig", "verharmlosend"] as const;
export type Behavior = (typeof BEHAVIORS)[number];

export function isBehavior(value: string): value is Behavior {
  return BEHAVIORS.some((behavior) => behavior === value);
}

/** Case data copied into the session when a case is prepared. */
export type ScenarioSnapshot = Omit<Scenario, "createdAtMs" | "updatedAtMs">;

export type PatientProfile = {
  name: string;
  age: number;
  sex: "m" | "w";
  job: string;
  behavior: Behavior;
};

export type ChatMessage = {
  role: "user" | "assistant";
  content: string;
};

export type DiagnosticRound = {
  round: number;
  request: string;
  findings: string | null;
};

export type SessionState = {
  activeScenario: ScenarioSnapshot;
  patient: PatientProfile;
  messages: ChatMessage[];
  physicalExam: string;
  differentials: string;
  diagnosticRounds: DiagnosticRound[];
  finalDiagnosis: string;
  therapy: string;
  feedback: string;
  evaluationDone: boolean;
  instructionsConfirmed: boolean;
  preparationComplete: boolean;
  pendingWarning: string;
  isAdmin: boolean;
  offlineMode: boolean;
};

export type SessionKey = keyof SessionState;

/**
 * Lifetime of each key. `case` keys belong to the active case and are cleared
 * on reset; `session` keys survive resets; `warning` is consumed by the entry page.
 */
export const KEY_SCOPE: Record<SessionKey, "case" | "session" | "warning"> = {
  activeScenario: "case",
  patient: "case",
  messages: "case",
  physicalExam: "case",
  differentials: "case",
  diagnosticRounds: "case",
  finalDiagnosis: "case",
  therapy: "case",
  feedback: "case",
  evaluationDone: "case",
  instructionsConfirmed: "case",
  preparationComplete: "case",
  pendingWarning: "warning",
  isAdmin: "session",
  offlineMode: "session",
};

export function isSessionKey(value: string): value is SessionKey {
  return Object.prototype.hasOwnProperty.call(KEY_SCOPE, value);
}

export const SESSION_KEYS: SessionKey[] = Object.keys(KEY_SCOPE).filter(isSessionKey);
export const CASE_KEYS: SessionKey[] = SESSION_KEYS.filter((key) => KEY_SCOPE[key] === "case");
