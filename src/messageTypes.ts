import type { AdminStatus } from "./admin/adminService";
import type { RetrievalMode } from "./config";
import type { FlowState } from "./flow/caseFlow";
import type { Page } from "./flow/accessGuard";
import type { AdminSettings, Scenario } from "./persistence/types";
import type { RetrievalOutcome } from "./retrieval/retrievalPolicy";
import type { PatientProfile, ScenarioSnapshot, SessionKey } from "./session/sessionState";

export type Artifact =
  | { kind: "message"; role: "user" | "assistant"; content: string }
  | { kind: "physicalExam"; text: string }
  | { kind: "differentials"; text: string }
  | { kind: "diagnosticRound"; request: string; findings?: string | null }
  | { kind: "finalDiagnosis"; text: string }
  | { kind: "therapy"; text: string }
  | { kind: "feedback"; text: string }
  | { kind: "instructionsConfirmed" }
  | { kind: "offlineMode"; enabled: boolean };

export type SettingsPatchInput = {
  scenarioPin?: string | null;
  behaviorPin?: string | null;
  retrievalModePin?: RetrievalMode | null;
  retrievalProbability?: number | null;
};

export type ClientToServerMessage =
  | { type: "join"; sessionId: string }
  | { type: "navigate"; page: Page }
  | { type: "prepare_case" }
  | { type: "record_artifact"; artifact: Artifact }
  | { type: "complete_evaluation" }
  | { type: "start_new_scenario" }
  | { type: "download_protocol" }
  | { type: "ping" }
  | { type: "admin_login"; code: string }
  | { type: "admin_logout" }
  | { type: "admin_list_scenarios" }
  | { type: "admin_save_scenario"; id?: string; scenario: Record<string, unknown> }
  | { type: "admin_delete_scenario"; id: string }
  | { type: "admin_update_settings"; settings: SettingsPatchInput }
  | { type: "admin_refresh_reference"; name: string }
  | { type: "admin_status" }
  | { type: "debug_snapshot" };

export type DebugSnapshot = {
  sessionId: string;
  flowState: FlowState;
  keys: SessionKey[];
  scenario: string | null;
  messageCount: number;
  diagnosticRoundCount: number;
  hasFeedback: boolean;
  evaluationDone: boolean;
  pendingWarning: boolean;
  sockets: number;
};

export type ServerToClientMessage =
  | { type: "joined"; sessionId: string; flowState: FlowState }
  | { type: "page"; page: Page }
  | { type: "redirect"; page: Page; message: string }
  | { type: "entry"; warning: string | null }
  | { type: "case_ready"; scenario: ScenarioSnapshot; patient: PatientProfile; resumed: boolean }
  | { type: "case_blocked"; reason: "empty_pool" | "persistence_unavailable"; message: string }
  | { type: "case_updated"; keys: SessionKey[] }
  | { type: "reset_done"; page: Page; warning: string | null }
  | { type: "protocol"; filename: string; text: string }
  | { type: "admin_login_result"; ok: boolean }
  | { type: "admin_scenarios"; scenarios: Scenario[] }
  | { type: "admin_scenario_saved"; scenario: Scenario }
  | { type: "admin_scenario_deleted"; id: string }
  | { type: "admin_settings"; settings: AdminSettings }
  | { type: "admin_reference"; outcome: RetrievalOutcome }
  | { type: "admin_status"; status: AdminStatus }
  | { type: "admin_error"; operation: string; status: string }
  | { type: "debug_snapshot"; snapshot: DebugSnapshot }
  | { type: "error"; message: string }
  | { type: "pong" };
