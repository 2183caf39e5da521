import type { RetrievalMode } from "../config";

/** m = male, w = female, n = other (resolved to m/w when a patient is derived). */
export type Sex = "m" | "w" | "n";

export type Scenario = {
  /** Server-assigned document id. */
  id: string;
  /** Unique scenario name, used as the rotation identifier. */
  name: string;
  description: string;
  physicalExam: string;
  specialNote: string | null;
  age: number | null;
  sex: Sex | null;
  /** Auxiliary reference text maintained by the retrieval policy. */
  referenceText: string | null;
  createdAtMs: number | null;
  updatedAtMs: number | null;
};

export type ScenarioInput = {
  name: string;
  description: string;
  physicalExam: string;
  specialNote?: string | null;
  age?: number | null;
  sex?: Sex | null;
};

export type AdminSettings = {
  scenarioPin: string | null;
  behaviorPin: string | null;
  retrievalModePin: RetrievalMode | null;
  retrievalProbability: number | null;
  updatedAtMs: number | null;
};

export type AdminSettingsPatch = Partial<Omit<AdminSettings, "updatedAtMs">>;

export const EMPTY_ADMIN_SETTINGS: AdminSettings = {
  scenarioPin: null,
  behaviorPin: null,
  retrievalModePin: null,
  retrievalProbability: null,
  updatedAtMs: null,
};

export interface ScenarioRepository {
  list(): Promise<Scenario[]>;
  findByName(name: string): Promise<Scenario | null>;
  create(input: ScenarioInput): Promise<Scenario>;
  update(id: string, input: ScenarioInput): Promise<Scenario>;
  remove(id: string): Promise<void>;
  /** Overwrite only the reference text column; refreshes the update timestamp. */
  setReferenceText(id: string, text: string): Promise<void>;
  /** Cheap reachability probe for the admin status display. */
  ping(): Promise<void>;
}

export interface AdminSettingsRepository {
  load(): Promise<AdminSettings>;
  /** Read-modify-write; fields absent from the patch keep their stored value. */
  update(patch: AdminSettingsPatch): Promise<AdminSettings>;
}
