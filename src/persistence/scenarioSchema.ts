import { z } from "zod";
import { RETRIEVAL_MODES } from "../config";
import { ScenarioValidationError } from "../errors";
import { log } from "../logger";
import type { AdminSettings, Scenario, ScenarioInput } from "./types";

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

/** Admin form input. Blank optional fields become null. */
export const scenarioInputSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  description: z.string().trim().min(1, "description is required"),
  physicalExam: z.string().trim().min(1, "physicalExam is required"),
  specialNote: optionalText,
  age: z.number().int().min(0).max(120).nullish().transform((value) => value ?? null),
  sex: z.enum(["m", "w", "n"]).nullish().transform((value) => value ?? null),
});

export type NormalizedScenarioInput = z.infer<typeof scenarioInputSchema>;

export function parseScenarioInput(raw: unknown): NormalizedScenarioInput {
  const parsed = scenarioInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ScenarioValidationError(
      parsed.error.errors.map((issue) => `${issue.path.join(".") || "scenario"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/** Scenario document as stored in the `scenarios` collection. */
const scenarioDocSchema = z
  .object({
    szenario: z.string().trim().min(1),
    beschreibung: z.string(),
    koerperliche_untersuchung: z.string(),
    besonderheit: z.string().nullish(),
    alter: z.number().int().nullish(),
    geschlecht: z.enum(["m", "w", "n"]).nullish(),
    amboss_input: z.string().nullish(),
  })
  .passthrough();

type TimestampLike = { toMillis: () => number };

function isTimestampLike(value: unknown): value is TimestampLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "toMillis" in value &&
    typeof value.toMillis === "function"
  );
}

export function timestampToMillis(value: unknown): number | null {
  if (isTimestampLike(value)) return value.toMillis();
  if (typeof value === "number" && Number.isFinite(value)) return value;
  return null;
}

/**
 * Map a stored document onto the domain type.
 * Returns null (and logs) when the document violates the column constraints.
 */
export function sanitizeScenarioDoc(id: string, raw: unknown): Scenario | null {
  const parsed = scenarioDocSchema.safeParse(raw);
  if (!parsed.success) {
    log("[scenarioSchema] Skipping invalid scenario document", id, parsed.error.errors.map((e) => e.message));
    return null;
  }
  const doc = parsed.data;
  const record: Record<string, unknown> = doc;
  return {
    id,
    name: doc.szenario.trim(),
    description: doc.beschreibung,
    physicalExam: doc.koerperliche_untersuchung,
    specialNote: doc.besonderheit ?? null,
    age: doc.alter ?? null,
    sex: doc.geschlecht ?? null,
    referenceText: doc.amboss_input ?? null,
    createdAtMs: timestampToMillis(record.created_at),
    updatedAtMs: timestampToMillis(record.updated_at),
  };
}

/** Column payload for create/update (timestamps are added by the repository). */
export function toScenarioColumns(input: NormalizedScenarioInput | ScenarioInput) {
  return {
    szenario: input.name,
    beschreibung: input.description,
    koerperliche_untersuchung: input.physicalExam,
    besonderheit: input.specialNote ?? null,
    alter: input.age ?? null,
    geschlecht: input.sex ?? null,
  };
}

const adminSettingsDocSchema = z
  .object({
    scenario_pin: z.string().nullish(),
    behavior_pin: z.string().nullish(),
    retrieval_mode_pin: z.enum(RETRIEVAL_MODES).nullish().catch(null),
    retrieval_probability: z.number().min(0).max(1).nullish().catch(null),
  })
  .passthrough();

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/** Unknown retrieval modes or out-of-range probabilities read back as unset. */
export function sanitizeAdminSettingsDoc(raw: unknown): AdminSettings {
  const parsed = adminSettingsDocSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    log("[scenarioSchema] Admin settings document unreadable, using defaults", parsed.error.errors.map((e) => e.message));
    return { scenarioPin: null, behaviorPin: null, retrievalModePin: null, retrievalProbability: null, updatedAtMs: null };
  }
  const doc = parsed.data;
  const record: Record<string, unknown> = doc;
  return {
    scenarioPin: blankToNull(doc.scenario_pin),
    behaviorPin: blankToNull(doc.behavior_pin),
    retrievalModePin: doc.retrieval_mode_pin ?? null,
    retrievalProbability: doc.retrieval_probability ?? null,
    updatedAtMs: timestampToMillis(record.updated_at),
  };
}

export function toAdminSettingsColumns(settings: Omit<AdminSettings, "updatedAtMs">) {
  return {
    scenario_pin: settings.scenarioPin,
    behavior_pin: settings.behaviorPin,
    retrieval_mode_pin: settings.retrievalModePin,
    retrieval_probability: settings.retrievalProbability,
  };
}
