import nameData from "../data/patientNames.json";
import { BEHAVIORS, isBehavior, type PatientProfile, type ScenarioSnapshot } from "../session/sessionState";

export type RandomSource = () => number;

function pick<T>(items: readonly T[], random: RandomSource): T {
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

/** Inclusive integer range. */
function randomInt(min: number, max: number, random: RandomSource): number {
  return min + Math.min(max - min, Math.floor(random() * (max - min + 1)));
}

/** Scenario age ±5 years (never below 16), or 20–34 when the scenario has none. */
export function deriveAge(baseAge: number | null, random: RandomSource): number {
  if (baseAge === null) return Math.max(16, randomInt(20, 34, random));
  return Math.max(16, baseAge + randomInt(-5, 5, random));
}

export function resolveSex(sex: ScenarioSnapshot["sex"], random: RandomSource): "m" | "w" {
  if (sex === "m" || sex === "w") return sex;
  return random() < 0.5 ? "m" : "w";
}

export type DerivedPatient = {
  patient: PatientProfile;
  /** False when a behavior pin was set but is not a known behavior. */
  behaviorPinValid: boolean;
};

export function derivePatient(
  scenario: ScenarioSnapshot,
  behaviorPin: string | null,
  random: RandomSource = Math.random
): DerivedPatient {
  const sex = resolveSex(scenario.sex, random);
  const age = deriveAge(scenario.age, random);
  const name = `${pick(nameData.firstNames[sex], random)} ${pick(nameData.lastNames, random)}`;
  const job = pick(nameData.jobs[sex], random);

  const pinned = behaviorPin !== null && isBehavior(behaviorPin) ? behaviorPin : null;
  const behavior = pinned ?? pick(BEHAVIORS, random);

  return {
    patient: { name, age, sex, job, behavior },
    behaviorPinValid: behaviorPin === null || pinned !== null,
  };
}
