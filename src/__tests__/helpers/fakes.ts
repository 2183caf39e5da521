import { DuplicateScenarioError, FetchError, PersistenceUnavailableError, ScenarioValidationError } from "../../errors";
import { toSnapshot } from "../../flow/casePreparation";
import { applySettingsPatch } from "../../persistence/adminSettingsRepository";
import {
  EMPTY_ADMIN_SETTINGS,
  type AdminSettings,
  type AdminSettingsPatch,
  type AdminSettingsRepository,
  type Scenario,
  type ScenarioInput,
  type ScenarioRepository,
} from "../../persistence/types";
import type { ReferenceFetcher, ReferenceSubject } from "../../retrieval/referenceFetcher";
import type { PlayedSetStore } from "../../rotation/playedSetStore";
import type { ScenarioSnapshot } from "../../session/sessionState";

export function makeScenario(name: string, overrides: Partial<Scenario> = {}): Scenario {
  return {
    id: `id-${name}`,
    name,
    description: `Beschreibung ${name}`,
    physicalExam: `Befund ${name}`,
    specialNote: null,
    age: 40,
    sex: "w",
    referenceText: null,
    createdAtMs: 1,
    updatedAtMs: 1,
    ...overrides,
  };
}

export function makeSnapshot(name: string, overrides: Partial<Scenario> = {}): ScenarioSnapshot {
  return toSnapshot(makeScenario(name, overrides));
}

export class InMemoryScenarioRepository implements ScenarioRepository {
  readonly scenarios = new Map<string, Scenario>();
  failing = false;
  failReferenceWrites = false;
  private nextId = 1;

  constructor(initial: Scenario[] = []) {
    for (const scenario of initial) this.scenarios.set(scenario.id, scenario);
  }

  private guard(operation: string) {
    if (this.failing) throw new PersistenceUnavailableError(operation);
  }

  async list(): Promise<Scenario[]> {
    this.guard("scenarios.list");
    return [...this.scenarios.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  async findByName(name: string): Promise<Scenario | null> {
    this.guard("scenarios.findByName");
    return [...this.scenarios.values()].find((scenario) => scenario.name === name) ?? null;
  }

  async create(input: ScenarioInput): Promise<Scenario> {
    this.guard("scenarios.create");
    if (await this.findByName(input.name)) throw new DuplicateScenarioError(input.name);
    const scenario = makeScenario(input.name, {
      id: `new-${this.nextId++}`,
      description: input.description,
      physicalExam: input.physicalExam,
      specialNote: input.specialNote ?? null,
      age: input.age ?? null,
      sex: input.sex ?? null,
    });
    this.scenarios.set(scenario.id, scenario);
    return scenario;
  }

  async update(id: string, input: ScenarioInput): Promise<Scenario> {
    this.guard("scenarios.update");
    const current = this.scenarios.get(id);
    if (!current) throw new ScenarioValidationError([`id: unknown scenario ${id}`]);
    const clash = await this.findByName(input.name);
    if (clash && clash.id !== id) throw new DuplicateScenarioError(input.name);
    const next: Scenario = {
      ...current,
      name: input.name,
      description: input.description,
      physicalExam: input.physicalExam,
      specialNote: input.specialNote ?? null,
      age: input.age ?? null,
      sex: input.sex ?? null,
    };
    this.scenarios.set(id, next);
    return next;
  }

  async remove(id: string): Promise<void> {
    this.guard("scenarios.remove");
    this.scenarios.delete(id);
  }

  async setReferenceText(id: string, text: string): Promise<void> {
    if (this.failReferenceWrites) throw new PersistenceUnavailableError("scenarios.setReferenceText");
    this.guard("scenarios.setReferenceText");
    const current = this.scenarios.get(id);
    if (current) this.scenarios.set(id, { ...current, referenceText: text });
  }

  async ping(): Promise<void> {
    this.guard("scenarios.ping");
  }
}

export class InMemoryAdminSettings implements AdminSettingsRepository {
  settings: AdminSettings;
  failing = false;
  readonly updates: AdminSettingsPatch[] = [];

  constructor(initial: Partial<AdminSettings> = {}) {
    this.settings = { ...EMPTY_ADMIN_SETTINGS, ...initial };
  }

  async load(): Promise<AdminSettings> {
    if (this.failing) throw new PersistenceUnavailableError("adminSettings.load");
    return { ...this.settings };
  }

  async update(patch: AdminSettingsPatch): Promise<AdminSettings> {
    if (this.failing) throw new PersistenceUnavailableError("adminSettings.update");
    this.updates.push(patch);
    this.settings = { ...applySettingsPatch(this.settings, patch), updatedAtMs: 2 };
    return { ...this.settings };
  }
}

export class StubReferenceFetcher implements ReferenceFetcher {
  readonly calls: ReferenceSubject[] = [];

  constructor(private readonly result: string | Error = "Nachschlagetext") {}

  async fetch(subject: ReferenceSubject): Promise<string> {
    this.calls.push(subject);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export function failingFetcher(): StubReferenceFetcher {
  return new StubReferenceFetcher(new FetchError("Knowledge source timed out"));
}

/** Played-set store whose writes can be switched to fail. */
export class FlakyPlayedSetStore implements PlayedSetStore {
  readonly kind = "memory" as const;
  played = new Set<string>();
  failWrites = false;

  async load(): Promise<string[]> {
    return [...this.played];
  }

  async update<T>(fn: (played: ReadonlySet<string>) => { next: Set<string>; result: T }): Promise<T> {
    const { next, result } = fn(new Set(this.played));
    // Yield so concurrent callers interleave unless the pool serializes them.
    await new Promise((resolve) => setImmediate(resolve));
    if (this.failWrites) throw new PersistenceUnavailableError("rotation.update");
    this.played = next;
    return result;
  }
}

/** Deterministic random source cycling through `values`. */
export function sequence(...values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index++;
    return value;
  };
}
