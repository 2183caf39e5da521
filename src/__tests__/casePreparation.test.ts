import { CaseFlow } from "../flow/caseFlow";
import { CasePreparation } from "../flow/casePreparation";
import { MESSAGES } from "../flow/messages";
import { deriveAge, derivePatient, resolveSex } from "../flow/patientProfile";
import { KeyedLock } from "../keyedLock";
import { RetrievalPolicyEngine } from "../retrieval/retrievalPolicy";
import { StatusBoard } from "../retrieval/statusBoard";
import { InMemoryPlayedSetStore } from "../rotation/playedSetStore";
import { ScenarioPool } from "../rotation/scenarioPool";
import { SessionStore } from "../session/sessionStore";
import {
  InMemoryAdminSettings,
  InMemoryScenarioRepository,
  StubReferenceFetcher,
  makeScenario,
  makeSnapshot,
  sequence,
} from "./helpers/fakes";

jest.mock("../logger", () => ({
  log: jest.fn(),
  logError: jest.fn(),
  logEvent: jest.fn(),
  scopedLogger: () => ({ log: jest.fn(), warn: jest.fn(), error: jest.fn() }),
}));

describe("patient profile", () => {
  it("keeps the age within ±5 years of the scenario and never below 16", () => {
    expect(deriveAge(40, () => 0)).toBe(35);
    expect(deriveAge(40, () => 0.999)).toBe(45);
    expect(deriveAge(17, () => 0)).toBe(16);
  });

  it("uses 20–34 when the scenario has no age", () => {
    expect(deriveAge(null, () => 0)).toBe(20);
    expect(deriveAge(null, () => 0.999)).toBe(34);
  });

  it("resolves sex n to m or w", () => {
    expect(resolveSex("n", () => 0.1)).toBe("m");
    expect(resolveSex("n", () => 0.9)).toBe("w");
    expect(resolveSex(null, () => 0.9)).toBe("w");
    expect(resolveSex("m", () => 0.9)).toBe("m");
  });

  it("honors a valid behavior pin and flags an unknown one", () => {
    const pinned = derivePatient(makeSnapshot("Gicht"), "ängstlich", () => 0);
    expect(pinned.patient.behavior).toBe("ängstlich");
    expect(pinned.behaviorPinValid).toBe(true);

    const unknown = derivePatient(makeSnapshot("Gicht"), "gelangweilt", () => 0);
    expect(unknown.patient.behavior).toBe("knapp");
    expect(unknown.behaviorPinValid).toBe(false);
  });

  it("draws name and job from the list for the resolved sex", () => {
    const { patient } = derivePatient(makeSnapshot("Gicht", { sex: "m", age: 50 }), null, () => 0);
    expect(patient).toEqual({ name: "Jonas Berger", age: 45, sex: "m", job: "Elektriker", behavior: "knapp" });
  });
});

describe("CasePreparation", () => {
  function setup(options: { scenarios?: string[]; settings?: ConstructorParameters<typeof InMemoryAdminSettings>[0] } = {}) {
    const repository = new InMemoryScenarioRepository(
      (options.scenarios ?? ["Asthma", "Gicht"]).map((name) => makeScenario(name, { referenceText: "gespeichert" }))
    );
    const settings = new InMemoryAdminSettings(options.settings);
    const pool = new ScenarioPool(new InMemoryPlayedSetStore(), new KeyedLock(), sequence(0));
    const board = new StatusBoard();
    const fetcher = new StubReferenceFetcher("frisch");
    const retrieval = new RetrievalPolicyEngine({ fetcher, repository, board });
    const preparation = new CasePreparation({
      scenarios: repository,
      settings,
      pool,
      retrieval,
      board,
      retrievalDefaults: { mode: "if-empty", probability: 0.2 },
      random: () => 0,
    });
    return { repository, settings, pool, board, fetcher, preparation, store: new SessionStore(), flow: new CaseFlow("s1") };
  }

  it("draws a scenario, derives the patient and marks preparation complete", async () => {
    const { preparation, store, flow, fetcher } = setup();

    const result = await preparation.prepare("s1", store, flow);

    expect(result).toMatchObject({ kind: "ready", resumed: false, scenario: { name: "Asthma", referenceText: "gespeichert" } });
    expect(store.get("activeScenario")?.name).toBe("Asthma");
    expect(store.get("patient")?.age).toBe(35);
    expect(store.get("preparationComplete")).toBe(true);
    expect(store.get("messages")).toEqual([]);
    expect(flow.getState()).toBe("in_module");
    expect(fetcher.calls).toHaveLength(0);
  });

  it("returns the existing case when the entry page is opened again", async () => {
    const { preparation, store, flow } = setup();
    await preparation.prepare("s1", store, flow);
    flow.send("redirected");

    const again = await preparation.prepare("s1", store, flow);
    expect(again).toMatchObject({ kind: "ready", resumed: true, scenario: { name: "Asthma" } });
    expect(flow.getState()).toBe("in_module");
  });

  it("uses a valid scenario pin", async () => {
    const { preparation, store, flow } = setup({ settings: { scenarioPin: "Gicht" } });
    const result = await preparation.prepare("s1", store, flow);
    expect(result).toMatchObject({ kind: "ready", scenario: { name: "Gicht" } });
  });

  it("clears a pin that no longer matches and falls back to rotation", async () => {
    const { preparation, store, flow, settings, board } = setup({ settings: { scenarioPin: "Masern" } });

    const result = await preparation.prepare("s1", store, flow);

    expect(result).toMatchObject({ kind: "ready", scenario: { name: "Asthma" } });
    expect(settings.settings.scenarioPin).toBeNull();
    expect(board.getRecent()[0]).toMatchObject({ kind: "admin", scenario: "Masern" });
  });

  it("clears an unknown behavior pin", async () => {
    const { preparation, store, flow, settings } = setup({ settings: { behaviorPin: "gelangweilt" } });
    await preparation.prepare("s1", store, flow);
    expect(settings.updates).toEqual([{ behaviorPin: null }]);
  });

  it("runs retrieval with the pinned mode as an override", async () => {
    const { preparation, store, flow, board, repository } = setup({ settings: { retrievalModePin: "always-refresh" } });

    await preparation.prepare("s1", store, flow);

    expect(store.get("activeScenario")?.referenceText).toBe("frisch");
    expect(repository.scenarios.get("id-Asthma")?.referenceText).toBe("frisch");
    expect(board.latest()).toMatchObject({ kind: "fetched", trigger: "override", mode: "always-refresh" });
  });

  it("prepares without pins when settings cannot be read", async () => {
    const { preparation, store, flow, settings } = setup({ settings: { scenarioPin: "Gicht" } });
    settings.failing = true;
    const result = await preparation.prepare("s1", store, flow);
    expect(result).toMatchObject({ kind: "ready", scenario: { name: "Asthma" } });
  });

  it("blocks with a learner message when no scenarios exist", async () => {
    const { preparation, store, flow } = setup({ scenarios: [] });
    await expect(preparation.prepare("s1", store, flow)).resolves.toEqual({
      kind: "blocked",
      reason: "empty_pool",
      message: MESSAGES.emptyPool,
    });
    expect(store.has("activeScenario")).toBe(false);
    expect(flow.getState()).toBe("preparing");
  });

  it("blocks when scenarios cannot be loaded", async () => {
    const { preparation, store, flow, repository } = setup();
    repository.failing = true;
    await expect(preparation.prepare("s1", store, flow)).resolves.toEqual({
      kind: "blocked",
      reason: "persistence_unavailable",
      message: MESSAGES.casesUnavailable,
    });
  });

  it("rotates across sessions until every scenario was played", async () => {
    const { preparation, pool } = setup();
    const first = await preparation.prepare("s1", new SessionStore(), new CaseFlow("s1"));
    if (first.kind !== "ready") throw new Error("expected ready");
    await pool.markPlayed(first.scenario.name);

    const second = await preparation.prepare("s2", new SessionStore(), new CaseFlow("s2"));
    expect(second).toMatchObject({ kind: "ready", scenario: { name: "Gicht" } });
  });
});
