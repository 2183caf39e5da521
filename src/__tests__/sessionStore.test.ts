import { SessionRegistry } from "../session/sessionRegistry";
import { CASE_KEYS } from "../session/sessionState";
import { SessionStore } from "../session/sessionStore";
import { makeSnapshot } from "./helpers/fakes";

jest.mock("../logger", () => ({
  log: jest.fn(),
  scopedLogger: () => ({ log: jest.fn(), warn: jest.fn(), error: jest.fn() }),
}));

function populatedStore(): SessionStore {
  const store = new SessionStore();
  store.set("activeScenario", makeSnapshot("Asthma"));
  store.set("messages", [{ role: "user", content: "Seit wann haben Sie Beschwerden?" }]);
  store.set("feedback", "Gute Anamnese");
  store.set("evaluationDone", true);
  store.set("isAdmin", true);
  store.set("offlineMode", true);
  store.setPendingWarning("Hinweis");
  return store;
}

describe("SessionStore", () => {
  it("returns the fallback for missing keys", () => {
    const store = new SessionStore();
    expect(store.get("feedback")).toBeUndefined();
    expect(store.get("feedback", "")).toBe("");
    expect(store.has("feedback")).toBe(false);
  });

  it("sets, reads and deletes values", () => {
    const store = new SessionStore();
    store.set("therapy", "Inhalatives Kortikosteroid");
    expect(store.get("therapy")).toBe("Inhalatives Kortikosteroid");
    store.delete("therapy");
    expect(store.has("therapy")).toBe(false);
  });

  it("clearCaseKeys drops case state and keeps session flags and the warning", () => {
    const store = populatedStore();
    store.clearCaseKeys();
    expect(store.keys()).toEqual(["pendingWarning", "isAdmin", "offlineMode"]);
  });

  it("clearCaseKeys is idempotent", () => {
    const store = populatedStore();
    store.clearCaseKeys();
    const once = store.keys();
    store.clearCaseKeys();
    expect(store.keys()).toEqual(once);
  });

  it("hands out a pending warning exactly once", () => {
    const store = new SessionStore();
    store.setPendingWarning("Bitte über die Startseite beginnen");
    expect(store.takePendingWarning()).toBe("Bitte über die Startseite beginnen");
    expect(store.takePendingWarning()).toBeNull();
  });

  it("keeps only the latest warning", () => {
    const store = new SessionStore();
    store.setPendingWarning("first");
    store.setPendingWarning("second");
    expect(store.takePendingWarning()).toBe("second");
  });

  it("classifies session flags outside the case keys", () => {
    expect(CASE_KEYS).not.toContain("isAdmin");
    expect(CASE_KEYS).not.toContain("offlineMode");
    expect(CASE_KEYS).not.toContain("pendingWarning");
    expect(CASE_KEYS).toContain("activeScenario");
  });
});

describe("SessionRegistry", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("shares one store between sockets of a session and isolates sessions", () => {
    const registry = new SessionRegistry<string>(1000);
    const a1 = registry.join("s1", "tab-1");
    const a2 = registry.join("s1", "tab-2");
    const b = registry.join("s2", "tab-3");

    a1.store.set("feedback", "ok");
    expect(a2.store.get("feedback")).toBe("ok");
    expect(b.store.has("feedback")).toBe(false);
    expect(a1.sockets.size).toBe(2);
  });

  it("drops a session once its last socket left and the idle TTL passed", () => {
    const registry = new SessionRegistry<string>(1000);
    registry.join("s1", "tab-1");
    registry.leave("s1", "tab-1");

    jest.advanceTimersByTime(999);
    expect(registry.size()).toBe(1);
    jest.advanceTimersByTime(1);
    expect(registry.size()).toBe(0);
  });

  it("keeps state across a reconnect within the TTL", () => {
    const registry = new SessionRegistry<string>(1000);
    registry.join("s1", "tab-1").store.set("therapy", "Ruhe");
    registry.leave("s1", "tab-1");

    jest.advanceTimersByTime(500);
    const session = registry.join("s1", "tab-2");
    jest.advanceTimersByTime(1000);

    expect(registry.size()).toBe(1);
    expect(session.store.get("therapy")).toBe("Ruhe");
  });
});
