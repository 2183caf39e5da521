import { validateMessage } from "../validators";

describe("validateMessage", () => {
  it("accepts a join with a session id", () => {
    const msg = validateMessage({ type: "join", sessionId: "s1" });
    expect(msg).toEqual({ type: "join", sessionId: "s1" });
  });

  it("rejects invalid shapes", () => {
    expect(validateMessage({ type: "join" })).toBeNull();
    expect(validateMessage({ type: "navigate", page: "impressum" })).toBeNull();
    expect(validateMessage({ type: "unknown" })).toBeNull();
    expect(validateMessage("ping")).toBeNull();
  });

  it("accepts every page for navigation", () => {
    const pages = ["start", "anamnesis", "examination", "diagnostics", "diagnosis", "feedback", "evaluation", "admin"];
    pages.forEach((page) => {
      expect(validateMessage({ type: "navigate", page })?.type).toBe("navigate");
    });
  });

  it("accepts artifact variants", () => {
    const artifacts = [
      { kind: "message", role: "user", content: "Haben Sie Fieber?" },
      { kind: "diagnosticRound", request: "Blutbild", findings: null },
      { kind: "feedback", text: "Gut strukturiert" },
      { kind: "offlineMode", enabled: true },
      { kind: "instructionsConfirmed" },
    ];
    artifacts.forEach((artifact) => {
      expect(validateMessage({ type: "record_artifact", artifact })?.type).toBe("record_artifact");
    });
  });

  it("rejects an empty diagnostic request", () => {
    expect(
      validateMessage({ type: "record_artifact", artifact: { kind: "diagnosticRound", request: "" } })
    ).toBeNull();
  });

  it("validates admin settings patches", () => {
    expect(
      validateMessage({
        type: "admin_update_settings",
        settings: { retrievalModePin: "probabilistic", retrievalProbability: 0.3, scenarioPin: null },
      })
    ).toEqual({
      type: "admin_update_settings",
      settings: { retrievalModePin: "probabilistic", retrievalProbability: 0.3, scenarioPin: null },
    });
    expect(
      validateMessage({ type: "admin_update_settings", settings: { retrievalProbability: 1.5 } })
    ).toBeNull();
    expect(validateMessage({ type: "admin_update_settings", settings: { retrievalModePin: "sometimes" } })).toBeNull();
    expect(validateMessage({ type: "admin_update_settings", settings: { extra: true } })).toBeNull();
  });

  it("passes scenario payloads through for service-side validation", () => {
    const msg = validateMessage({
      type: "admin_save_scenario",
      scenario: { name: "Gicht", description: "Schmerz", physicalExam: "Schwellung", age: "alt" },
    });
    expect(msg?.type).toBe("admin_save_scenario");
  });
});
