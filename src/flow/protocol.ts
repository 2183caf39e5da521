import type { SessionStore } from "../session/sessionStore";

function section(title: string, body: string): string {
  const text = body.trim();
  return `---\n${title}:\n${text || "(keine Angaben)"}\n`;
}

/**
 * Plain-text protocol of a finished case, offered for download on the
 * evaluation page. Null until feedback exists and the evaluation was submitted.
 */
export function buildProtocol(store: SessionStore): string | null {
  const feedback = store.get("feedback", "").trim();
  const scenario = store.get("activeScenario");
  if (!feedback || !store.get("evaluationDone", false) || !scenario) return null;

  const questions = store
    .get("messages", [])
    .filter((message) => message.role === "user")
    .map((message) => `Frage: ${message.content}`)
    .join("\n");

  const rounds = store
    .get("diagnosticRounds", [])
    .map((round) => {
      const findings = round.findings?.trim() || "(keine Befunde)";
      return `Runde ${round.round}:\n${round.request.trim()}\nBefunde:\n${findings}`;
    })
    .join("\n\n");

  const parts = [
    `Simuliertes Krankheitsbild: ${scenario.name}\n`,
    section("Gesprächsverlauf (nur Fragen des Studierenden)", questions),
    section("Körperlicher Untersuchungsbefund", store.get("physicalExam", "")),
    section("Differentialdiagnosen", store.get("differentials", "")),
    section("Diagnostik und Befunde", rounds),
    section("Finale Diagnose", store.get("finalDiagnosis", "")),
    section("Therapiekonzept", store.get("therapy", "")),
    section("Strukturiertes Feedback", feedback),
  ];
  return parts.join("\n");
}
