import { buildProtocol } from "../flow/protocol";
import { protocolFilename } from "../handlers/learnerFlow";
import { SessionStore } from "../session/sessionStore";
import { makeSnapshot } from "./helpers/fakes";

function finishedCase(): SessionStore {
  const store = new SessionStore();
  store.set("activeScenario", makeSnapshot("Asthma"));
  store.set("messages", [
    { role: "user", content: "Seit wann haben Sie Atemnot?" },
    { role: "assistant", content: "Seit gestern." },
    { role: "user", content: "Rauchen Sie?" },
  ]);
  store.set("physicalExam", "Giemen beidseits");
  store.set("diagnosticRounds", [
    { round: 1, request: "Lungenfunktion", findings: "obstruktiv" },
    { round: 2, request: "Röntgen-Thorax", findings: null },
  ]);
  store.set("finalDiagnosis", "Asthma bronchiale");
  store.set("feedback", "Strukturierte Anamnese.");
  store.set("evaluationDone", true);
  return store;
}

describe("buildProtocol", () => {
  it("lists learner questions, findings and feedback", () => {
    const expected = [
      "Simuliertes Krankheitsbild: Asthma\n",
      "---\nGesprächsverlauf (nur Fragen des Studierenden):\nFrage: Seit wann haben Sie Atemnot?\nFrage: Rauchen Sie?\n",
      "---\nKörperlicher Untersuchungsbefund:\nGiemen beidseits\n",
      "---\nDifferentialdiagnosen:\n(keine Angaben)\n",
      "---\nDiagnostik und Befunde:\nRunde 1:\nLungenfunktion\nBefunde:\nobstruktiv\n\nRunde 2:\nRöntgen-Thorax\nBefunde:\n(keine Befunde)\n",
      "---\nFinale Diagnose:\nAsthma bronchiale\n",
      "---\nTherapiekonzept:\n(keine Angaben)\n",
      "---\nStrukturiertes Feedback:\nStrukturierte Anamnese.\n",
    ].join("\n");

    expect(buildProtocol(finishedCase())).toBe(expected);
  });

  it("is unavailable before the evaluation was submitted", () => {
    const store = finishedCase();
    store.set("evaluationDone", false);
    expect(buildProtocol(store)).toBeNull();
  });

  it("is unavailable without feedback", () => {
    const store = finishedCase();
    store.set("feedback", "  ");
    expect(buildProtocol(store)).toBeNull();
  });
});

describe("protocolFilename", () => {
  it("slugs the scenario name", () => {
    expect(protocolFilename("Akute Appendizitis")).toBe("fallprotokoll_akute_appendizitis.txt");
    expect(protocolFilename("Übelkeit")).toBe("fallprotokoll_ubelkeit.txt");
    expect(protocolFilename("???")).toBe("fallprotokoll_fall.txt");
  });
});
