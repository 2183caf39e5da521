// Learner-facing texts. The trainer runs in German; keep all user copy here.

export const MESSAGES = {
  caseNotLoaded: "⚠️ Der Fall ist noch nicht geladen. Bitte beginne über die Startseite.",
  feedbackMissing:
    "⚠️ Bitte sieh dir zunächst das automatische Feedback an und folge der vorgesehenen Navigation von der Startseite.",
  adminOnly: "Kein Zugriff: Dieser Bereich steht nur Administrator*innen zur Verfügung.",
  emptyPool: "Es sind derzeit keine Fallbeispiele hinterlegt. Bitte wende dich an die Kursleitung.",
  casesUnavailable: "Die Fallbeispiele können gerade nicht geladen werden. Bitte versuche es später erneut.",
  resetMarkFailed:
    "Der abgeschlossene Fall konnte nicht als bearbeitet gespeichert werden und kann erneut gezogen werden.",
  resetNotAvailable: "Ein neues Szenario kann erst nach Abschluss der Evaluation gestartet werden.",
  protocolNotReady: "Das Protokoll steht erst nach Feedback und Evaluation zur Verfügung.",
} as const;
