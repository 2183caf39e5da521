import type { SessionStore } from "../session/sessionStore";
import type { CaseFlow } from "./caseFlow";
import { MESSAGES } from "./messages";

export const PAGES = [
  "start",
  "anamnesis",
  "examination",
  "diagnostics",
  "diagnosis",
  "feedback",
  "evaluation",
  "admin",
] as const;

export type Page = (typeof PAGES)[number];

export const ENTRY_PAGE: Page = "start";

export type AccessDecision = { kind: "proceed" } | { kind: "redirect"; message: string };

/**
 * Decide whether a non-entry page may be shown for the current session state.
 * The admin page only needs the admin flag; every case page needs an active case.
 */
export function checkAccess(page: Exclude<Page, "start">, store: SessionStore): AccessDecision {
  if (page === "admin") {
    return store.get("isAdmin", false) ? { kind: "proceed" } : { kind: "redirect", message: MESSAGES.adminOnly };
  }
  if (!store.has("activeScenario")) {
    return { kind: "redirect", message: MESSAGES.caseNotLoaded };
  }
  if (page === "evaluation" && !store.get("feedback", "").trim()) {
    return { kind: "redirect", message: MESSAGES.feedbackMissing };
  }
  return { kind: "proceed" };
}

export type NavigationResult =
  | { kind: "entry"; warning: string | null }
  | { kind: "page"; page: Page }
  | { kind: "redirect"; page: Page; message: string };

/**
 * Enter `page` for a session. Redirects store the warning for the entry page,
 * which hands it out exactly once.
 */
export function enterPage(page: Page, store: SessionStore, flow: CaseFlow): NavigationResult {
  if (page === "start") {
    return { kind: "entry", warning: store.takePendingWarning() };
  }

  const decision = checkAccess(page, store);
  if (decision.kind === "redirect") {
    store.setPendingWarning(decision.message);
    flow.send("redirected");
    return { kind: "redirect", page: ENTRY_PAGE, message: decision.message };
  }

  if (page !== "admin" && flow.can("enterModule")) {
    flow.send("enterModule");
  }
  return { kind: "page", page };
}
