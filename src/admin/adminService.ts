/**
 * Admin area operations: login, scenario maintenance, pins, manual
 * reference refresh and the status display.
 *
 * Every failure is returned as a reason-coded status line
 * (`<code>: <message>`) instead of being thrown to the transport.
 */

import { createHash, timingSafeEqual } from "crypto";
import { describeError, isGatewayError, ScenarioValidationError } from "../errors";
import { logError, logEvent } from "../logger";
import { parseScenarioInput } from "../persistence/scenarioSchema";
import type {
  AdminSettings,
  AdminSettingsPatch,
  AdminSettingsRepository,
  Scenario,
  ScenarioRepository,
} from "../persistence/types";
import type { RetrievalOutcome, RetrievalPolicyEngine } from "../retrieval/retrievalPolicy";
import type { StatusBoard, StatusEntry } from "../retrieval/statusBoard";
import type { PoolSnapshot, ScenarioPool } from "../rotation/scenarioPool";
import { isBehavior } from "../session/sessionState";
import type { SessionStore } from "../session/sessionStore";

export type AdminResult<T> = { ok: true; value: T } | { ok: false; status: string };

export type AdminStatus = {
  persistence: string;
  settings: AdminSettings | null;
  knowledgeSource: "configured" | "not_configured";
  summarizer: "configured" | "not_configured";
  rotation: (PoolSnapshot & { store: string }) | null;
  recent: StatusEntry[];
};

export interface AdminServiceDeps {
  adminCode: string | null;
  scenarios: ScenarioRepository;
  settings: AdminSettingsRepository;
  retrieval: Pick<RetrievalPolicyEngine, "resolve">;
  board: StatusBoard;
  pool: Pick<ScenarioPool, "snapshot" | "storeKind">;
  knowledgeConfigured: boolean;
  summarizerConfigured: boolean;
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

export function codesMatch(expected: string, provided: string): boolean {
  return timingSafeEqual(digest(expected), digest(provided));
}

function failure<T>(operation: string, err: unknown): AdminResult<T> {
  if (isGatewayError(err)) return { ok: false, status: describeError(err) };
  logError(`[admin] ${operation} failed`, err);
  return { ok: false, status: `internal_error: ${operation} failed` };
}

export class AdminService {
  constructor(private readonly deps: AdminServiceDeps) {}

  /** Sets the session admin flag on success. Without a configured code nobody can log in. */
  login(store: SessionStore, code: string): boolean {
    const expected = this.deps.adminCode;
    const ok = expected !== null && expected.length > 0 && codesMatch(expected, code);
    if (ok) store.set("isAdmin", true);
    logEvent("admin.login", { ok });
    return ok;
  }

  logout(store: SessionStore): void {
    store.set("isAdmin", false);
  }

  async listScenarios(): Promise<AdminResult<Scenario[]>> {
    try {
      return { ok: true, value: await this.deps.scenarios.list() };
    } catch (err) {
      return failure("listScenarios", err);
    }
  }

  /** Creates when `id` is absent, otherwise updates that scenario. */
  async saveScenario(raw: unknown, id?: string): Promise<AdminResult<Scenario>> {
    try {
      const input = parseScenarioInput(raw);
      const saved = id ? await this.deps.scenarios.update(id, input) : await this.deps.scenarios.create(input);
      logEvent("admin.scenario_saved", { id: saved.id, name: saved.name, created: !id });
      return { ok: true, value: saved };
    } catch (err) {
      return failure("saveScenario", err);
    }
  }

  async deleteScenario(id: string): Promise<AdminResult<{ id: string }>> {
    try {
      await this.deps.scenarios.remove(id);
      logEvent("admin.scenario_deleted", { id });
      return { ok: true, value: { id } };
    } catch (err) {
      return failure("deleteScenario", err);
    }
  }

  async updateSettings(patch: AdminSettingsPatch): Promise<AdminResult<AdminSettings>> {
    try {
      const issues: string[] = [];
      if (patch.behaviorPin && !isBehavior(patch.behaviorPin)) {
        issues.push(`behaviorPin: unknown behavior ${patch.behaviorPin}`);
      }
      if (patch.scenarioPin) {
        const pinned = await this.deps.scenarios.findByName(patch.scenarioPin);
        if (!pinned) issues.push(`scenarioPin: unknown scenario ${patch.scenarioPin}`);
      }
      if (issues.length > 0) throw new ScenarioValidationError(issues);

      const saved = await this.deps.settings.update(patch);
      logEvent("admin.settings_updated", { fields: Object.keys(patch) });
      return { ok: true, value: saved };
    } catch (err) {
      return failure("updateSettings", err);
    }
  }

  /** Fetch the reference text for one scenario now, whatever the configured mode. */
  async refreshReference(name: string): Promise<AdminResult<RetrievalOutcome>> {
    try {
      const scenario = await this.deps.scenarios.findByName(name);
      if (!scenario) throw new ScenarioValidationError([`name: unknown scenario ${name}`]);
      const outcome = await this.deps.retrieval.resolve(scenario, "always-refresh", 1, "override");
      if (outcome.kind === "skipped") return { ok: false, status: `${outcome.reason}: stored reference kept` };
      return { ok: true, value: outcome };
    } catch (err) {
      return failure("refreshReference", err);
    }
  }

  async status(): Promise<AdminStatus> {
    let persistence = "ok";
    try {
      await this.deps.scenarios.ping();
    } catch (err) {
      persistence = describeError(err);
    }

    let settings: AdminSettings | null = null;
    try {
      settings = await this.deps.settings.load();
    } catch (err) {
      if (persistence === "ok") persistence = describeError(err);
    }

    let rotation: AdminStatus["rotation"] = null;
    try {
      rotation = { ...(await this.deps.pool.snapshot()), store: this.deps.pool.storeKind };
    } catch (err) {
      logError("[admin] Rotation snapshot failed", describeError(err));
    }

    return {
      persistence,
      settings,
      knowledgeSource: this.deps.knowledgeConfigured ? "configured" : "not_configured",
      summarizer: this.deps.summarizerConfigured ? "configured" : "not_configured",
      rotation,
      recent: this.deps.board.getRecent(),
    };
  }
}
