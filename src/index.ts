import "dotenv/config";
import { AdminService } from "./admin/adminService";
import { loadConfig } from "./config";
import { CasePreparation } from "./flow/casePreparation";
import { ResetController } from "./flow/resetController";
import { KeyedLock } from "./keyedLock";
import { log, logError } from "./logger";
import { getOpenAIClient } from "./openaiClient";
import { FirestoreAdminSettingsRepository, SerializedAdminSettings } from "./persistence/adminSettingsRepository";
import { FirestoreScenarioRepository } from "./persistence/scenarioRepository";
import { McpKnowledgeSource } from "./retrieval/knowledgeSource";
import { KnowledgeReferenceFetcher, OpenAIReferenceSummarizer } from "./retrieval/referenceFetcher";
import { RetrievalPolicyEngine } from "./retrieval/retrievalPolicy";
import { StatusBoard } from "./retrieval/statusBoard";
import { FirestorePlayedSetStore, InMemoryPlayedSetStore } from "./rotation/playedSetStore";
import { ScenarioPool } from "./rotation/scenarioPool";
import { createMessageRouter } from "./router";
import { SessionRegistry } from "./session/sessionRegistry";
import { createTransport, send } from "./transport";
import type WebSocket from "ws";

const config = loadConfig();

/**
 * Fire-and-forget wrapper that logs errors instead of silently ignoring them.
 */
function fireAndForget(promise: Promise<unknown>, context: string, sessionId?: string): void {
  promise.catch((err) => {
    logError(`[fireAndForget] ${context} failed:`, sessionId ?? "", err);
  });
}

const lock = new KeyedLock(config.lockTimeoutMs);
const board = new StatusBoard();
const scenarios = new FirestoreScenarioRepository();
const settings = new SerializedAdminSettings(new FirestoreAdminSettingsRepository(), lock);
const pool = new ScenarioPool(
  config.rotationStore === "firestore" ? new FirestorePlayedSetStore() : new InMemoryPlayedSetStore(),
  lock
);

const knowledgeSource =
  config.knowledge.url && config.knowledge.token
    ? new McpKnowledgeSource({
        url: config.knowledge.url,
        token: config.knowledge.token,
        timeoutMs: config.retrieval.timeoutMs,
      })
    : null;
const openai = getOpenAIClient(config.openai.apiKey);
const summarizer = openai ? new OpenAIReferenceSummarizer(openai, config.openai.model) : null;
const fetcher = new KnowledgeReferenceFetcher(knowledgeSource, summarizer, config.knowledge.language);
const retrieval = new RetrievalPolicyEngine({ fetcher, repository: scenarios, board });

const preparation = new CasePreparation({
  scenarios,
  settings,
  pool,
  retrieval,
  board,
  retrievalDefaults: { mode: config.retrieval.defaultMode, probability: config.retrieval.probability },
});
const admin = new AdminService({
  adminCode: config.adminCode,
  scenarios,
  settings,
  retrieval,
  board,
  pool,
  knowledgeConfigured: fetcher.configured,
  summarizerConfigured: summarizer !== null,
});

const sessions = new SessionRegistry<WebSocket>(config.sessionIdleTtlMs);
// Preparation may wait for a full retrieval fetch, so session waiters get that long on top.
const sessionLock = new KeyedLock(config.retrieval.timeoutMs + config.lockTimeoutMs);
const router = createMessageRouter<WebSocket>({
  sessions,
  sessionLock,
  send,
  preparation,
  reset: new ResetController(pool),
  admin,
  debugSnapshots: config.debugSnapshots,
});

if (!config.adminCode) {
  log("[case-gateway] ADMIN_CODE is not set; the admin area is locked.");
}

const transport = createTransport({
  port: config.port,
  maxPayloadBytes: config.maxPayloadBytes,
  handleMessage: (ws, ctx, raw) => fireAndForget(router.handleRaw(ws, ctx, raw), "ws.message", ctx.sessionId ?? undefined),
  handleClose: (ws, ctx) => router.handleClose(ws, ctx),
  health: () => ({ sessions: sessions.size(), rotationStore: pool.storeKind }),
});

function shutdown(signal: string) {
  log(`[case-gateway] ${signal} received, shutting down`);
  sessions.dispose();
  fireAndForget(
    transport.close().then(() => process.exit(0)),
    "shutdown"
  );
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
