import { createAdminOperationsHandler, createLearnerFlowHandler, isAdminMessage, type HandlerContext } from "./handlers";
import type { AdminOperationsDeps, LearnerFlowDeps } from "./handlers";
import type { KeyedLock } from "./keyedLock";
import { log, logError, logEvent } from "./logger";
import type { ClientToServerMessage, ServerToClientMessage } from "./messageTypes";
import type { CaseSession, SessionRegistry } from "./session/sessionRegistry";
import { validateMessage } from "./validators";

export type ClientContext = {
  joined: boolean;
  sessionId: string | null;
};

export interface MessageRouterDeps<S> extends LearnerFlowDeps, AdminOperationsDeps {
  sessions: SessionRegistry<S>;
  /** Serializes the messages of one session across its sockets. */
  sessionLock: KeyedLock;
  send: (socket: S, msg: ServerToClientMessage) => void;
}

/**
 * Parses, validates and dispatches one client frame. Every socket must join a
 * session before sending anything else.
 */
export function createMessageRouter<S>(deps: MessageRouterDeps<S>) {
  const { sessions, sessionLock, send } = deps;
  const learner = createLearnerFlowHandler(deps);
  const adminOps = createAdminOperationsHandler(deps);

  function contextFor(socket: S, session: CaseSession<S>): HandlerContext {
    return {
      sessionId: session.id,
      store: session.store,
      flow: session.flow,
      socketCount: session.sockets.size,
      reply: (msg) => send(socket, msg),
      broadcastOthers: (msg) => {
        for (const other of session.sockets) {
          if (other !== socket) send(other, msg);
        }
      },
    };
  }

  async function dispatch(handlerCtx: HandlerContext, msg: ClientToServerMessage): Promise<void> {
    if (isAdminMessage(msg)) {
      await adminOps.handleAdminMessage(handlerCtx, msg);
      return;
    }
    switch (msg.type) {
      case "ping":
        handlerCtx.reply({ type: "pong" });
        return;
      case "navigate":
        learner.handleNavigate(handlerCtx, msg.page);
        return;
      case "prepare_case":
        await learner.handlePrepareCase(handlerCtx);
        return;
      case "record_artifact":
        learner.handleRecordArtifact(handlerCtx, msg.artifact);
        return;
      case "complete_evaluation":
        learner.handleCompleteEvaluation(handlerCtx);
        return;
      case "start_new_scenario":
        await learner.handleStartNewScenario(handlerCtx);
        return;
      case "download_protocol":
        learner.handleDownloadProtocol(handlerCtx);
        return;
      case "debug_snapshot":
        learner.handleDebugSnapshot(handlerCtx);
        return;
    }
  }

  async function handleRaw(socket: S, ctx: ClientContext, raw: string): Promise<void> {
    let parsedRaw: unknown;
    try {
      parsedRaw = JSON.parse(raw);
    } catch (err) {
      logError("Invalid JSON", err);
      send(socket, { type: "error", message: "Invalid JSON" });
      return;
    }
    const msg = validateMessage(parsedRaw);
    if (!msg) {
      send(socket, { type: "error", message: "Invalid message shape" });
      return;
    }

    if (msg.type === "join") {
      if (ctx.joined && ctx.sessionId && ctx.sessionId !== msg.sessionId) {
        sessions.leave(ctx.sessionId, socket);
      }
      const session = sessions.join(msg.sessionId, socket);
      ctx.joined = true;
      ctx.sessionId = msg.sessionId;
      send(socket, { type: "joined", sessionId: msg.sessionId, flowState: session.flow.getState() });
      logEvent("ws.join", { sessionId: msg.sessionId, sockets: session.sockets.size });
      return;
    }

    const session = ctx.joined && ctx.sessionId ? sessions.get(ctx.sessionId) : undefined;
    if (!session) {
      send(socket, { type: "error", message: "Join a session first" });
      return;
    }
    const handlerCtx = contextFor(socket, session);

    try {
      await sessionLock.run(`session:${session.id}`, msg.type, () => dispatch(handlerCtx, msg));
    } catch (err) {
      logError(`Handler for ${msg.type} failed`, session.id, err);
      handlerCtx.reply({ type: "error", message: "Internal error" });
    }
  }

  function handleClose(socket: S, ctx: ClientContext): void {
    if (!ctx.joined || !ctx.sessionId) return;
    sessions.leave(ctx.sessionId, socket);
    log("Client disconnected", ctx.sessionId);
    logEvent("ws.disconnect", { sessionId: ctx.sessionId });
  }

  return { handleRaw, handleClose };
}
