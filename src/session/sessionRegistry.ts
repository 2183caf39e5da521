import { CaseFlow } from "../flow/caseFlow";
import { log } from "../logger";
import { SessionStore } from "./sessionStore";

export type CaseSession<S> = {
  id: string;
  store: SessionStore;
  flow: CaseFlow;
  sockets: Set<S>;
};

/**
 * Learner sessions keyed by session id. A session outlives a reconnect: it is
 * only dropped after its last socket left and `idleTtlMs` passed without a
 * new join.
 */
export class SessionRegistry<S> {
  private sessions = new Map<string, CaseSession<S>>();
  private idleTimers = new Map<string, NodeJS.Timeout>();

  constructor(private readonly idleTtlMs: number) {}

  join(sessionId: string, socket: S): CaseSession<S> {
    this.cancelIdle(sessionId);
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = {
        id: sessionId,
        store: new SessionStore(),
        flow: new CaseFlow(sessionId),
        sockets: new Set(),
      };
      this.sessions.set(sessionId, session);
      log("[sessions] Created session", sessionId);
    }
    session.sockets.add(socket);
    return session;
  }

  leave(sessionId: string, socket: S): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    session.sockets.delete(socket);
    if (session.sockets.size > 0) return;

    const timer = setTimeout(() => {
      this.idleTimers.delete(sessionId);
      const current = this.sessions.get(sessionId);
      if (current && current.sockets.size === 0) {
        this.sessions.delete(sessionId);
        log("[sessions] Dropped idle session", sessionId);
      }
    }, this.idleTtlMs);
    timer.unref?.();
    this.idleTimers.set(sessionId, timer);
  }

  get(sessionId: string): CaseSession<S> | undefined {
    return this.sessions.get(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }

  dispose(): void {
    for (const timer of this.idleTimers.values()) clearTimeout(timer);
    this.idleTimers.clear();
    this.sessions.clear();
  }

  private cancelIdle(sessionId: string): void {
    const timer = this.idleTimers.get(sessionId);
    if (timer) {
      clearTimeout(timer);
      this.idleTimers.delete(sessionId);
    }
  }
}
