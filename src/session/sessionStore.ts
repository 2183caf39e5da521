import { CASE_KEYS, SESSION_KEYS, type SessionKey, type SessionState } from "./sessionState";

/**
 * Per-session key/value state shared by every page handler of one learner.
 * Nothing here is persisted; a new process starts with empty sessions.
 */
export class SessionStore {
  private values: Partial<SessionState> = {};

  get<K extends SessionKey>(key: K): SessionState[K] | undefined;
  get<K extends SessionKey>(key: K, fallback: SessionState[K]): SessionState[K];
  get<K extends SessionKey>(key: K, fallback?: SessionState[K]): SessionState[K] | undefined {
    const value = this.values[key];
    return value === undefined ? fallback : value;
  }

  set<K extends SessionKey>(key: K, value: SessionState[K]): void {
    this.values[key] = value;
  }

  has(key: SessionKey): boolean {
    return this.values[key] !== undefined;
  }

  delete(key: SessionKey): void {
    delete this.values[key];
  }

  /** Drop every case-bound key. Session flags and the pending warning stay. */
  clearCaseKeys(): void {
    for (const key of CASE_KEYS) {
      delete this.values[key];
    }
  }

  setPendingWarning(message: string): void {
    this.values.pendingWarning = message;
  }

  /** Read-then-delete: a warning is shown once. */
  takePendingWarning(): string | null {
    const warning = this.values.pendingWarning;
    delete this.values.pendingWarning;
    return warning ?? null;
  }

  keys(): SessionKey[] {
    return SESSION_KEYS.filter((key) => this.has(key));
  }
}
