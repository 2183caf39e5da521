import type { CaseFlow } from "../flow/caseFlow";
import type { ServerToClientMessage } from "../messageTypes";
import type { SessionStore } from "../session/sessionStore";

/** What a handler sees of the session that sent the message. */
export type HandlerContext = {
  sessionId: string;
  store: SessionStore;
  flow: CaseFlow;
  socketCount: number;
  /** Answer the sending socket. */
  reply: (msg: ServerToClientMessage) => void;
  /** Notify the session's other sockets (tabs). */
  broadcastOthers: (msg: ServerToClientMessage) => void;
};
