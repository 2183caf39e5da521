/**
 * Handler exports
 * Barrel file for the WebSocket message handlers.
 */

export type { HandlerContext } from "./context";
export { createLearnerFlowHandler, type LearnerFlowDeps, type LearnerFlowHandlers } from "./learnerFlow";
export {
  createAdminOperationsHandler,
  isAdminMessage,
  type AdminMessage,
  type AdminOperationsDeps,
  type AdminOperationsHandlers,
} from "./adminOperations";
