import { z } from "zod";
import { RETRIEVAL_MODES } from "./config";
import { PAGES } from "./flow/accessGuard";
import type { ClientToServerMessage } from "./messageTypes";

const text = z.string().max(20000);

const artifactSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("message"), role: z.enum(["user", "assistant"]), content: text }),
  z.object({ kind: z.literal("physicalExam"), text }),
  z.object({ kind: z.literal("differentials"), text }),
  z.object({ kind: z.literal("diagnosticRound"), request: text.min(1), findings: text.nullable().optional() }),
  z.object({ kind: z.literal("finalDiagnosis"), text }),
  z.object({ kind: z.literal("therapy"), text }),
  z.object({ kind: z.literal("feedback"), text }),
  z.object({ kind: z.literal("instructionsConfirmed") }),
  z.object({ kind: z.literal("offlineMode"), enabled: z.boolean() }),
]);

const settingsPatchSchema = z
  .object({
    scenarioPin: z.string().trim().nullable().optional(),
    behaviorPin: z.string().trim().nullable().optional(),
    retrievalModePin: z.enum(RETRIEVAL_MODES).nullable().optional(),
    retrievalProbability: z.number().min(0).max(1).nullable().optional(),
  })
  .strict();

const messageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("join"), sessionId: z.string().min(1).max(200) }),
  z.object({ type: z.literal("navigate"), page: z.enum(PAGES) }),
  z.object({ type: z.literal("prepare_case") }),
  z.object({ type: z.literal("record_artifact"), artifact: artifactSchema }),
  z.object({ type: z.literal("complete_evaluation") }),
  z.object({ type: z.literal("start_new_scenario") }),
  z.object({ type: z.literal("download_protocol") }),
  z.object({ type: z.literal("ping") }),
  z.object({ type: z.literal("admin_login"), code: z.string().min(1).max(500) }),
  z.object({ type: z.literal("admin_logout") }),
  z.object({ type: z.literal("admin_list_scenarios") }),
  z.object({
    type: z.literal("admin_save_scenario"),
    id: z.string().min(1).optional(),
    scenario: z.record(z.unknown()),
  }),
  z.object({ type: z.literal("admin_delete_scenario"), id: z.string().min(1) }),
  z.object({ type: z.literal("admin_update_settings"), settings: settingsPatchSchema }),
  z.object({ type: z.literal("admin_refresh_reference"), name: z.string().trim().min(1) }),
  z.object({ type: z.literal("admin_status") }),
  z.object({ type: z.literal("debug_snapshot") }),
]);

export function validateMessage(raw: unknown): ClientToServerMessage | null {
  const parsed = messageSchema.safeParse(raw);
  if (!parsed.success) return null;
  return parsed.data;
}
