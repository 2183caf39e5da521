/**
 * Admin Operations Handler
 * Login/logout plus the admin-only scenario and settings operations.
 */

import type { AdminResult, AdminService } from "../admin/adminService";
import type { ClientToServerMessage, ServerToClientMessage } from "../messageTypes";
import type { AdminSettingsPatch } from "../persistence/types";
import type { HandlerContext } from "./context";

export type AdminMessage = Extract<
  ClientToServerMessage,
  {
    type:
      | "admin_login"
      | "admin_logout"
      | "admin_list_scenarios"
      | "admin_save_scenario"
      | "admin_delete_scenario"
      | "admin_update_settings"
      | "admin_refresh_reference"
      | "admin_status";
  }
>;

export interface AdminOperationsDeps {
  admin: AdminService;
}

export interface AdminOperationsHandlers {
  handleAdminMessage: (ctx: HandlerContext, msg: AdminMessage) => Promise<void>;
}

export function isAdminMessage(msg: ClientToServerMessage): msg is AdminMessage {
  return msg.type.startsWith("admin_");
}

/**
 * Factory function to create admin handlers with injected dependencies
 */
export function createAdminOperationsHandler(deps: AdminOperationsDeps): AdminOperationsHandlers {
  const { admin } = deps;

  function replyResult<T>(
    ctx: HandlerContext,
    operation: string,
    result: AdminResult<T>,
    toMessage: (value: T) => ServerToClientMessage
  ) {
    ctx.reply(result.ok ? toMessage(result.value) : { type: "admin_error", operation, status: result.status });
  }

  async function handleAdminMessage(ctx: HandlerContext, msg: AdminMessage) {
    if (msg.type === "admin_login") {
      ctx.reply({ type: "admin_login_result", ok: admin.login(ctx.store, msg.code) });
      return;
    }
    if (msg.type === "admin_logout") {
      admin.logout(ctx.store);
      ctx.reply({ type: "admin_login_result", ok: false });
      return;
    }
    if (!ctx.store.get("isAdmin", false)) {
      ctx.reply({ type: "admin_error", operation: msg.type, status: "forbidden: admin login required" });
      return;
    }

    switch (msg.type) {
      case "admin_list_scenarios":
        replyResult(ctx, msg.type, await admin.listScenarios(), (scenarios) => ({
          type: "admin_scenarios",
          scenarios,
        }));
        return;
      case "admin_save_scenario":
        replyResult(ctx, msg.type, await admin.saveScenario(msg.scenario, msg.id), (scenario) => ({
          type: "admin_scenario_saved",
          scenario,
        }));
        return;
      case "admin_delete_scenario":
        replyResult(ctx, msg.type, await admin.deleteScenario(msg.id), ({ id }) => ({
          type: "admin_scenario_deleted",
          id,
        }));
        return;
      case "admin_update_settings": {
        const patch: AdminSettingsPatch = { ...msg.settings };
        replyResult(ctx, msg.type, await admin.updateSettings(patch), (settings) => ({
          type: "admin_settings",
          settings,
        }));
        return;
      }
      case "admin_refresh_reference":
        replyResult(ctx, msg.type, await admin.refreshReference(msg.name), (outcome) => ({
          type: "admin_reference",
          outcome,
        }));
        return;
      case "admin_status":
        ctx.reply({ type: "admin_status", status: await admin.status() });
        return;
    }
  }

  return { handleAdminMessage };
}
