import type { Request } from "express";
import type { Reconciler } from "../scheduler/reconciler.js";
import type { CommandStatus } from "../types.js";

export interface AppContext {
  reconciler: Reconciler;
}

export function getParam(req: Request, key: string): string {
  const v = req.params[key];
  return (Array.isArray(v) ? v[0] : v) ?? "";
}

const COMMAND_HTTP_STATUS: Record<CommandStatus, number> = {
  ok: 200,
  not_found: 404,
  invalid_interval: 400,
  // engine changed, metadata mirror did not
  partial_failure: 207,
};

export function httpStatusFor(status: CommandStatus): number {
  return COMMAND_HTTP_STATUS[status];
}
