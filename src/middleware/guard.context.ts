import type { Response } from "express";
import type { GuardContext } from "../types/guard";

export type GuardLocals = { guard?: GuardContext };

export type GuardResponse = Response<unknown, GuardLocals>;

export function getGuardContext(res: GuardResponse): GuardContext {
  const guard = res.locals.guard;
  if (!guard) {
    throw new Error("guard context missing: sanitizeBody must run first");
  }
  return guard;
}
