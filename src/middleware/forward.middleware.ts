import type { NextFunction, Request } from "express";
import type { UpstreamForwarder } from "../forwarder/upstream";
import { type GuardResponse, getGuardContext } from "./guard.context";

export function forwardRequest(forwarder: UpstreamForwarder) {
  return (req: Request, res: GuardResponse, next: NextFunction) => {
    const guard = getGuardContext(res);
    forwarder.forward(req, res, guard.body, guard.clientIp).catch(next);
  };
}
