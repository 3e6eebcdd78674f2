import type { NextFunction, Request, Response } from "express";
import { logger } from "../utils/logger";

function errorType(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "type" in err && typeof err.type === "string") {
    return err.type;
  }
  return undefined;
}

export function notFound(_req: Request, res: Response) {
  res.status(404).json({ message: "Not Found" });
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (errorType(err) === "entity.too.large") {
    res.status(413).json({ message: "Payload Too Large" });
    return;
  }

  logger.error({ err, method: req.method, path: req.path }, "unhandled request error");
  res.status(500).json({ message: "Internal Server Error" });
}
