import { Request, Response, NextFunction } from "express";
import { getLogger } from "../utils/logger";

const log = getLogger("http");

export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const startedAt = process.hrtime.bigint();
  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    log.http(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
      durationMs: Math.round(durationMs),
    });
  });
  next();
};
