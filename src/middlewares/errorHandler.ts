import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { AppError } from "../utils/errors";
import { describeError, getLogger } from "../utils/logger";

const log = getLogger("http");

const describeIssues = (error: ZodError): string =>
  error.issues
    .map((issue) =>
      issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");

// Raised by express.json() for unparseable bodies
const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError && "status" in err && err.status === 400;

// Must be registered after every route
const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (err instanceof ZodError) {
    log.warn("Rejected invalid input", {
      method: req.method,
      url: req.originalUrl,
      issues: err.issues,
    });
    res.status(400).json({
      success: false,
      error: { code: "INVALID_INPUT", message: describeIssues(err) },
    });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({
      success: false,
      error: { code: "INVALID_INPUT", message: "Malformed JSON body" },
    });
    return;
  }

  if (err instanceof AppError) {
    const level = err.statusCode >= 500 ? "error" : "warn";
    log.log(level, err.message, {
      code: err.code,
      method: req.method,
      url: req.originalUrl,
    });
    res.status(err.statusCode).json({
      success: false,
      error: { code: err.code, message: err.message },
    });
    return;
  }

  log.error("Unhandled error", {
    method: req.method,
    url: req.originalUrl,
    error: describeError(err),
  });
  res.status(500).json({
    success: false,
    error: { code: "INTERNAL_ERROR", message: "Internal server error" },
  });
};

/**
 * Error handler for bus deliveries: the bus only gets a status code, the
 * detail goes to the log. An envelope that cannot be parsed is answered with
 * 404, which the sidecar treats as "drop"; every other failure asks for
 * redelivery with 500.
 */
export const eventErrorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (err instanceof ZodError || isBodyParseError(err)) {
    log.warn("Dropping malformed event", {
      url: req.originalUrl,
      error: err instanceof ZodError ? err.issues : describeError(err),
    });
    res.sendStatus(404);
    return;
  }
  log.error("Handling event failed", {
    url: req.originalUrl,
    error: describeError(err),
  });
  res.sendStatus(500);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    success: false,
    error: { code: "NOT_FOUND", message: `Route ${req.originalUrl} not found` },
  });
};

export default errorHandler;
