import { Request, Response, NextFunction } from "express";
import { uuidSchema } from "../validation/cart";

export interface AuthRequest extends Request {
  /** Verified id of the caller, set by the gateway in a header. */
  callerId?: string;
}

/**
 * Reads the caller identity header. A missing or malformed header leaves
 * the request anonymous; identity-gated operations then fail.
 */
export const identifyCaller = (headerName: string) => {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const parsed = uuidSchema.safeParse(req.get(headerName));
    req.callerId = parsed.success ? parsed.data : undefined;
    next();
  };
};
