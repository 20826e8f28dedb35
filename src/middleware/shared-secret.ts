import type { Request, Response, NextFunction } from "express";
import { getSharedSecret } from "../config/app-config";

export const SHARED_SECRET_HEADER = "x-proxy-secret";

/**
 * Middleware: verifySharedSecret
 * Only enforced when PROXY_SHARED_SECRET is set; otherwise the proxy is open.
 */
export function verifySharedSecret(
  req: Request,
  res: Response,
  next: NextFunction,
) {
  const want = getSharedSecret();
  if (!want) return next();

  const got = req.header(SHARED_SECRET_HEADER);
  if (!got || want !== got) {
    return res.status(403).json({
      error: "Forbidden: invalid or missing shared secret",
    });
  }

  return next();
}
