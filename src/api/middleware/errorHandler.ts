import type { Request, Response, NextFunction } from "express";
import { logger } from "../../lib/logger.js";
import { isRegistryError, ShareholdingInputError, TraversalTimeoutError } from "../../lib/errors.js";

type ErrorBody = { error: string; message: string; kind?: string };

function registryResponse(err: unknown): { status: number; body: ErrorBody } | null {
  if (!isRegistryError(err)) return null;
  switch (err.kind) {
    case "invalid-identifier":
      return {
        status: 400,
        body: { error: "invalid_company_number", kind: err.kind, message: `${err.message}. Check the company number (e.g. 01234567 or SC123456).` },
      };
    case "not-found":
      return {
        status: 404,
        body: { error: "company_not_found", kind: err.kind, message: `${err.message}. Check the company number.` },
      };
    case "auth":
      return {
        status: 502,
        body: { error: "registry_auth_failed", kind: err.kind, message: `${err.message}. Check the Companies House API key.` },
      };
    case "transport":
      return {
        status: 502,
        body: { error: "registry_unavailable", kind: err.kind, message: err.message },
      };
  }
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const mapped = registryResponse(err);
  if (mapped) {
    logger.warn({ path: req.originalUrl, status: mapped.status, kind: mapped.body.kind }, "Registry lookup failed");
    return res.status(mapped.status).json(mapped.body);
  }
  if (err instanceof TraversalTimeoutError) {
    logger.warn({ path: req.originalUrl, timeoutMs: err.timeoutMs }, "Ownership traversal timed out");
    return res.status(504).json({ error: "traversal_timeout", message: err.message });
  }
  if (err instanceof ShareholdingInputError) {
    return res.status(400).json({ error: "invalid_shareholding", message: err.message });
  }
  if (err instanceof RangeError) {
    return res.status(400).json({ error: "invalid_request", message: err.message });
  }

  logger.error({ path: req.originalUrl, err }, "Unhandled error");
  const message = process.env.NODE_ENV === "production" ? "Internal server error" : err instanceof Error ? err.message : String(err);
  return res.status(500).json({ error: "internal_error", message });
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({ error: "route_not_found", message: `Route ${req.method} ${req.path} not found` });
}
