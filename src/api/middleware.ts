// ============================================
// API Middleware — request ids, access log, body errors
// ============================================

import crypto from "crypto";
import type { ErrorRequestHandler, NextFunction, Request, Response } from "express";
import { badRequestError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { sendError } from "./handler.js";

export type PredictorRequest = Request & { requestId?: string };

// ============================================
// Request ID Middleware
// ============================================

/**
 * Add request ID to all requests for tracing.
 */
export function addRequestId(req: PredictorRequest, res: Response, next: NextFunction): void {
  const header = req.headers["x-request-id"];
  const requestId =
    typeof header === "string" && header.length > 0 ? header : crypto.randomUUID().slice(0, 8);
  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}

// ============================================
// Access Log
// ============================================

/**
 * Log one line per finished response.
 */
export function logRequests(req: PredictorRequest, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on("finish", () => {
    logger.info("Request complete", {
      stage: "api",
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      contentType: res.getHeader("Content-Type"),
      latencyMs: Date.now() - startTime,
    });
  });

  next();
}

// ============================================
// Body Errors
// ============================================

interface BodyParserError extends Error {
  type?: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return err instanceof Error && "type" in err && typeof err.type === "string";
}

/**
 * Translate failures raised while reading the request body (too large,
 * aborted, bad encoding) into bad_prediction_request. Anything else
 * becomes a server_error through the same translator.
 */
export function handleBodyErrors(predictorName: string): ErrorRequestHandler {
  return (err: unknown, req: PredictorRequest, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const requestId = req.requestId ?? crypto.randomUUID().slice(0, 8);
    const error = isBodyParserError(err)
      ? badRequestError(`Could not read request body: ${err.message}`, err)
      : err;

    sendError(error, requestId, res, predictorName);
  };
}
