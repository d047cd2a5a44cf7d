// ============================================
// API Handlers — /predict, /formats, /help, /healthz
// ============================================

import crypto from "crypto";
import type { Response } from "express";
import { runPrediction } from "../app/pipeline.js";
import type { FormatsResponse } from "../app/types.js";
import { decodeRequest, encodeResponse, type EncodedResponse } from "../codec/contentHandler.js";
import type { WireFormat } from "../codec/formats.js";
import { loadHelpDocument } from "../help/helpFile.js";
import { unmatchedRouteError, wrapError } from "../lib/errors.js";
import { createRequestLogger } from "../lib/logger.js";
import type { PredictorRequest } from "./middleware.js";

// ============================================
// Types
// ============================================

export interface PredictorAppConfig {
  predictorName: string;
  supportedRequestFormats: readonly WireFormat[];
  supportedResponseFormats: readonly WireFormat[];
  helpFile: string;
  maxBodySize: string;
}

export interface HealthResponse {
  status: "ok";
  timestamp: string;
}

function requestIdOf(req: PredictorRequest): string {
  return req.requestId ?? crypto.randomUUID().slice(0, 8);
}

function sendEncoded(res: Response, encoded: EncodedResponse): void {
  res.status(encoded.statusCode).type(encoded.contentType).send(encoded.body);
}

// ============================================
// Error Translation
// ============================================

/**
 * Boundary translator: every handler funnels its failures through here.
 * Known errors keep their key and status; anything else is a server_error.
 * The body is always JSON.
 */
export function sendError(
  err: unknown,
  requestId: string,
  res: Response,
  predictorName: string
): void {
  const appError = wrapError(err, requestId);
  const log = createRequestLogger(requestId, "api");

  if (appError.errorKey === "server_error") {
    log.error("Request failed", {
      errorKey: appError.errorKey,
      error: appError.cause ?? appError,
    });
  } else {
    log.warn("Request rejected", {
      errorKey: appError.errorKey,
      statusCode: appError.statusCode,
      messages: appError.messages,
    });
  }

  try {
    sendEncoded(
      res,
      encodeResponse(appError.toPayload(), {
        statusCode: appError.statusCode,
        isError: true,
        predictorName,
      })
    );
  } catch (encodeErr) {
    log.error("Failed to encode error response", { error: encodeErr });
    res.status(500).type("application/json").send(
      JSON.stringify({
        predictor_name: predictorName,
        error: [{ server_error: "Failed to serialize error response." }],
      })
    );
  }
}

// ============================================
// Handlers
// ============================================

/**
 * POST /predict — decode, validate, preprocess, predict, encode.
 */
export function createPredictHandler(appConfig: PredictorAppConfig) {
  const { predictorName, supportedRequestFormats, supportedResponseFormats } = appConfig;

  return (req: PredictorRequest, res: Response): void => {
    const requestId = requestIdOf(req);
    const log = createRequestLogger(requestId, "api");
    const startTime = Date.now();

    try {
      const body: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const { format, payload } = decodeRequest(
        body,
        req.headers["content-type"],
        supportedRequestFormats
      );

      const requestLog = log.withContext({ requestFormat: format });
      requestLog.withStage("codec").debug("Request decoded", { bytes: body.length });

      const response = runPrediction(payload, { predictorName, log: requestLog });
      const encoded = encodeResponse(response, {
        statusCode: 200,
        acceptHeader: req.headers.accept,
        supportedResponseFormats,
        predictorName,
      });

      sendEncoded(res, encoded);

      requestLog.info("Prediction request completed", {
        responseFormat: encoded.contentType,
        taskCount: response.prediction_tasks.length,
        latencyMs: Date.now() - startTime,
      });
    } catch (err) {
      sendError(err, requestId, res, predictorName);
    }
  };
}

/**
 * GET /formats — the media types this predictor reads and writes.
 */
export function createFormatsHandler(appConfig: PredictorAppConfig) {
  const { predictorName, supportedRequestFormats, supportedResponseFormats } = appConfig;

  return (req: PredictorRequest, res: Response): void => {
    const requestId = requestIdOf(req);

    try {
      const formats: FormatsResponse = {
        predictor_supported_request_formats: [...supportedRequestFormats],
        predictor_supported_response_formats: [...supportedResponseFormats],
      };
      sendEncoded(
        res,
        encodeResponse(formats, {
          acceptHeader: req.headers.accept,
          supportedResponseFormats,
          predictorName,
        })
      );
    } catch (err) {
      sendError(err, requestId, res, predictorName);
    }
  };
}

/**
 * GET /help — the predictor's help document.
 */
export function createHelpHandler(appConfig: PredictorAppConfig) {
  const { predictorName, supportedResponseFormats, helpFile } = appConfig;

  return async (req: PredictorRequest, res: Response): Promise<void> => {
    const requestId = requestIdOf(req);

    try {
      const document = await loadHelpDocument(helpFile);
      createRequestLogger(requestId, "help").debug("Help document loaded", { helpFile });
      sendEncoded(
        res,
        encodeResponse(document, {
          acceptHeader: req.headers.accept,
          supportedResponseFormats,
          predictorName,
        })
      );
    } catch (err) {
      sendError(err, requestId, res, predictorName);
    }
  };
}

/**
 * GET /healthz — liveness probe.
 */
export function createHealthHandler(appConfig: PredictorAppConfig) {
  const { predictorName, supportedResponseFormats } = appConfig;

  return (req: PredictorRequest, res: Response): void => {
    const requestId = requestIdOf(req);

    try {
      const health: HealthResponse = {
        status: "ok",
        timestamp: new Date().toISOString(),
      };
      sendEncoded(
        res,
        encodeResponse(health, {
          acceptHeader: req.headers.accept,
          supportedResponseFormats,
          predictorName,
        })
      );
    } catch (err) {
      sendError(err, requestId, res, predictorName);
    }
  };
}

/**
 * Fallback for anything the route table does not match: 405 for a known
 * path with the wrong method, 404 otherwise. Same error body as every
 * other failure.
 */
export function createUnmatchedRouteHandler(
  appConfig: PredictorAppConfig,
  routes: Readonly<Record<string, string>>
) {
  const { predictorName } = appConfig;

  return (req: PredictorRequest, res: Response): void => {
    const requestId = requestIdOf(req);
    const allowed = Object.hasOwn(routes, req.path) ? routes[req.path] : undefined;

    if (allowed !== undefined) {
      res.setHeader("Allow", allowed);
      sendError(
        unmatchedRouteError(`Method ${req.method} is not allowed on ${req.path}. Use ${allowed}.`, 405),
        requestId,
        res,
        predictorName
      );
      return;
    }

    sendError(
      unmatchedRouteError(`No route for ${req.method} ${req.path}.`, 404),
      requestId,
      res,
      predictorName
    );
  };
}
