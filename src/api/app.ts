// ============================================
// Express app — route table for the predictor
// Built once at startup; holds no per-request state
// ============================================

import express from "express";
import { config } from "../config/env.js";
import {
  createFormatsHandler,
  createHealthHandler,
  createHelpHandler,
  createPredictHandler,
  createUnmatchedRouteHandler,
  type PredictorAppConfig,
} from "./handler.js";
import { addRequestId, handleBodyErrors, logRequests } from "./middleware.js";

/** App settings taken from the validated environment. */
export function appConfigFromEnv(): PredictorAppConfig {
  return {
    predictorName: config.predictor.name,
    supportedRequestFormats: config.predictor.supportedRequestFormats,
    supportedResponseFormats: config.predictor.supportedResponseFormats,
    helpFile: config.predictor.helpFile,
    maxBodySize: config.maxBodySize,
  };
}

export function createPredictorApp(
  overrides: Partial<PredictorAppConfig> = {}
): express.Application {
  const appConfig: PredictorAppConfig = { ...appConfigFromEnv(), ...overrides };
  const app = express();

  app.disable("x-powered-by");
  app.use(addRequestId);
  app.use(logRequests);

  app.get("/healthz", createHealthHandler(appConfig));
  app.get("/formats", createFormatsHandler(appConfig));
  app.get("/help", createHelpHandler(appConfig));

  // Bodies are read raw: the Content-Type decides how they are decoded
  app.post(
    "/predict",
    express.raw({ type: () => true, limit: appConfig.maxBodySize }),
    createPredictHandler(appConfig)
  );

  app.use(
    createUnmatchedRouteHandler(appConfig, {
      "/healthz": "GET",
      "/formats": "GET",
      "/help": "GET",
      "/predict": "POST",
    })
  );
  app.use(handleBodyErrors(appConfig.predictorName));

  return app;
}
