// ============================================
// API Module — HTTP surface of the predictor
// ============================================

export { createPredictorApp, appConfigFromEnv } from "./app.js";

export {
  addRequestId,
  logRequests,
  handleBodyErrors,
  type PredictorRequest,
} from "./middleware.js";

export {
  createPredictHandler,
  createFormatsHandler,
  createHelpHandler,
  createHealthHandler,
  createUnmatchedRouteHandler,
  sendError,
  type PredictorAppConfig,
  type HealthResponse,
} from "./handler.js";
