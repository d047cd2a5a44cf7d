// ============================================
// Response Types
// ============================================

import type { Predictions } from "../predict/cpg.js";
import type { Scale } from "../validation/checks.js";

/** Placeholder for fields this model does not remap. */
export const NOT_APPLICABLE = "NA";

export interface TaskPrediction {
  name: string;
  type_requested: string;
  type_actual: string[];
  cell_type_requested: string;
  cell_type_actual: string;
  species_requested: string;
  species_actual: string;
  scale_prediction_requested: Scale | null;
  scale_prediction_actual: Scale;
  predictions: Predictions;
}

export interface PointPredictionResponse {
  predictor_name: string;
  prediction_tasks: TaskPrediction[];
}

/** Track predictions carry one value per base, so `bin_size` is always 1. */
export interface TrackPredictionResponse {
  predictor_name: string;
  bin_size: 1;
  prediction_tasks: TaskPrediction[];
}

export type PredictionResponse = PointPredictionResponse | TrackPredictionResponse;

export interface FormatsResponse {
  predictor_supported_request_formats: string[];
  predictor_supported_response_formats: string[];
}
