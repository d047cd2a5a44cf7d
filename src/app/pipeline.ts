// ============================================
// Pipeline — validate, preprocess, predict
// ============================================

import type { Payload } from "../codec/contentHandler.js";
import type { RequestLogger } from "../lib/logger.js";
import { predictCpg } from "../predict/cpg.js";
import { preprocessSequences } from "../preprocess/preprocessSequences.js";
import { validateRequestPayload } from "../validation/validateRequest.js";
import { NOT_APPLICABLE, type PredictionResponse, type TaskPrediction } from "./types.js";

export interface PipelineOptions {
  predictorName: string;
  log?: RequestLogger;
}

/**
 * Execute a prediction request.
 *
 * Flow:
 * 1. Validate the decoded payload (bad_prediction_request)
 * 2. Flank, trim and check sequences (prediction_request_failed)
 * 3. Run the model once per task, in task order
 */
export function runPrediction(payload: Payload, options: PipelineOptions): PredictionResponse {
  const { predictorName, log } = options;

  const request = validateRequestPayload(payload, log?.withStage("validation"));
  const { readout, sequences } = preprocessSequences(request, {
    predictorName,
    log: log?.withStage("preprocess"),
  });

  const tasks: TaskPrediction[] = request.prediction_tasks.map((task) => {
    const { predictions, scaleActual } = predictCpg(sequences, readout, task.scale);
    return {
      name: task.name,
      type_requested: task.type,
      type_actual: [NOT_APPLICABLE],
      cell_type_requested: task.cell_type,
      cell_type_actual: NOT_APPLICABLE,
      species_requested: task.species,
      species_actual: NOT_APPLICABLE,
      scale_prediction_requested: task.scale ?? null,
      scale_prediction_actual: scaleActual,
      predictions,
    };
  });

  log?.withStage("predict").info("Predictions computed", {
    readout,
    taskCount: tasks.length,
    sequenceCount: Object.keys(sequences).length,
  });

  if (readout === "track") {
    return { predictor_name: predictorName, bin_size: 1, prediction_tasks: tasks };
  }
  return { predictor_name: predictorName, prediction_tasks: tasks };
}
