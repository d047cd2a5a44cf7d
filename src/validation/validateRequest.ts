// ============================================
// Request validation — staged, accumulating checks
// ============================================

import { badRequestError, serverError } from "../lib/errors.js";
import type { RequestLogger } from "../lib/logger.js";
import { ErrorAccumulator } from "./accumulator.js";
import {
  checkContainerShapes,
  checkFlank,
  checkMandatoryKeys,
  checkPredictionRanges,
  checkReadout,
  checkTaskCellTypes,
  checkTaskMandatoryKeys,
  checkTaskNames,
  checkTaskScales,
  checkTaskSpecies,
  checkTaskTypes,
} from "./checks.js";
import { predictionRequestSchema, type PredictionRequest } from "./schema.js";
import { isRecord } from "./wireValue.js";

type Payload = Record<string, unknown>;

/**
 * Validate a decoded request payload.
 *
 * Stages run in order. Top-level keys, container shapes and per-task
 * keys are gates: later checks read those keys, so a failure there is
 * raised on its own. Everything after the gates runs to completion and
 * all messages are raised together as one bad_prediction_request.
 */
export function validateRequestPayload(payload: Payload, log?: RequestLogger): PredictionRequest {
  const errors = new ErrorAccumulator(badRequestError);

  // Stage 1: mandatory top-level keys
  errors.add(checkMandatoryKeys(payload)).throwIfAny();

  // Stage 2: containers and mandatory task keys
  errors.add(checkContainerShapes(payload)).throwIfAny();

  const tasks = asRecords(payload["prediction_tasks"]);
  const rawSequences = payload["sequences"];
  const sequences = isRecord(rawSequences) ? rawSequences : {};

  errors.add(checkTaskMandatoryKeys(tasks)).throwIfAny();

  // Stage 3: values
  errors
    .add(checkReadout(payload["readout"]))
    .add(checkTaskNames(tasks))
    .add(checkTaskTypes(tasks))
    .add(checkTaskCellTypes(tasks))
    .add(checkTaskSpecies(tasks))
    .add(checkTaskScales(tasks));

  // Stage 4: prediction ranges against the sequences as submitted
  if (Object.hasOwn(payload, "prediction_ranges")) {
    errors.add(checkPredictionRanges(payload["prediction_ranges"], sequences));
  }

  // Stage 5: flanks
  if (Object.hasOwn(payload, "upstream_seq")) {
    errors.add(checkFlank("upstream_seq", payload["upstream_seq"]));
  }
  if (Object.hasOwn(payload, "downstream_seq")) {
    errors.add(checkFlank("downstream_seq", payload["downstream_seq"]));
  }

  if (errors.hasErrors()) {
    log?.info("Request rejected", { violations: errors.messages.length });
  }
  errors.throwIfAny();

  const parsed = predictionRequestSchema.safeParse(payload);
  if (!parsed.success) {
    throw serverError(
      `Validated request did not match the request model: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      parsed.error
    );
  }

  log?.debug("Request validated", {
    readout: parsed.data.readout,
    taskCount: parsed.data.prediction_tasks.length,
    sequenceCount: Object.keys(parsed.data.sequences).length,
  });

  return parsed.data;
}

function asRecords(value: unknown): Payload[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}
