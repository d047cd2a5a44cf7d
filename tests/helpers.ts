// ============================================
// Shared test helpers
// ============================================

import { PredictorError } from "../src/lib/errors.js";

/** Run `fn` and return the PredictorError it throws. */
export function captureError(fn: () => unknown): PredictorError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PredictorError) return err;
    throw err;
  }
  throw new Error("expected a PredictorError to be thrown");
}

export function makeTask(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: "task-1",
    type: "accessibility",
    cell_type: "K562",
    species: "homo_sapiens",
    ...overrides,
  };
}

export function makePayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    readout: "point",
    prediction_tasks: [makeTask()],
    sequences: { s1: "ACGCGT" },
    ...overrides,
  };
}
