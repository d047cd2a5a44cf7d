// ============================================
// Sequence preprocessing — flanking, range trimming
// and model alphabet checks
// ============================================

import { badRequestError, predictionFailedError } from "../lib/errors.js";
import type { RequestLogger } from "../lib/logger.js";
import { ErrorAccumulator } from "../validation/accumulator.js";
import type { Readout } from "../validation/checks.js";
import type { PredictionRange, PredictionRequest } from "../validation/schema.js";

export type SequenceMap = Record<string, string>;

/** Readouts this model can produce. */
export const SUPPORTED_READOUTS = ["point", "track"] as const;
export type SupportedReadout = (typeof SUPPORTED_READOUTS)[number];

export const VALID_BASES: ReadonlySet<string> = new Set(["A", "T", "C", "G", "N"]);

export interface PreprocessedInput {
  readout: SupportedReadout;
  sequences: SequenceMap;
}

export interface PreprocessOptions {
  predictorName: string;
  log?: RequestLogger;
}

export function isSupportedReadout(readout: Readout): readout is SupportedReadout {
  return SUPPORTED_READOUTS.some((supported) => supported === readout);
}

/** Prefix and suffix every sequence. Returns a new map. */
export function applyFlanks(
  sequences: Readonly<SequenceMap>,
  upstream = "",
  downstream = ""
): SequenceMap {
  return Object.fromEntries(
    Object.entries(sequences).map(([seqId, seq]): [string, string] => [
      seqId,
      `${upstream}${seq}${downstream}`,
    ])
  );
}

/**
 * Trim sequences to their inclusive `[start, end]` range.
 * Empty ranges and ids without a range are left as they are.
 */
export function applyPredictionRanges(
  sequences: Readonly<SequenceMap>,
  ranges: Readonly<Record<string, PredictionRange>> = {}
): SequenceMap {
  return Object.fromEntries(
    Object.entries(sequences).map(([seqId, seq]): [string, string] => {
      const range = Object.hasOwn(ranges, seqId) ? ranges[seqId] : undefined;
      if (!range || range.length === 0) return [seqId, seq];
      const [start, end] = range;
      return [seqId, seq.slice(start, end + 1)];
    })
  );
}

/** Every sequence must be non-empty and drawn from A, C, G, T, N (any case). */
export function checkSequenceSpecs(sequences: Readonly<SequenceMap>): string[] {
  const errors: string[] = [];

  for (const [seqId, seq] of Object.entries(sequences)) {
    if (seq.length === 0) {
      errors.push(`sequence '${seqId}' is empty`);
      continue;
    }

    const invalid = [...new Set(seq.toUpperCase())].filter((base) => !VALID_BASES.has(base));
    if (invalid.length > 0) {
      errors.push(
        `sequence '${seqId}' has invalid character(s): ${invalid.sort().map((c) => `'${c}'`).join(", ")}`
      );
    }
  }

  return errors;
}

/**
 * Produce the sequences the model runs on.
 *
 * Flanks are applied before ranges, so ranges index into flanked
 * coordinates. The request itself is never modified.
 */
export function preprocessSequences(
  request: PredictionRequest,
  options: PreprocessOptions
): PreprocessedInput {
  const { predictorName, log } = options;
  const upstream = request.upstream_seq ?? "";
  const downstream = request.downstream_seq ?? "";

  let sequences: SequenceMap = { ...request.sequences };

  if (upstream || downstream) {
    log?.debug("Applying flanking sequences", {
      upstreamBases: upstream.length,
      downstreamBases: downstream.length,
      sequenceCount: Object.keys(sequences).length,
    });
    sequences = applyFlanks(sequences, upstream, downstream);
  }

  if (request.prediction_ranges) {
    sequences = applyPredictionRanges(sequences, request.prediction_ranges);
    log?.debug("Applied prediction ranges", {
      trimmed: Object.values(request.prediction_ranges).filter((r) => r.length > 0).length,
    });
  }

  const errors = new ErrorAccumulator(predictionFailedError).add(checkSequenceSpecs(sequences));

  const { readout } = request;
  if (!isSupportedReadout(readout)) {
    throw badRequestError(`${predictorName} cannot process '${readout}' readout type.`);
  }

  if (errors.hasErrors()) {
    log?.info("Sequences failed model checks", { violations: errors.messages.length });
  }
  errors.throwIfAny();

  return { readout, sequences };
}
