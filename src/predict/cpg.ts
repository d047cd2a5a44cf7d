// ============================================
// CpG density — deterministic placeholder model
// ============================================

import type { Scale } from "../validation/checks.js";
import type { SequenceMap, SupportedReadout } from "../preprocess/preprocessSequences.js";

/** Smoothing added before taking log2 so a CpG-free sequence stays finite. */
export const EPSILON = 1e-9;

export const TRACK_WINDOW_SIZE = 50;

export type Predictions = Record<string, number[]>;

export interface CpgResult {
  predictions: Predictions;
  scaleActual: Scale;
}

/** Number of positions i where s[i..i+2) is "CG". Expects upper case. */
export function countCpg(seq: string): number {
  let count = 0;
  for (let i = 0; i < seq.length - 1; i++) {
    if (seq[i] === "C" && seq[i + 1] === "G") count++;
  }
  return count;
}

/** CpG sites per base over the whole sequence. */
export function cpgMean(seq: string, scale: Scale): number {
  const s = seq.toUpperCase();
  const mean = (countCpg(s) + EPSILON) / s.length;
  return scale === "log" ? Math.log2(mean) : mean;
}

/**
 * CpGs per 100 bp around every base.
 *
 * The window for position i is [i - half, i + half) clipped to the
 * sequence, and CpGs are counted on that clipped substring.
 */
export function cpgPerBase(
  seq: string,
  scale: Scale,
  windowSize: number = TRACK_WINDOW_SIZE
): number[] {
  const s = seq.toUpperCase();
  const half = Math.floor(windowSize / 2);
  const track: number[] = [];

  for (let i = 0; i < s.length; i++) {
    const start = Math.max(0, i - half);
    const end = Math.min(s.length, i + half);
    const windowLength = end - start;
    const density = windowLength > 0 ? (countCpg(s.slice(start, end)) / windowLength) * 100 : 0;
    track.push(scale === "log" ? Math.log2(density + EPSILON) : density);
  }

  return track;
}

/** Run the model for one task. A missing scale means linear. */
export function predictCpg(
  sequences: Readonly<SequenceMap>,
  readout: SupportedReadout,
  scaleRequested?: Scale
): CpgResult {
  const scaleActual: Scale = scaleRequested ?? "linear";
  const predictions: Predictions = {};

  for (const [seqId, seq] of Object.entries(sequences)) {
    predictions[seqId] =
      readout === "point" ? [cpgMean(seq, scaleActual)] : cpgPerBase(seq, scaleActual);
  }

  return { predictions, scaleActual };
}
