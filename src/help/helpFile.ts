// ============================================
// Help document — static predictor metadata served by /help
// ============================================

import { readFile } from "fs/promises";
import { serverError } from "../lib/errors.js";
import { isRecord } from "../validation/wireValue.js";

/**
 * Read and parse the help document. Any failure (missing file, bad
 * JSON, non-object document) is a server_error.
 */
export async function loadHelpDocument(helpFile: string): Promise<Record<string, unknown>> {
  try {
    const text = await readFile(helpFile, "utf8");
    const document: unknown = JSON.parse(text);
    if (!isRecord(document)) {
      throw new Error("help document must be a JSON object");
    }
    return document;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw serverError(`Error reading help file: ${message}`, err);
  }
}
