// ============================================
// Content handler — decode requests and encode
// responses in the negotiated wire format
// ============================================

import { decode as decodeMsgpack, encode as encodeMsgpack } from "@msgpack/msgpack";
import { badRequestError, serverError } from "../lib/errors.js";
import {
  JSON_FORMAT,
  MSGPACK_FORMAT,
  negotiateResponseFormat,
  resolveRequestFormat,
  type WireFormat,
} from "./formats.js";

/** A decoded request or an outgoing response body before encoding. */
export type Payload = Record<string, unknown>;

export interface DecodedRequest {
  format: WireFormat;
  payload: Payload;
}

export interface EncodeOptions {
  statusCode?: number;
  isError?: boolean;
  acceptHeader?: string;
  supportedResponseFormats?: readonly WireFormat[];
  predictorName?: string;
}

export interface EncodedResponse {
  body: Buffer;
  statusCode: number;
  contentType: WireFormat;
}

function isPayload(value: unknown): value is Payload {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function decodeBody(body: Uint8Array, format: WireFormat): unknown {
  if (format === MSGPACK_FORMAT) {
    try {
      return decodeMsgpack(body);
    } catch (err) {
      throw badRequestError(`Could not decode MsgPack payload: ${reason(err)}`, err);
    }
  }

  try {
    const text = new TextDecoder("utf-8", { fatal: true }).decode(body);
    return JSON.parse(text);
  } catch (err) {
    throw badRequestError(`Could not parse JSON payload: ${reason(err)}`, err);
  }
}

/**
 * Decode a request body using its Content-Type header.
 *
 * A missing header means JSON. The header must name one of
 * `supportedRequestFormats` and the body must decode to an object.
 */
export function decodeRequest(
  body: Uint8Array,
  contentTypeHeader: string | undefined,
  supportedRequestFormats: readonly WireFormat[]
): DecodedRequest {
  const format = resolveRequestFormat(contentTypeHeader, supportedRequestFormats);
  const decoded = decodeBody(body, format);

  if (!isPayload(decoded)) {
    throw badRequestError("Request payload must be an object mapping keys to values");
  }

  return { format, payload: decoded };
}

/**
 * Encode a response payload.
 *
 * `predictor_name` is added as the first key when missing. Errors are
 * always JSON; successes are MessagePack when the Accept header and the
 * supported formats both allow it.
 */
export function encodeResponse(payload: object, options: EncodeOptions = {}): EncodedResponse {
  const {
    statusCode = 200,
    isError = false,
    acceptHeader,
    supportedResponseFormats = [JSON_FORMAT],
    predictorName = "UnknownPredictor",
  } = options;

  const named: object =
    "predictor_name" in payload ? payload : { predictor_name: predictorName, ...payload };

  const contentType = negotiateResponseFormat(acceptHeader, supportedResponseFormats, isError);

  if (contentType === MSGPACK_FORMAT) {
    let encoded: Uint8Array;
    try {
      encoded = encodeMsgpack(named);
    } catch (err) {
      throw serverError("Failed to serialize successful response as MsgPack.", err);
    }
    return {
      body: Buffer.from(encoded.buffer, encoded.byteOffset, encoded.byteLength),
      statusCode,
      contentType,
    };
  }

  let text: string;
  try {
    text = JSON.stringify(named);
  } catch (err) {
    throw serverError(
      `Internal Server Error: Failed to serialize response as JSON: ${reason(err)}`,
      err
    );
  }
  return { body: Buffer.from(text, "utf8"), statusCode, contentType };
}
