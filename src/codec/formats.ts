// ============================================
// Wire formats — media type parsing and negotiation
// ============================================

import { badRequestError } from "../lib/errors.js";

export const JSON_FORMAT = "application/json";
export const MSGPACK_FORMAT = "application/msgpack";

/** Every format the codec can read and write. JSON is the primary format. */
export const KNOWN_FORMATS = [JSON_FORMAT, MSGPACK_FORMAT] as const;

export type WireFormat = (typeof KNOWN_FORMATS)[number];

export function isWireFormat(value: string): value is WireFormat {
  return KNOWN_FORMATS.some((format) => format === value);
}

/** Render a format list the way error messages quote it: ['a', 'b'] */
export function describeFormats(formats: readonly string[]): string {
  return `[${formats.map((f) => `'${f}'`).join(", ")}]`;
}

/**
 * Lower-cased media type of a Content-Type header with any parameters
 * removed. Returns null when the header is absent or blank.
 */
export function parseMediaType(header: string | undefined): string | null {
  if (header === undefined) return null;
  const [type = ""] = header.split(";");
  const normalized = type.trim().toLowerCase();
  return normalized.length > 0 ? normalized : null;
}

/**
 * Resolve the format a request body is decoded with.
 * A missing Content-Type falls back to JSON.
 */
export function resolveRequestFormat(
  contentTypeHeader: string | undefined,
  supportedRequestFormats: readonly WireFormat[]
): WireFormat {
  const mediaType = parseMediaType(contentTypeHeader) ?? JSON_FORMAT;
  const format = supportedRequestFormats.find((f) => f === mediaType);

  if (!format) {
    throw badRequestError(
      `Unsupported Content-Type: ${mediaType}. Must be one of ${describeFormats(supportedRequestFormats)}`
    );
  }

  return format;
}

/**
 * Whether an Accept header explicitly lists `format`.
 * Wildcards do not count and a `q=0` entry is a refusal.
 */
export function acceptsFormat(acceptHeader: string | undefined, format: WireFormat): boolean {
  if (!acceptHeader) return false;

  return acceptHeader.split(",").some((range) => {
    const [type = "", ...params] = range.split(";");
    if (type.trim().toLowerCase() !== format) return false;

    const quality = params
      .map((p) => p.trim().toLowerCase())
      .find((p) => p.startsWith("q="));
    return quality === undefined || Number(quality.slice(2)) > 0;
  });
}

/**
 * Pick the response encoding. Errors are always JSON; successes use
 * MessagePack only when both the client and the server allow it.
 */
export function negotiateResponseFormat(
  acceptHeader: string | undefined,
  supportedResponseFormats: readonly WireFormat[],
  isError: boolean
): WireFormat {
  if (isError) return JSON_FORMAT;

  if (
    supportedResponseFormats.includes(MSGPACK_FORMAT) &&
    acceptsFormat(acceptHeader, MSGPACK_FORMAT)
  ) {
    return MSGPACK_FORMAT;
  }

  return JSON_FORMAT;
}
