// ============================================
// Wire Format Negotiation Tests
// ============================================

import { describe, it, expect } from "vitest";
import {
  JSON_FORMAT,
  MSGPACK_FORMAT,
  acceptsFormat,
  describeFormats,
  isWireFormat,
  negotiateResponseFormat,
  parseMediaType,
  resolveRequestFormat,
} from "../src/codec/formats.js";
import { captureError } from "./helpers.js";

const BOTH = [JSON_FORMAT, MSGPACK_FORMAT] as const;

describe("parseMediaType", () => {
  it("returns null for a missing or blank header", () => {
    expect(parseMediaType(undefined)).toBeNull();
    expect(parseMediaType("   ")).toBeNull();
  });

  it("lower-cases and drops parameters", () => {
    expect(parseMediaType("Application/JSON; charset=utf-8")).toBe("application/json");
  });
});

describe("isWireFormat", () => {
  it("accepts only the known formats", () => {
    expect(isWireFormat("application/json")).toBe(true);
    expect(isWireFormat("application/msgpack")).toBe(true);
    expect(isWireFormat("application/x-msgpack")).toBe(false);
  });
});

describe("resolveRequestFormat", () => {
  it("defaults to JSON when the header is missing", () => {
    expect(resolveRequestFormat(undefined, BOTH)).toBe(JSON_FORMAT);
  });

  it("matches case-insensitively", () => {
    expect(resolveRequestFormat("APPLICATION/MSGPACK", BOTH)).toBe(MSGPACK_FORMAT);
  });

  it("rejects unsupported types with the supported list", () => {
    const err = captureError(() => resolveRequestFormat("text/plain", BOTH));

    expect(err.errorKey).toBe("bad_prediction_request");
    expect(err.messages).toEqual([
      "Unsupported Content-Type: text/plain. Must be one of ['application/json', 'application/msgpack']",
    ]);
  });

  it("rejects a known format the server does not accept", () => {
    const err = captureError(() => resolveRequestFormat("application/msgpack", [JSON_FORMAT]));

    expect(err.messages).toEqual([
      "Unsupported Content-Type: application/msgpack. Must be one of ['application/json']",
    ]);
  });

  it("rejects the JSON default when JSON is not accepted", () => {
    const err = captureError(() => resolveRequestFormat(undefined, [MSGPACK_FORMAT]));

    expect(err.messages).toEqual([
      "Unsupported Content-Type: application/json. Must be one of ['application/msgpack']",
    ]);
  });
});

describe("acceptsFormat", () => {
  it("finds the format among several media ranges", () => {
    expect(acceptsFormat("application/json, application/msgpack;q=0.5", MSGPACK_FORMAT)).toBe(true);
  });

  it("ignores wildcards", () => {
    expect(acceptsFormat("*/*", MSGPACK_FORMAT)).toBe(false);
  });

  it("treats q=0 as a refusal", () => {
    expect(acceptsFormat("application/msgpack;q=0", MSGPACK_FORMAT)).toBe(false);
  });

  it("is false without a header", () => {
    expect(acceptsFormat(undefined, MSGPACK_FORMAT)).toBe(false);
  });
});

describe("negotiateResponseFormat", () => {
  it("uses MessagePack when both sides allow it", () => {
    expect(negotiateResponseFormat("application/msgpack", BOTH, false)).toBe(MSGPACK_FORMAT);
  });

  it("always uses JSON for errors", () => {
    expect(negotiateResponseFormat("application/msgpack", BOTH, true)).toBe(JSON_FORMAT);
  });

  it("falls back to JSON when the server does not send MessagePack", () => {
    expect(negotiateResponseFormat("application/msgpack", [JSON_FORMAT], false)).toBe(JSON_FORMAT);
  });

  it("defaults to JSON without an Accept header", () => {
    expect(negotiateResponseFormat(undefined, BOTH, false)).toBe(JSON_FORMAT);
  });
});

describe("describeFormats", () => {
  it("quotes each format", () => {
    expect(describeFormats(BOTH)).toBe("['application/json', 'application/msgpack']");
  });
});
