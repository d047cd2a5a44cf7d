// ============================================
// Error Taxonomy Tests
// ============================================

import { describe, it, expect } from "vitest";
import {
  ERROR_STATUS,
  PredictorError,
  badRequestError,
  isPredictorError,
  predictionFailedError,
  serverError,
  unmatchedRouteError,
  wrapError,
} from "../src/lib/errors.js";

describe("error factories", () => {
  it("badRequestError is a 400 bad_prediction_request", () => {
    const err = badRequestError("missing readout");

    expect(err.errorKey).toBe("bad_prediction_request");
    expect(err.statusCode).toBe(400);
    expect(err.messages).toEqual(["missing readout"]);
  });

  it("predictionFailedError is a 422 prediction_request_failed", () => {
    const err = predictionFailedError(["sequence 'a' is empty", "sequence 'b' is empty"]);

    expect(err.errorKey).toBe("prediction_request_failed");
    expect(err.statusCode).toBe(422);
    expect(err.messages).toHaveLength(2);
  });

  it("serverError is a 500 server_error and keeps its cause", () => {
    const cause = new Error("disk gone");
    const err = serverError("Error reading help file: disk gone", cause);

    expect(err.errorKey).toBe("server_error");
    expect(err.statusCode).toBe(500);
    expect(err.cause).toBe(cause);
  });

  it("unmatchedRouteError keeps the request key with a route status", () => {
    const err = unmatchedRouteError("No route for GET /x.", 404);

    expect(err.errorKey).toBe("bad_prediction_request");
    expect(err.statusCode).toBe(404);
    expect(err.toPayload()).toEqual({ error: [{ bad_prediction_request: "No route for GET /x." }] });
  });

  it("maps every key to a fixed status", () => {
    expect(ERROR_STATUS).toEqual({
      bad_prediction_request: 400,
      prediction_request_failed: 422,
      server_error: 500,
    });
  });
});

describe("PredictorError", () => {
  it("joins messages into the Error message", () => {
    const err = badRequestError(["first", "second"]);

    expect(err.message).toBe("first; second");
    expect(err.name).toBe("PredictorError");
    expect(err).toBeInstanceOf(Error);
  });

  it("renders one error entry per message", () => {
    const err = badRequestError(["first", "second"]);

    expect(err.toPayload()).toEqual({
      error: [{ bad_prediction_request: "first" }, { bad_prediction_request: "second" }],
    });
  });
});

describe("wrapError", () => {
  it("returns PredictorErrors unchanged apart from the request id", () => {
    const original = predictionFailedError("sequence 's1' is empty");
    const wrapped = wrapError(original, "req-1");

    expect(wrapped).toBe(original);
    expect(wrapped.requestId).toBe("req-1");
  });

  it("does not overwrite an existing request id", () => {
    const original = new PredictorError({
      errorKey: "bad_prediction_request",
      messages: ["x"],
      requestId: "first",
    });

    expect(wrapError(original, "second").requestId).toBe("first");
  });

  it("wraps unknown errors as server_error", () => {
    const cause = new TypeError("cannot read properties of undefined");
    const wrapped = wrapError(cause, "req-2");

    expect(wrapped.errorKey).toBe("server_error");
    expect(wrapped.messages).toEqual([
      "An unexpected internal error occurred: cannot read properties of undefined.",
    ]);
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.requestId).toBe("req-2");
  });

  it("wraps thrown non-Error values", () => {
    expect(wrapError("boom").messages).toEqual(["An unexpected internal error occurred: boom."]);
  });
});

describe("isPredictorError", () => {
  it("recognizes only PredictorError instances", () => {
    expect(isPredictorError(serverError("x"))).toBe(true);
    expect(isPredictorError(new Error("x"))).toBe(false);
    expect(isPredictorError({ errorKey: "server_error" })).toBe(false);
  });
});
