// ============================================
// Wire values — classify decoded JSON/MessagePack values
// so checks can match on a kind instead of probing types
// ============================================

export type WireValue =
  | { kind: "missing" }
  | { kind: "null" }
  | { kind: "string"; value: string }
  | { kind: "integer"; value: number }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "binary"; value: Uint8Array }
  | { kind: "list"; items: unknown[] }
  | { kind: "object"; entries: Record<string, unknown> };

export type WireKind = WireValue["kind"];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

export function classify(value: unknown): WireValue {
  if (value === undefined) return { kind: "missing" };
  if (value === null) return { kind: "null" };
  if (typeof value === "string") return { kind: "string", value };
  if (typeof value === "boolean") return { kind: "boolean", value };
  if (typeof value === "number") {
    return Number.isInteger(value) ? { kind: "integer", value } : { kind: "number", value };
  }
  if (Array.isArray(value)) return { kind: "list", items: value };
  if (value instanceof Uint8Array) return { kind: "binary", value };
  if (isRecord(value)) return { kind: "object", entries: value };
  // bigint, symbol and function never come out of either decoder
  return { kind: "null" };
}
