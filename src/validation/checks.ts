// ============================================
// Request checks — each check is pure and returns
// the messages for every violation it finds
// ============================================

import { classify, isRecord } from "./wireValue.js";

export const MANDATORY_KEYS = ["readout", "prediction_tasks", "sequences"] as const;
export const TASK_MANDATORY_KEYS = ["name", "type", "cell_type", "species"] as const;

export const READOUT_OPTIONS = ["point", "track", "interaction_matrix"] as const;
export const SCALE_OPTIONS = ["linear", "log"] as const;
export const TASK_TYPE_OPTIONS = ["accessibility", "expression"] as const;
export const TASK_TYPE_PREFIXES = ["binding_", "expression_", "conformation_"] as const;

export type Readout = (typeof READOUT_OPTIONS)[number];
export type Scale = (typeof SCALE_OPTIONS)[number];

type Payload = Record<string, unknown>;

/** Ids that plain objects cannot hold as own data keys. */
export const RESERVED_IDS: ReadonlySet<string> = new Set(["__proto__"]);

function reservedIdMessage(seqId: string, container: "sequences" | "prediction_ranges"): string {
  return `sequence id '${seqId}' in '${container}' is not allowed`;
}

function includes<T extends string>(options: readonly T[], value: string): value is T {
  return options.some((option) => option === value);
}

function missingKeys(obj: Payload, keys: readonly string[]): string[] {
  return keys.filter((key) => !Object.hasOwn(obj, key)).sort();
}

/**
 * Shared shape rule for single-valued fields: a list is one message,
 * any other non-string is another.
 */
export function checkScalarString(field: string, value: unknown): string[] {
  const wire = classify(value);
  switch (wire.kind) {
    case "string":
      return [];
    case "list":
      return [`'${field}' should only have 1 value`];
    default:
      return [`'${field}' value should be a string`];
  }
}

// ----------------------------------------
// Gates: later checks read these keys unconditionally
// ----------------------------------------

export function checkMandatoryKeys(payload: Payload): string[] {
  const missing = missingKeys(payload, MANDATORY_KEYS);
  if (missing.length === 0) return [];
  return [
    `The following mandatory top-level keys are missing from the JSON: ${missing.join(", ")}`,
  ];
}

/** `prediction_tasks` must be a list of objects, `sequences` an object of strings. */
export function checkContainerShapes(payload: Payload): string[] {
  const errors: string[] = [];

  const tasks = classify(payload["prediction_tasks"]);
  if (tasks.kind !== "list") {
    errors.push("'prediction_tasks' must be a list of prediction task objects");
  } else {
    tasks.items.forEach((task, index) => {
      if (!isRecord(task)) {
        errors.push(`prediction_task at index ${index} must be an object`);
      }
    });
  }

  const sequences = classify(payload["sequences"]);
  if (sequences.kind !== "object") {
    errors.push("'sequences' must be an object mapping sequence ids to sequences");
  } else {
    for (const [seqId, seq] of Object.entries(sequences.entries)) {
      if (RESERVED_IDS.has(seqId)) {
        errors.push(reservedIdMessage(seqId, "sequences"));
      } else if (typeof seq !== "string") {
        errors.push(`sequence '${seqId}' must be a string`);
      }
    }
  }

  return errors;
}

export function checkTaskMandatoryKeys(tasks: Payload[]): string[] {
  const errors: string[] = [];

  tasks.forEach((task, index) => {
    const missing = missingKeys(task, TASK_MANDATORY_KEYS);
    if (missing.length === 0) return;

    const name = task["name"];
    const identifier = typeof name === "string" ? name : `at index ${index}`;
    errors.push(
      `Mandatory keys missing from prediction_task '${identifier}': ${missing.join(", ")}`
    );
  });

  return errors;
}

// ----------------------------------------
// Value checks
// ----------------------------------------

export function checkReadout(value: unknown): string[] {
  const shape = checkScalarString("readout", value);
  if (shape.length > 0) return shape;

  if (typeof value === "string" && !includes(READOUT_OPTIONS, value)) {
    return [
      "readout requested is not recognized. Please choose from ['point', 'track', 'interaction_matrix']",
    ];
  }
  return [];
}

function checkTaskField(tasks: Payload[], field: string): string[] {
  return tasks.flatMap((task) => checkScalarString(field, task[field]));
}

export function checkTaskNames(tasks: Payload[]): string[] {
  return checkTaskField(tasks, "name");
}

export function checkTaskCellTypes(tasks: Payload[]): string[] {
  return checkTaskField(tasks, "cell_type");
}

export function checkTaskSpecies(tasks: Payload[]): string[] {
  return checkTaskField(tasks, "species");
}

export function isRecognizedTaskType(type: string): boolean {
  return includes(TASK_TYPE_OPTIONS, type) || TASK_TYPE_PREFIXES.some((p) => type.startsWith(p));
}

export function checkTaskTypes(tasks: Payload[]): string[] {
  return tasks.flatMap((task) => {
    const type = task["type"];
    const shape = checkScalarString("type", type);
    if (shape.length > 0) return shape;
    if (typeof type === "string" && !isRecognizedTaskType(type)) {
      return [`prediction type ${type} is not recognized`];
    }
    return [];
  });
}

export function checkTaskScales(tasks: Payload[]): string[] {
  return tasks.flatMap((task) => {
    if (!Object.hasOwn(task, "scale")) return [];

    const scale = task["scale"];
    const shape = checkScalarString("scale", scale);
    if (shape.length > 0) return shape;
    if (typeof scale === "string" && !includes(SCALE_OPTIONS, scale)) {
      return ["scale requested is not recognized. Please choose from ['log', 'linear']"];
    }
    return [];
  });
}

// ----------------------------------------
// Prediction ranges
// ----------------------------------------

export function checkSequenceIds(ranges: Payload, sequences: Payload): string[] {
  const rangeIds = Object.keys(ranges).sort();
  const sequenceIds = Object.keys(sequences).sort();
  const same =
    rangeIds.length === sequenceIds.length && rangeIds.every((id, i) => id === sequenceIds[i]);

  return same ? [] : ["sequence ids in prediction_ranges do not match those in sequences"];
}

function sequenceLength(sequences: Payload, seqId: string): number {
  const seq = Object.hasOwn(sequences, seqId) ? sequences[seqId] : undefined;
  return typeof seq === "string" ? seq.length : 0;
}

/**
 * Each range is `[]` (no trimming) or `[start, end]`: non-negative
 * integers, start <= end, both inside the sequence as submitted.
 */
export function checkRange(seqId: string, range: unknown, sequences: Payload): string[] {
  const wire = classify(range);
  if (wire.kind !== "list") {
    return [`Values for '${seqId}' in 'prediction_ranges' must be in a list`];
  }
  if (wire.items.length === 0) return [];
  if (wire.items.length !== 2) {
    return [`Range array for '${seqId}' in 'prediction_ranges' must have 2 elements`];
  }

  const [startValue, endValue] = wire.items;
  const start = classify(startValue);
  const end = classify(endValue);
  if (start.kind !== "integer" || end.kind !== "integer") {
    return [`Values in '${seqId}' in 'prediction_ranges' must be integers`];
  }

  const errors: string[] = [];
  const received = `Received [${start.value}, ${end.value}]`;

  if (start.value < 0 || end.value < 0) {
    errors.push(
      `Invalid range for '${seqId}' in 'prediction_ranges': indices must be non-negative. ${received}`
    );
  }
  if (start.value > end.value) {
    errors.push(
      `Invalid range for '${seqId}' in 'prediction_ranges': start index (${start.value}) cannot be greater than end index (${end.value}). ${received}`
    );
  }

  const length = sequenceLength(sequences, seqId);
  if (start.value >= length || end.value >= length) {
    errors.push(
      length === 0
        ? `Invalid range for '${seqId}': cannot specify a range for a non-existent or empty sequence.`
        : `Invalid range for '${seqId}': index is out of bounds. The maximum valid index for a sequence of length ${length} is ${length - 1}.`
    );
  }

  return errors;
}

export function checkPredictionRanges(ranges: unknown, sequences: Payload): string[] {
  if (!isRecord(ranges)) {
    return ["'prediction_ranges' must be an object mapping sequence ids to ranges"];
  }

  return [
    ...checkSequenceIds(ranges, sequences),
    ...Object.entries(ranges).flatMap(([seqId, range]) =>
      RESERVED_IDS.has(seqId)
        ? [reservedIdMessage(seqId, "prediction_ranges")]
        : checkRange(seqId, range, sequences)
    ),
  ];
}

// ----------------------------------------
// Flanks
// ----------------------------------------

export function checkFlank(field: "upstream_seq" | "downstream_seq", value: unknown): string[] {
  return checkScalarString(field, value);
}
