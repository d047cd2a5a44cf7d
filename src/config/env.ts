import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { JSON_FORMAT, KNOWN_FORMATS, isWireFormat, type WireFormat } from "../codec/formats.js";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

export const DEFAULT_HELP_FILE = path.join(PACKAGE_ROOT, "predictor_help_message.json");

/**
 * Parse a comma-separated list of media types.
 * Entries are trimmed and lower-cased; duplicates are dropped.
 */
export function parseFormatList(value: string): WireFormat[] {
  const formats: WireFormat[] = [];
  for (const entry of value.split(",")) {
    const normalized = entry.trim().toLowerCase();
    if (!normalized) continue;
    if (!isWireFormat(normalized)) {
      throw new Error(`unknown format '${normalized}', expected one of ${KNOWN_FORMATS.join(", ")}`);
    }
    if (!formats.includes(normalized)) {
      formats.push(normalized);
    }
  }
  return formats;
}

const formatList = (fallback: string, options: { required?: boolean } = {}) =>
  z
    .string()
    .default(fallback)
    .transform((value, ctx) => {
      try {
        const formats = parseFormatList(value);
        if (options.required && formats.length === 0) {
          throw new Error("at least one format is required");
        }
        return formats;
      } catch (err) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: err instanceof Error ? err.message : String(err),
        });
        return z.NEVER;
      }
    });

export const envSchema = z.object({
  // Server
  PORT: z.string().default("5000").transform(Number).pipe(z.number().int().min(0).max(65535)),
  HOST: z.string().min(1).default("127.0.0.1"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  MAX_BODY_SIZE: z.string().default("50mb"),

  // Predictor
  PREDICTOR_NAME: z.string().min(1).default("CpG Predictor"),
  SUPPORTED_REQUEST_FORMATS: formatList(KNOWN_FORMATS.join(","), { required: true }),
  SUPPORTED_RESPONSE_FORMATS: formatList(KNOWN_FORMATS.join(",")),
  HELP_FILE: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("❌ Invalid environment configuration:");
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

// Validate on module load
export const env = validateEnv();

/** JSON can always be sent, whether or not it was listed. */
function withJson(formats: WireFormat[]): WireFormat[] {
  return formats.includes(JSON_FORMAT) ? formats : [JSON_FORMAT, ...formats];
}

// Derived config for convenience
export const config = {
  port: env.PORT,
  host: env.HOST,
  isDev: env.NODE_ENV === "development",
  isProd: env.NODE_ENV === "production",
  logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
  maxBodySize: env.MAX_BODY_SIZE,

  predictor: {
    name: env.PREDICTOR_NAME,
    supportedRequestFormats: env.SUPPORTED_REQUEST_FORMATS,
    supportedResponseFormats: withJson(env.SUPPORTED_RESPONSE_FORMATS),
    helpFile: env.HELP_FILE ? path.resolve(env.HELP_FILE) : DEFAULT_HELP_FILE,
  },
} as const;

export type Config = typeof config;
