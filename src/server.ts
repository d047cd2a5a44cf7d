// ============================================
// CpG Predictor Server — process entry point
// Usage: node dist/server.js [<host> <port>]
// ============================================

import "dotenv/config";
import { config } from "./config/env.js";
import { logger, setLogLevel } from "./lib/logger.js";
import { createPredictorApp } from "./api/index.js";

setLogLevel(config.logLevel);

/**
 * Optional positional host and port override HOST and PORT.
 * They come as a pair or not at all.
 */
function resolveListenAddress(args: string[]): { host: string; port: number } {
  if (args.length === 0) {
    return { host: config.host, port: config.port };
  }

  const [host, portArg] = args;
  const port = Number(portArg);
  if (args.length !== 2 || !host || !Number.isInteger(port) || port < 0 || port > 65535) {
    logger.error("Invalid arguments! Expected: <host> <port>", {
      stage: "startup",
      args,
    });
    process.exit(1);
  }

  return { host, port };
}

const { host, port } = resolveListenAddress(process.argv.slice(2));
const app = createPredictorApp();

logger.info("Starting predictor", {
  stage: "startup",
  predictor: config.predictor.name,
  requestFormats: config.predictor.supportedRequestFormats,
  responseFormats: config.predictor.supportedResponseFormats,
  helpFile: config.predictor.helpFile,
});

const server = app.listen(port, host, () => {
  logger.info("Server listening", {
    stage: "startup",
    url: `http://${host}:${port}`,
  });
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    logger.info("Shutting down", { stage: "startup", signal });
    server.close(() => process.exit(0));
  });
}
