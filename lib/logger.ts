import pino from "pino";

const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  redact: ["req.headers.authorization", "req.headers.cookie"],
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
    bindings(bindings) {
      return {
        pid: bindings.pid,
        hostname: bindings.hostname,
      };
    },
  },
});

export type Logger = pino.Logger;

/** Child logger tagged with the emitting module. */
export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

export function logRequest({ requestId, method, path, status, latency, ...fields }: {
  requestId: string;
  method: string;
  path: string;
  status: number;
  latency: number;
  [key: string]: unknown;
}) {
  const entry = { requestId, method, path, status, latency, ...fields };
  if (status >= 500) {
    logger.error(entry, "request failed");
  } else {
    logger.info(entry, "request");
  }
}

export default logger;
