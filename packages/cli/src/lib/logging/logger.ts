import fs from "node:fs";
import path from "node:path";
import pino, { type DestinationStream, type Logger } from "pino";
import { ConfigurationError } from "@skufall/core/lib/fallback/errors";
import type { ProvisioningEvent, ProvisioningEventSink } from "@skufall/core/lib/fallback/types";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(["fatal", "error", "warn", "info", "debug", "trace"]);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export function parseLogLevel(raw: unknown, fallback: LogLevel): LogLevel {
  const normalized = String(raw ?? "")
    .trim()
    .toLowerCase();
  if (!normalized) return fallback;
  if (isLogLevel(normalized)) return normalized;
  throw new ConfigurationError(`invalid log level: ${normalized}`);
}

/** JSON lines on stderr; stdout stays free for command results. */
export function createCliLogger(params: {
  level: LogLevel;
  logFilePath?: string;
  bindings?: Record<string, unknown>;
  destination?: DestinationStream;
}): Logger {
  const streams: Array<{ stream: DestinationStream; level: LogLevel }> = [
    { stream: params.destination ?? pino.destination(2), level: params.level },
  ];

  const logFilePath = String(params.logFilePath || "").trim();
  if (logFilePath) {
    const resolved = path.resolve(logFilePath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true, mode: 0o700 });
    const fd = fs.openSync(resolved, "a", 0o600);
    fs.closeSync(fd);
    fs.chmodSync(resolved, 0o600);
    streams.push({ stream: pino.destination({ dest: resolved, sync: true }), level: params.level });
  }

  const logger = pino(
    {
      name: "skufall",
      level: params.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
    },
    pino.multistream(streams),
  );

  return params.bindings ? logger.child(params.bindings) : logger;
}

function describeEvent(event: ProvisioningEvent): { fields: Record<string, unknown>; msg: string } {
  switch (event.type) {
    case "attempt_started":
      return {
        fields: { sku: event.candidate.id, rank: event.candidate.rank },
        msg: `attempting node pool with SKU '${event.candidate.id}'`,
      };
    case "attempt_succeeded":
      return {
        fields: { sku: event.candidate.id, rank: event.candidate.rank, durationMs: event.durationMs },
        msg: `created node pool with SKU '${event.candidate.id}'`,
      };
    case "attempt_failed":
      return {
        fields: {
          sku: event.candidate.id,
          rank: event.candidate.rank,
          durationMs: event.durationMs,
          diagnostic: event.diagnostic,
          remaining: event.remaining,
        },
        msg:
          event.remaining > 0
            ? `SKU '${event.candidate.id}' failed; trying next SKU`
            : `SKU '${event.candidate.id}' failed; no SKUs left`,
      };
    case "provisioned":
      return {
        fields: { sku: event.candidate.id, attempts: event.attempts },
        msg: `node pool provisioned using SKU '${event.candidate.id}'`,
      };
    case "exhausted":
      return { fields: { tried: event.tried }, msg: `all SKU attempts failed: ${event.tried.join(" ")}` };
  }
}

/** Logs each engine event at the level the event carries. */
export function createLoggerEventSink(logger: Logger): ProvisioningEventSink {
  return (event) => {
    const { fields, msg } = describeEvent(event);
    logger[event.level](fields, msg);
  };
}
