import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { coerceTrimmedString } from "@skufall/shared/lib/strings";
import { ConfigurationError } from "../fallback/errors.js";

export const DEFAULT_RUNTIME_ENV_FILE = ".skufall.env";

export const RUNTIME_ENV_KEYS = [
  "SKUFALL_AZ_BIN",
  "SKUFALL_LOG_LEVEL",
  "SKUFALL_LOG_FILE",
  "SKUFALL_ATTEMPT_TIMEOUT_MS",
] as const;

export type RuntimeEnvKey = (typeof RUNTIME_ENV_KEYS)[number];

export const RUNTIME_ENV_DEFAULTS = {
  SKUFALL_AZ_BIN: "az",
  SKUFALL_LOG_LEVEL: "info",
  SKUFALL_LOG_FILE: "",
  // Per-attempt `az aks nodepool add` timeout; empty means no timeout.
  SKUFALL_ATTEMPT_TIMEOUT_MS: "",
} as const satisfies Record<RuntimeEnvKey, string>;

export type RuntimeEnvFileInfo = {
  origin: "default" | "explicit";
  status: "ok" | "missing";
  path: string;
};

export type RuntimeEnvSource = "env" | "file" | "default";

export type RuntimeEnvResult = {
  envFile: RuntimeEnvFileInfo;
  values: Record<RuntimeEnvKey, string>;
  sources: Record<RuntimeEnvKey, RuntimeEnvSource>;
};

function readEnvFile(params: { cwd: string; envFile?: string }): {
  info: RuntimeEnvFileInfo;
  parsed: Record<string, string>;
} {
  const explicit = coerceTrimmedString(params.envFile);
  const origin = explicit ? "explicit" : "default";
  const filePath = path.resolve(params.cwd, explicit || DEFAULT_RUNTIME_ENV_FILE);

  if (!fs.existsSync(filePath)) {
    if (origin === "explicit") throw new ConfigurationError(`missing env file: ${filePath}`);
    return { info: { origin, status: "missing", path: filePath }, parsed: {} };
  }
  const stat = fs.statSync(filePath);
  if (!stat.isFile()) throw new ConfigurationError(`env file is not a regular file: ${filePath}`);

  const parsed = dotenv.parse(fs.readFileSync(filePath, "utf8"));
  return { info: { origin, status: "ok", path: filePath }, parsed };
}

/**
 * Resolves each key from the process env first, then the env file, then its default.
 */
export function loadRuntimeEnv(params: {
  cwd: string;
  envFile?: string;
  env?: NodeJS.ProcessEnv;
}): RuntimeEnvResult {
  const env = params.env ?? process.env;
  const { info, parsed } = readEnvFile(params);

  const values: Record<RuntimeEnvKey, string> = { ...RUNTIME_ENV_DEFAULTS };
  const sources: Record<RuntimeEnvKey, RuntimeEnvSource> = {
    SKUFALL_AZ_BIN: "default",
    SKUFALL_LOG_LEVEL: "default",
    SKUFALL_LOG_FILE: "default",
    SKUFALL_ATTEMPT_TIMEOUT_MS: "default",
  };
  for (const key of RUNTIME_ENV_KEYS) {
    const fromEnv = coerceTrimmedString(env[key]);
    const fromFile = coerceTrimmedString(parsed[key]);
    if (fromEnv) {
      values[key] = fromEnv;
      sources[key] = "env";
    } else if (fromFile) {
      values[key] = fromFile;
      sources[key] = "file";
    }
  }

  return { envFile: info, values, sources };
}

export function parseTimeoutMs(raw: unknown, label: string): number | undefined {
  const text = coerceTrimmedString(raw);
  if (!text) return undefined;
  const value = Number(text);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`invalid ${label} (expected a positive integer): ${text}`);
  }
  return value;
}
