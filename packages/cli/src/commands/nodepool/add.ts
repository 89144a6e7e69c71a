import process from "node:process";
import { defineCommand } from "citty";
import {
  createAzNodepoolOperation,
  ensureAzAvailable,
  ensureAzLoggedIn,
} from "@skufall/core/lib/azure/az-cli";
import { loadRuntimeEnv, parseTimeoutMs } from "@skufall/core/lib/config/runtime-env";
import { assertProvisioned, provisionWithFallback } from "@skufall/core/lib/fallback/executor";
import { summarizeResult } from "@skufall/core/lib/fallback/report";
import { coerceTrimmedString } from "@skufall/shared/lib/strings";
import { EXIT_OK, exitCodeForError } from "../../lib/exit-codes.js";
import { createCliLogger, createLoggerEventSink, parseLogLevel } from "../../lib/logging/logger.js";
import { nodePoolArgs, resolveNodePoolInput } from "./args.js";

export const nodePoolAddArgs = {
  ...nodePoolArgs,
  "attempt-timeout": {
    type: "string",
    description: "Seconds before a single SKU attempt is abandoned (default: $SKUFALL_ATTEMPT_TIMEOUT_MS or none).",
  },
  "log-level": { type: "string", description: "fatal|error|warn|info|debug|trace (default: $SKUFALL_LOG_LEVEL or info)." },
  "log-file": { type: "string", description: "Also write JSON logs to this file (default: $SKUFALL_LOG_FILE)." },
  "skip-preflight": { type: "boolean", description: "Skip the az binary and login checks.", default: false },
  json: { type: "boolean", description: "Output JSON.", default: false },
} as const;

function resolveAttemptTimeoutMs(args: Record<string, unknown>, fromEnv: string): number | undefined {
  const seconds = parseTimeoutMs(args["attempt-timeout"], "--attempt-timeout");
  if (seconds !== undefined) return seconds * 1000;
  return parseTimeoutMs(fromEnv, "SKUFALL_ATTEMPT_TIMEOUT_MS");
}

export async function runNodePoolAdd(
  args: Record<string, unknown>,
  opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<number> {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  try {
    const runtimeEnv = loadRuntimeEnv({ cwd, envFile: coerceTrimmedString(args["env-file"]), env });
    const { skus, params } = resolveNodePoolInput(args);
    const azBin = coerceTrimmedString(args["az-bin"]) || runtimeEnv.values.SKUFALL_AZ_BIN;
    const attemptTimeoutMs = resolveAttemptTimeoutMs(args, runtimeEnv.values.SKUFALL_ATTEMPT_TIMEOUT_MS);
    const logger = createCliLogger({
      level: parseLogLevel(args["log-level"] || runtimeEnv.values.SKUFALL_LOG_LEVEL, "info"),
      logFilePath: coerceTrimmedString(args["log-file"]) || runtimeEnv.values.SKUFALL_LOG_FILE,
      bindings: { resourceGroup: params.resourceGroup, cluster: params.clusterName, pool: params.poolName },
    });

    if (args["skip-preflight"] !== true) {
      await ensureAzAvailable({ azBin, env });
      await ensureAzLoggedIn({ azBin, env });
    }

    const result = await provisionWithFallback({
      skus,
      params,
      operation: createAzNodepoolOperation({ azBin, env, attemptTimeoutMs }),
      onEvent: createLoggerEventSink(logger),
    });

    if (args.json === true) console.log(JSON.stringify(summarizeResult(result), null, 2));
    const provisioned = assertProvisioned(result);
    if (args.json !== true && provisioned.output) console.log(provisioned.output);
    return EXIT_OK;
  } catch (err) {
    const code = exitCodeForError(err);
    if (code === null) throw err;
    console.error(err instanceof Error ? err.message : String(err));
    return code;
  }
}

export const nodePoolAdd = defineCommand({
  meta: {
    name: "add",
    description: "Add an AKS node pool, falling back through secondary/tertiary SKUs when a SKU fails.",
  },
  args: nodePoolAddArgs,
  async run({ args }) {
    process.exitCode = await runNodePoolAdd(args);
  },
});
