import type { ProvisioningOperation } from "../fallback/types.js";
import { captureCombined, resolveBinary } from "../runtime/run.js";
import { buildNodepoolAddArgs } from "./nodepool-args.js";

export const DEFAULT_AZ_BIN = "az";
export const AZ_ACCOUNT_SHOW_TIMEOUT_MS = 60_000;
export const AZ_OUTPUT_LIMIT_BYTES = 4 * 1024 * 1024;

export class AzCliMissingError extends Error {
  readonly azBin: string;

  constructor(azBin: string) {
    super(`Required command '${azBin}' not found in PATH`);
    this.name = "AzCliMissingError";
    this.azBin = azBin;
  }
}

export class AzCliNotLoggedInError extends Error {
  constructor(options?: { cause?: unknown }) {
    super("Azure CLI isn't logged in. Run 'az login' first.", options);
    this.name = "AzCliNotLoggedInError";
  }
}

export async function ensureAzAvailable(params: { azBin: string; env?: NodeJS.ProcessEnv }): Promise<string> {
  const resolved = await resolveBinary(params.azBin, params.env);
  if (!resolved) throw new AzCliMissingError(params.azBin);
  return resolved;
}

/** Only checks for an existing session; never starts a login. */
export async function ensureAzLoggedIn(params: {
  azBin: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}): Promise<void> {
  try {
    await captureCombined(params.azBin, ["account", "show", "--output", "none"], {
      env: params.env,
      timeoutMs: params.timeoutMs ?? AZ_ACCOUNT_SHOW_TIMEOUT_MS,
    });
  } catch (err) {
    throw new AzCliNotLoggedInError({ cause: err });
  }
}

export type AzNodepoolOperationOptions = {
  azBin?: string;
  env?: NodeJS.ProcessEnv;
  /** Kills the current `az` call; the attempt then counts as failed. */
  attemptTimeoutMs?: number;
};

export function createAzNodepoolOperation(opts: AzNodepoolOperationOptions = {}): ProvisioningOperation<string> {
  const azBin = opts.azBin || DEFAULT_AZ_BIN;
  return async (request, ctx) =>
    await captureCombined(azBin, buildNodepoolAddArgs(request), {
      env: opts.env,
      timeoutMs: opts.attemptTimeoutMs,
      maxOutputBytes: AZ_OUTPUT_LIMIT_BYTES,
      signal: ctx.signal,
    });
}
