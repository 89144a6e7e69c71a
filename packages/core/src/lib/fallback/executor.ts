import { formatUnknown } from "@skufall/shared/lib/strings";
import type { NodePoolParamsInput } from "../config/schema-nodepool.js";
import { assertCandidateOrder, buildCandidateList, type SkuPreferences } from "./candidates.js";
import { ExhaustionError } from "./errors.js";
import { buildProvisioningRequest, parseNodePoolParams } from "./request.js";
import type {
  AttemptFailure,
  AttemptOutcome,
  AttemptRecord,
  AttemptSuccess,
  Candidate,
  ExhaustedResult,
  ProvisionedResult,
  ProvisioningContext,
  ProvisioningEventSink,
  ProvisioningOperation,
  ProvisioningRequest,
  ProvisioningResult,
} from "./types.js";

export type ExecuteWithFallbackParams<TOutput> = {
  candidates: readonly Candidate[];
  params: NodePoolParamsInput;
  operation: ProvisioningOperation<TOutput>;
  onEvent?: ProvisioningEventSink;
  signal?: AbortSignal;
  now?: () => number;
};

export function describeAttemptError(err: unknown): string {
  if (err instanceof Error) {
    const message = err.message.trim() || err.name;
    const output = "output" in err && typeof err.output === "string" ? err.output.trim() : "";
    if (!output) return message;
    // A plain non-zero exit is described by what the command printed; a kill
    // (timeout, abort, output cap) also needs the reason it ended.
    const exited = "exitCode" in err && typeof err.exitCode === "number";
    return exited ? output : `${message}\n${output}`;
  }
  if (typeof err === "string" && err.trim()) return err;
  return formatUnknown(err, String(err));
}

async function attempt<TOutput>(
  operation: ProvisioningOperation<TOutput>,
  request: ProvisioningRequest,
  ctx: ProvisioningContext,
): Promise<AttemptOutcome<TOutput>> {
  try {
    const output = await operation(request, ctx);
    const success: AttemptSuccess<TOutput> = { kind: "success", output };
    return Object.freeze(success);
  } catch (err) {
    const failure: AttemptFailure = { kind: "failure", diagnostic: describeAttemptError(err), failureClass: "unclassified" };
    return Object.freeze(failure);
  }
}

/**
 * Tries each candidate once, in order, and stops at the first success.
 * Every attempt (including the successful one) lands in `attempts`.
 */
export async function executeWithFallback<TOutput = string>(
  params: ExecuteWithFallbackParams<TOutput>,
): Promise<ProvisioningResult<TOutput>> {
  assertCandidateOrder(params.candidates);
  const poolParams = parseNodePoolParams(params.params);
  const now = params.now ?? Date.now;
  const emit: ProvisioningEventSink = params.onEvent ?? (() => {});
  const attempts: AttemptRecord<TOutput>[] = [];

  for (const [index, candidate] of params.candidates.entries()) {
    const request = buildProvisioningRequest(poolParams, candidate);
    const startedAt = now();
    emit({ type: "attempt_started", level: "info", ts: startedAt, candidate });

    const outcome = await attempt(params.operation, request, { signal: params.signal });
    const finishedAt = now();
    const durationMs = Math.max(0, finishedAt - startedAt);
    attempts.push(Object.freeze({ candidate, outcome, startedAt, durationMs }));

    if (outcome.kind === "success") {
      emit({ type: "attempt_succeeded", level: "info", ts: finishedAt, candidate, durationMs });
      emit({ type: "provisioned", level: "info", ts: finishedAt, candidate, attempts: attempts.length });
      const provisioned: ProvisionedResult<TOutput> = {
        status: "provisioned",
        candidate,
        output: outcome.output,
        attempts: Object.freeze([...attempts]),
      };
      return Object.freeze(provisioned);
    }

    emit({
      type: "attempt_failed",
      level: "warn",
      ts: finishedAt,
      candidate,
      durationMs,
      diagnostic: outcome.diagnostic,
      remaining: params.candidates.length - index - 1,
    });
  }

  emit({ type: "exhausted", level: "error", ts: now(), tried: attempts.map((a) => a.candidate.id) });
  const exhausted: ExhaustedResult<TOutput> = { status: "exhausted", attempts: Object.freeze([...attempts]) };
  return Object.freeze(exhausted);
}

export async function provisionWithFallback<TOutput = string>(
  params: Omit<ExecuteWithFallbackParams<TOutput>, "candidates"> & { skus: SkuPreferences },
): Promise<ProvisioningResult<TOutput>> {
  const { skus, ...rest } = params;
  return await executeWithFallback({ ...rest, candidates: buildCandidateList(skus) });
}

export function assertProvisioned<TOutput>(result: ProvisioningResult<TOutput>): ProvisionedResult<TOutput> {
  if (result.status === "provisioned") return result;
  throw new ExhaustionError(result.attempts);
}
