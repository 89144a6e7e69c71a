import type { NodePoolParams } from "../config/schema-nodepool.js";

export const CANDIDATE_ROLES = ["primary", "secondary", "tertiary"] as const;
export type CandidateRole = (typeof CANDIDATE_ROLES)[number];

export type Candidate = Readonly<{
  id: string;
  /** 1 = primary, 2 = secondary, 3 = tertiary. */
  rank: number;
  role: CandidateRole;
}>;

export type ProvisioningRequest = Readonly<
  Omit<NodePoolParams, "zones"> & {
    zones: readonly string[];
    candidate: Candidate;
  }
>;

export type AttemptSuccess<TOutput = string> = Readonly<{
  kind: "success";
  output: TOutput;
}>;

/**
 * Any rejected invocation. The cause (capacity, quota, bad request) is not
 * inferred; callers read `diagnostic` to tell them apart.
 */
export type AttemptFailure = Readonly<{
  kind: "failure";
  diagnostic: string;
  failureClass: "unclassified";
}>;

export type AttemptOutcome<TOutput = string> = AttemptSuccess<TOutput> | AttemptFailure;

export type AttemptRecord<TOutput = string> = Readonly<{
  candidate: Candidate;
  outcome: AttemptOutcome<TOutput>;
  startedAt: number;
  durationMs: number;
}>;

export type AttemptLog<TOutput = string> = readonly AttemptRecord<TOutput>[];

export type ProvisionedResult<TOutput = string> = Readonly<{
  status: "provisioned";
  candidate: Candidate;
  output: TOutput;
  attempts: AttemptLog<TOutput>;
}>;

export type ExhaustedResult<TOutput = string> = Readonly<{
  status: "exhausted";
  attempts: AttemptLog<TOutput>;
}>;

export type ProvisioningResult<TOutput = string> = ProvisionedResult<TOutput> | ExhaustedResult<TOutput>;

export type ProvisioningContext = {
  signal?: AbortSignal;
};

export type ProvisioningOperation<TOutput = string> = (
  request: ProvisioningRequest,
  ctx: ProvisioningContext,
) => Promise<TOutput>;

export type ProvisioningEvent =
  | { type: "attempt_started"; level: "info"; ts: number; candidate: Candidate }
  | { type: "attempt_succeeded"; level: "info"; ts: number; candidate: Candidate; durationMs: number }
  | {
      type: "attempt_failed";
      level: "warn";
      ts: number;
      candidate: Candidate;
      durationMs: number;
      diagnostic: string;
      remaining: number;
    }
  | { type: "provisioned"; level: "info"; ts: number; candidate: Candidate; attempts: number }
  | { type: "exhausted"; level: "error"; ts: number; tried: string[] };

export type ProvisioningEventSink = (event: ProvisioningEvent) => void;
