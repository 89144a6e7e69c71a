import type { AttemptRecord, ProvisioningResult } from "./types.js";

function indentContinuation(text: string, indent: string): string {
  return text.split("\n").join(`\n${indent}`);
}

export function formatAttemptLine<TOutput>(record: AttemptRecord<TOutput>): string {
  const { candidate, outcome } = record;
  const head = `${candidate.rank}. ${candidate.role} ${candidate.id}`;
  if (outcome.kind === "success") return `${head}: succeeded`;
  return `${head}: failed: ${indentContinuation(outcome.diagnostic, "     ")}`;
}

export function formatAttemptReport<TOutput>(result: ProvisioningResult<TOutput>): string[] {
  const lines = result.attempts.map((a) => formatAttemptLine(a));
  if (result.status === "provisioned") {
    lines.push(`provisioned with SKU '${result.candidate.id}' after ${result.attempts.length} attempt(s)`);
  } else {
    lines.push(`exhausted ${result.attempts.length} SKU candidate(s) without success`);
  }
  return lines;
}

export type AttemptSummary = {
  sku: string;
  rank: number;
  role: string;
  outcome: "success" | "failure";
  durationMs: number;
  diagnostic?: string;
};

export type ResultSummary<TOutput> = {
  ok: boolean;
  status: ProvisioningResult<TOutput>["status"];
  sku?: string;
  output?: TOutput;
  attempts: AttemptSummary[];
};

export function summarizeResult<TOutput>(result: ProvisioningResult<TOutput>): ResultSummary<TOutput> {
  const attempts = result.attempts.map((a): AttemptSummary => ({
    sku: a.candidate.id,
    rank: a.candidate.rank,
    role: a.candidate.role,
    outcome: a.outcome.kind,
    durationMs: a.durationMs,
    ...(a.outcome.kind === "failure" ? { diagnostic: a.outcome.diagnostic } : {}),
  }));
  if (result.status === "provisioned") {
    return { ok: true, status: result.status, sku: result.candidate.id, output: result.output, attempts };
  }
  return { ok: false, status: result.status, attempts };
}
