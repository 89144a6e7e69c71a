import type { AttemptLog } from "./types.js";
import { formatAttemptLine } from "./report.js";

export class ConfigurationError extends Error {
  readonly code = "configuration";
  readonly issues: string[];

  constructor(message: string, params: { issues?: string[] } = {}) {
    const issues = params.issues ?? [];
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class ExhaustionError<TOutput = string> extends Error {
  readonly code = "exhausted";
  readonly attempts: AttemptLog<TOutput>;

  constructor(attempts: AttemptLog<TOutput>) {
    const tried = attempts.map((a) => a.candidate.id).join(", ");
    const lines = attempts.map((a) => `  ${formatAttemptLine(a)}`);
    super([`all SKU attempts failed: ${tried}`, ...lines].join("\n"));
    this.name = "ExhaustionError";
    this.attempts = attempts;
  }
}
