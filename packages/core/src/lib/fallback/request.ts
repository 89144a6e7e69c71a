import { NodePoolParamsSchema, type NodePoolParams } from "../config/schema-nodepool.js";
import { ConfigurationError } from "./errors.js";
import type { Candidate, ProvisioningRequest } from "./types.js";

export function parseNodePoolParams(raw: unknown): NodePoolParams {
  const parsed = NodePoolParamsSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues.map((issue) => {
    const at = issue.path.join(".");
    return at ? `${at}: ${issue.message}` : issue.message;
  });
  throw new ConfigurationError("invalid node pool parameters", { issues });
}

export function buildProvisioningRequest(params: NodePoolParams, candidate: Candidate): ProvisioningRequest {
  return Object.freeze({
    ...params,
    zones: Object.freeze([...params.zones]),
    candidate,
  });
}
