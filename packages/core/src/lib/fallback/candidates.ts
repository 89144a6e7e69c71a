import { coerceTrimmedString } from "@skufall/shared/lib/strings";
import { ConfigurationError } from "./errors.js";
import { CANDIDATE_ROLES, type Candidate } from "./types.js";

export type SkuPreferences = {
  primary: string;
  secondary?: string;
  tertiary?: string;
};

/**
 * Primary first, then secondary, then tertiary. Blank fallbacks are omitted,
 * and a fallback that repeats an earlier SKU is dropped so no SKU is tried twice.
 */
export function buildCandidateList(prefs: SkuPreferences): Candidate[] {
  const primary = coerceTrimmedString(prefs.primary);
  if (!primary) throw new ConfigurationError("missing primary SKU");

  const slots = [primary, coerceTrimmedString(prefs.secondary), coerceTrimmedString(prefs.tertiary)];
  const seen = new Set<string>();
  const out: Candidate[] = [];
  slots.forEach((id, index) => {
    const role = CANDIDATE_ROLES[index];
    if (!id || !role || seen.has(id)) return;
    seen.add(id);
    out.push(Object.freeze({ id, rank: index + 1, role }));
  });
  return out;
}

export function assertCandidateOrder(candidates: readonly Candidate[]): void {
  if (candidates.length === 0) throw new ConfigurationError("no SKU candidates to try");
  const seen = new Set<string>();
  let lastRank = 0;
  for (const candidate of candidates) {
    const id = candidate.id.trim();
    if (!id) throw new ConfigurationError(`empty SKU at rank ${candidate.rank}`);
    if (seen.has(id)) throw new ConfigurationError(`duplicate SKU candidate: ${id}`);
    if (candidate.rank <= lastRank) {
      throw new ConfigurationError(`SKU ranks must increase (got ${candidate.rank} after ${lastRank})`);
    }
    seen.add(id);
    lastRank = candidate.rank;
  }
}
