import { z } from "zod";

// AKS: Linux pools are limited to 12 chars, lowercase alphanumerics, leading letter.
const SAFE_NODE_POOL_NAME_RE = /^[a-z][a-z0-9]{0,11}$/;
const SAFE_AZURE_RESOURCE_NAME_RE = /^[A-Za-z0-9._()-]+$/;
const LABEL_PAIR_RE = /^[^=,\s]+=[^=,\s]*$/;
const TAINT_RE = /^[^=:,\s]+(=[^=:,\s]*)?:(NoSchedule|PreferNoSchedule|NoExecute)$/;

export const NODE_POOL_MODES = ["User", "System"] as const;
export const OS_SKUS = ["Ubuntu", "AzureLinux", "CBLMariner", "Windows2019", "Windows2022"] as const;

export const AzureResourceNameSchema = z
  .string()
  .trim()
  .min(1)
  .refine((v) => SAFE_AZURE_RESOURCE_NAME_RE.test(v), {
    message: "invalid Azure resource name (use [A-Za-z0-9._()-]+)",
  });

export const NodePoolNameSchema = z
  .string()
  .trim()
  .min(1)
  .refine((v) => SAFE_NODE_POOL_NAME_RE.test(v), {
    message: "invalid node pool name (use [a-z][a-z0-9]*, at most 12 chars)",
  });

export const NodeLabelsSchema = z
  .string()
  .trim()
  .refine((v) => v === "" || v.split(",").every((pair) => LABEL_PAIR_RE.test(pair)), {
    message: "invalid node labels (expected key=value[,key=value...])",
  });

export const NodeTaintsSchema = z
  .string()
  .trim()
  .refine((v) => v === "" || v.split(",").every((taint) => TAINT_RE.test(taint)), {
    message: "invalid node taints (expected key[=value]:NoSchedule|PreferNoSchedule|NoExecute[,...])",
  });
