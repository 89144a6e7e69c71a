import { z } from "zod";
import {
  AzureResourceNameSchema,
  NODE_POOL_MODES,
  NodeLabelsSchema,
  NodePoolNameSchema,
  NodeTaintsSchema,
  OS_SKUS,
} from "@skufall/shared/lib/identifiers";
import { uniqueInOrder } from "@skufall/shared/lib/strings";

export const DEFAULT_POOL_NAME = "memnp";
export const DEFAULT_NODE_COUNT = 2;
export const DEFAULT_MIN_COUNT = 1;
export const DEFAULT_MAX_COUNT = 5;
export const MAX_NODE_COUNT = 1000;

const KUBERNETES_VERSION_RE = /^\d+\.\d+(\.\d+)?$/;

const NodeCountSchema = z.number().int().min(0).max(MAX_NODE_COUNT);

export const NodePoolParamsSchema = z
  .object({
    resourceGroup: AzureResourceNameSchema,
    clusterName: AzureResourceNameSchema,
    poolName: NodePoolNameSchema.default(DEFAULT_POOL_NAME),
    nodeCount: NodeCountSchema.default(DEFAULT_NODE_COUNT),
    minCount: NodeCountSchema.default(DEFAULT_MIN_COUNT),
    maxCount: NodeCountSchema.min(1).default(DEFAULT_MAX_COUNT),
    zones: z
      .array(z.string().trim().min(1))
      .default(() => [])
      .transform((zones) => uniqueInOrder(zones)),
    mode: z.enum(NODE_POOL_MODES).default("User"),
    labels: NodeLabelsSchema.default(""),
    taints: NodeTaintsSchema.default(""),
    spot: z.boolean().default(false),
    osSku: z.enum(OS_SKUS).default("Ubuntu"),
    kubernetesVersion: z
      .string()
      .trim()
      .default("")
      .refine((v) => v === "" || KUBERNETES_VERSION_RE.test(v), {
        message: "invalid kubernetes version (expected 1.29 or 1.29.2)",
      }),
    sshKey: z.string().trim().default(""),
    managedIdentity: z.string().trim().default(""),
  })
  .superRefine((value, ctx) => {
    if (value.minCount > value.maxCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "minCount must be <= maxCount",
        path: ["minCount"],
      });
      return;
    }
    if (value.nodeCount < value.minCount || value.nodeCount > value.maxCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `nodeCount must be between minCount (${value.minCount}) and maxCount (${value.maxCount})`,
        path: ["nodeCount"],
      });
    }
  });

export type NodePoolParamsInput = z.input<typeof NodePoolParamsSchema>;
export type NodePoolParams = z.infer<typeof NodePoolParamsSchema>;
