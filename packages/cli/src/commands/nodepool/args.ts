import type { ArgsDef } from "citty";
import {
  DEFAULT_MAX_COUNT,
  DEFAULT_MIN_COUNT,
  DEFAULT_NODE_COUNT,
  DEFAULT_POOL_NAME,
  type NodePoolParams,
} from "@skufall/core/lib/config/schema-nodepool";
import type { SkuPreferences } from "@skufall/core/lib/fallback/candidates";
import { ConfigurationError } from "@skufall/core/lib/fallback/errors";
import { parseNodePoolParams } from "@skufall/core/lib/fallback/request";
import { coerceTrimmedString, splitListArg } from "@skufall/shared/lib/strings";

export const nodePoolArgs = {
  "resource-group": { type: "string", description: "Resource group of the AKS cluster (required)." },
  "cluster-name": { type: "string", description: "AKS cluster name (required)." },
  "sku-primary": { type: "string", description: "Preferred VM size, tried first (required)." },
  "sku-secondary": { type: "string", description: "VM size tried when the primary fails." },
  "sku-tertiary": { type: "string", description: "VM size tried when the secondary fails." },
  "pool-name": { type: "string", description: `Node pool name (default: ${DEFAULT_POOL_NAME}).` },
  "node-count": { type: "string", description: `Initial node count (default: ${DEFAULT_NODE_COUNT}).` },
  "min-count": { type: "string", description: `Autoscaler minimum (default: ${DEFAULT_MIN_COUNT}).` },
  "max-count": { type: "string", description: `Autoscaler maximum (default: ${DEFAULT_MAX_COUNT}).` },
  zones: { type: "string", description: "Availability zones, comma or space separated (e.g. 1,2,3)." },
  mode: { type: "string", description: "Node pool mode (User|System; default: User)." },
  "node-labels": { type: "string", description: "Node labels: key=value[,key=value...]." },
  "node-taints": { type: "string", description: "Node taints: key=value:effect[,key=value:effect...]." },
  spot: { type: "boolean", description: "Use Spot priority.", default: false },
  "os-sku": { type: "string", description: "OS image family (Ubuntu|AzureLinux|CBLMariner|...; default: Ubuntu)." },
  "k8s-version": { type: "string", description: "Kubernetes version pin (e.g. 1.29.2)." },
  "ssh-key": { type: "string", description: "SSH public key value or path passed to --ssh-key-value." },
  "managed-identity": { type: "string", description: "Managed identity resource ID passed to --assign-identity." },
  "env-file": { type: "string", description: "Runtime env file (default: ./.skufall.env when present)." },
  "az-bin": { type: "string", description: "Azure CLI binary (default: $SKUFALL_AZ_BIN or az)." },
} as const satisfies ArgsDef;

export type NodePoolInput = {
  skus: SkuPreferences;
  params: NodePoolParams;
};

function optionalString(value: unknown): string | undefined {
  const trimmed = coerceTrimmedString(value);
  return trimmed ? trimmed : undefined;
}

function optionalCount(value: unknown, flag: string): number | undefined {
  const text = coerceTrimmedString(value);
  if (!text) return undefined;
  if (!/^\d+$/.test(text)) throw new ConfigurationError(`invalid ${flag} (expected a non-negative integer): ${text}`);
  return Number(text);
}

export function resolveNodePoolInput(args: Record<string, unknown>): NodePoolInput {
  const missing = ["resource-group", "cluster-name", "sku-primary"]
    .filter((key) => !coerceTrimmedString(args[key]))
    .map((key) => `--${key}`);
  if (missing.length > 0) {
    throw new ConfigurationError(`missing required arguments: ${missing.join(" ")}`);
  }

  const params = parseNodePoolParams({
    resourceGroup: coerceTrimmedString(args["resource-group"]),
    clusterName: coerceTrimmedString(args["cluster-name"]),
    poolName: optionalString(args["pool-name"]),
    nodeCount: optionalCount(args["node-count"], "--node-count"),
    minCount: optionalCount(args["min-count"], "--min-count"),
    maxCount: optionalCount(args["max-count"], "--max-count"),
    zones: splitListArg(args.zones),
    mode: optionalString(args.mode),
    labels: optionalString(args["node-labels"]),
    taints: optionalString(args["node-taints"]),
    spot: args.spot === true,
    osSku: optionalString(args["os-sku"]),
    kubernetesVersion: optionalString(args["k8s-version"]),
    sshKey: optionalString(args["ssh-key"]),
    managedIdentity: optionalString(args["managed-identity"]),
  });

  return {
    skus: {
      primary: coerceTrimmedString(args["sku-primary"]),
      secondary: optionalString(args["sku-secondary"]),
      tertiary: optionalString(args["sku-tertiary"]),
    },
    params,
  };
}
