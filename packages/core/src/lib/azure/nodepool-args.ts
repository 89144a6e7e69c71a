import type { ProvisioningRequest } from "../fallback/types.js";

export function buildNodepoolAddArgs(request: ProvisioningRequest): string[] {
  const args = [
    "aks",
    "nodepool",
    "add",
    "--resource-group",
    request.resourceGroup,
    "--cluster-name",
    request.clusterName,
    "--name",
    request.poolName,
    "--node-count",
    String(request.nodeCount),
    "--node-vm-size",
    request.candidate.id,
    "--mode",
    request.mode,
    "--min-count",
    String(request.minCount),
    "--max-count",
    String(request.maxCount),
    "--enable-cluster-autoscaler",
    "--os-sku",
    request.osSku,
  ];

  if (request.zones.length > 0) args.push("--zones", ...request.zones);
  if (request.labels) args.push("--labels", request.labels);
  if (request.taints) args.push("--node-taints", request.taints);
  if (request.spot) args.push("--priority", "Spot");
  if (request.kubernetesVersion) args.push("--kubernetes-version", request.kubernetesVersion);
  if (request.sshKey) args.push("--ssh-key-value", request.sshKey);
  if (request.managedIdentity) args.push("--assign-identity", request.managedIdentity);

  return args;
}
