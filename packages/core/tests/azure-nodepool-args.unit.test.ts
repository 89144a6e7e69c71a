import { describe, expect, it } from "vitest";
import { buildNodepoolAddArgs } from "../src/lib/azure/nodepool-args.js";
import { buildProvisioningRequest, parseNodePoolParams } from "../src/lib/fallback/request.js";

const candidate = { id: "Standard_E8s_v5", rank: 1, role: "primary" } as const;

describe("buildNodepoolAddArgs", () => {
  it("emits the fixed flags for a minimal request", () => {
    const request = buildProvisioningRequest(parseNodePoolParams({ resourceGroup: "rg-test", clusterName: "aks-test" }), candidate);
    expect(buildNodepoolAddArgs(request)).toEqual([
      "aks",
      "nodepool",
      "add",
      "--resource-group",
      "rg-test",
      "--cluster-name",
      "aks-test",
      "--name",
      "memnp",
      "--node-count",
      "2",
      "--node-vm-size",
      "Standard_E8s_v5",
      "--mode",
      "User",
      "--min-count",
      "1",
      "--max-count",
      "5",
      "--enable-cluster-autoscaler",
      "--os-sku",
      "Ubuntu",
    ]);
  });

  it("appends optional flags only when set", () => {
    const params = parseNodePoolParams({
      resourceGroup: "rg-test",
      clusterName: "aks-test",
      poolName: "mempool",
      nodeCount: 3,
      minCount: 2,
      maxCount: 8,
      zones: ["1", "2", "3"],
      labels: "workload=mem",
      taints: "dedicated=mem:NoSchedule",
      spot: true,
      osSku: "AzureLinux",
      kubernetesVersion: "1.29.2",
      sshKey: "/home/test/.ssh/id_test.pub",
      managedIdentity: "/subscriptions/test/resourceGroups/rg/providers/Microsoft.ManagedIdentity/userAssignedIdentities/test",
    });
    const args = buildNodepoolAddArgs(buildProvisioningRequest(params, candidate));
    expect(args.slice(22)).toEqual([
      "--zones",
      "1",
      "2",
      "3",
      "--labels",
      "workload=mem",
      "--node-taints",
      "dedicated=mem:NoSchedule",
      "--priority",
      "Spot",
      "--kubernetes-version",
      "1.29.2",
      "--ssh-key-value",
      "/home/test/.ssh/id_test.pub",
      "--assign-identity",
      "/subscriptions/test/resourceGroups/rg/providers/Microsoft.ManagedIdentity/userAssignedIdentities/test",
    ]);
    expect(args.slice(8, 11)).toEqual(["mempool", "--node-count", "3"]);
    expect(args[21]).toBe("AzureLinux");
  });
});
