import fs from "node:fs";
import path from "node:path";
import { tmpdir } from "node:os";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ProvisioningRequest } from "@skufall/core/lib/fallback/types";

const ensureAzAvailableMock = vi.hoisted(() => vi.fn());
const ensureAzLoggedInMock = vi.hoisted(() => vi.fn());
const createAzNodepoolOperationMock = vi.hoisted(() => vi.fn());
vi.mock("@skufall/core/lib/azure/az-cli", async () => {
  const actual = await vi.importActual<typeof import("@skufall/core/lib/azure/az-cli")>("@skufall/core/lib/azure/az-cli");
  return {
    ...actual,
    ensureAzAvailable: ensureAzAvailableMock,
    ensureAzLoggedIn: ensureAzLoggedInMock,
    createAzNodepoolOperation: createAzNodepoolOperationMock,
  };
});

const baseArgs = {
  "resource-group": "rg-test",
  "cluster-name": "aks-test",
  "sku-primary": "Standard_D8s_v5",
  "sku-secondary": "Standard_E8s_v5",
  "log-level": "fatal",
};

function operationSucceedingOn(sku: string | null) {
  return async (request: ProvisioningRequest) => {
    if (request.candidate.id === sku) return `{"vmSize":"${sku}"}`;
    throw new Error(`ERROR: (AllocationFailed) no capacity for ${request.candidate.id}`);
  };
}

describe("nodepool add", () => {
  let cwd = "";
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    cwd = fs.mkdtempSync(path.join(tmpdir(), "skufall-add-"));
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    ensureAzAvailableMock.mockResolvedValue("/usr/bin/az");
    ensureAzLoggedInMock.mockResolvedValue(undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it("falls back to the secondary SKU and prints its output", async () => {
    createAzNodepoolOperationMock.mockReturnValue(operationSucceedingOn("Standard_E8s_v5"));
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    const code = await runNodePoolAdd(baseArgs, { cwd, env: {} });

    expect(code).toBe(0);
    expect(ensureAzAvailableMock).toHaveBeenCalledWith({ azBin: "az", env: {} });
    expect(ensureAzLoggedInMock).toHaveBeenCalledWith({ azBin: "az", env: {} });
    expect(createAzNodepoolOperationMock).toHaveBeenCalledWith({ azBin: "az", env: {}, attemptTimeoutMs: undefined });
    expect(logSpy).toHaveBeenCalledWith('{"vmSize":"Standard_E8s_v5"}');
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("exits 1 with the attempt log when every SKU fails", async () => {
    createAzNodepoolOperationMock.mockReturnValue(operationSucceedingOn(null));
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    const code = await runNodePoolAdd(baseArgs, { cwd, env: {} });

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      [
        "all SKU attempts failed: Standard_D8s_v5, Standard_E8s_v5",
        "  1. primary Standard_D8s_v5: failed: ERROR: (AllocationFailed) no capacity for Standard_D8s_v5",
        "  2. secondary Standard_E8s_v5: failed: ERROR: (AllocationFailed) no capacity for Standard_E8s_v5",
      ].join("\n"),
    );
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("prints a JSON summary and still exits 1 on exhaustion", async () => {
    createAzNodepoolOperationMock.mockReturnValue(operationSucceedingOn(null));
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    const code = await runNodePoolAdd({ ...baseArgs, json: true }, { cwd, env: {} });

    expect(code).toBe(1);
    expect(logSpy).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({
      ok: false,
      status: "exhausted",
      attempts: [
        { sku: "Standard_D8s_v5", rank: 1, role: "primary", outcome: "failure" },
        { sku: "Standard_E8s_v5", rank: 2, role: "secondary", outcome: "failure" },
      ],
    });
  });

  it("prints a JSON summary instead of the raw output on success", async () => {
    createAzNodepoolOperationMock.mockReturnValue(operationSucceedingOn("Standard_D8s_v5"));
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    const code = await runNodePoolAdd({ ...baseArgs, json: true }, { cwd, env: {} });

    expect(code).toBe(0);
    expect(logSpy).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({ ok: true, status: "provisioned", sku: "Standard_D8s_v5", output: '{"vmSize":"Standard_D8s_v5"}' });
  });

  it("exits 64 before touching az when required flags are missing", async () => {
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    const code = await runNodePoolAdd({ "resource-group": "rg-test" }, { cwd, env: {} });

    expect(code).toBe(64);
    expect(errorSpy).toHaveBeenCalledWith("missing required arguments: --cluster-name --sku-primary");
    expect(ensureAzAvailableMock).not.toHaveBeenCalled();
    expect(createAzNodepoolOperationMock).not.toHaveBeenCalled();
  });

  it("exits 127 when az cannot be found", async () => {
    const { AzCliMissingError } = await import("@skufall/core/lib/azure/az-cli");
    ensureAzAvailableMock.mockRejectedValue(new AzCliMissingError("az"));
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    const code = await runNodePoolAdd(baseArgs, { cwd, env: {} });

    expect(code).toBe(127);
    expect(errorSpy).toHaveBeenCalledWith("Required command 'az' not found in PATH");
    expect(createAzNodepoolOperationMock).not.toHaveBeenCalled();
  });

  it("exits 1 when az has no session", async () => {
    const { AzCliNotLoggedInError } = await import("@skufall/core/lib/azure/az-cli");
    ensureAzLoggedInMock.mockRejectedValue(new AzCliNotLoggedInError());
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    const code = await runNodePoolAdd(baseArgs, { cwd, env: {} });

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Azure CLI isn't logged in. Run 'az login' first.");
  });

  it("skips preflight checks on request", async () => {
    createAzNodepoolOperationMock.mockReturnValue(operationSucceedingOn("Standard_D8s_v5"));
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    const code = await runNodePoolAdd({ ...baseArgs, "skip-preflight": true }, { cwd, env: {} });

    expect(code).toBe(0);
    expect(ensureAzAvailableMock).not.toHaveBeenCalled();
    expect(ensureAzLoggedInMock).not.toHaveBeenCalled();
  });

  it("takes az binary and attempt timeout from flags over runtime env", async () => {
    createAzNodepoolOperationMock.mockReturnValue(operationSucceedingOn("Standard_D8s_v5"));
    const env = { SKUFALL_AZ_BIN: "/opt/az/bin/az", SKUFALL_ATTEMPT_TIMEOUT_MS: "5000" };
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    await runNodePoolAdd(baseArgs, { cwd, env });
    expect(createAzNodepoolOperationMock).toHaveBeenLastCalledWith({ azBin: "/opt/az/bin/az", env, attemptTimeoutMs: 5000 });

    await runNodePoolAdd({ ...baseArgs, "az-bin": "./az", "attempt-timeout": "30" }, { cwd, env });
    expect(createAzNodepoolOperationMock).toHaveBeenLastCalledWith({ azBin: "./az", env, attemptTimeoutMs: 30_000 });
  });

  it("reads runtime settings from the env file in cwd", async () => {
    fs.writeFileSync(path.join(cwd, ".skufall.env"), "SKUFALL_AZ_BIN=/srv/az\n");
    createAzNodepoolOperationMock.mockReturnValue(operationSucceedingOn("Standard_D8s_v5"));
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    await runNodePoolAdd(baseArgs, { cwd, env: {} });

    expect(ensureAzAvailableMock).toHaveBeenCalledWith({ azBin: "/srv/az", env: {} });
  });

  it("rejects an invalid attempt timeout", async () => {
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    const code = await runNodePoolAdd({ ...baseArgs, "attempt-timeout": "soon" }, { cwd, env: {} });

    expect(code).toBe(64);
    expect(errorSpy).toHaveBeenCalledWith("invalid --attempt-timeout (expected a positive integer): soon");
  });

  it("rethrows unexpected errors", async () => {
    ensureAzAvailableMock.mockRejectedValue(new Error("boom"));
    const { runNodePoolAdd } = await import("../src/commands/nodepool/add.js");

    await expect(runNodePoolAdd(baseArgs, { cwd, env: {} })).rejects.toThrow("boom");
  });
});
