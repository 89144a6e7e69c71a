import process from "node:process";
import { defineCommand } from "citty";
import { buildNodepoolAddArgs } from "@skufall/core/lib/azure/nodepool-args";
import { loadRuntimeEnv } from "@skufall/core/lib/config/runtime-env";
import { buildCandidateList } from "@skufall/core/lib/fallback/candidates";
import { buildProvisioningRequest } from "@skufall/core/lib/fallback/request";
import { formatCommand } from "@skufall/core/lib/runtime/run";
import { coerceTrimmedString } from "@skufall/shared/lib/strings";
import { EXIT_OK, exitCodeForError } from "../../lib/exit-codes.js";
import { nodePoolArgs, resolveNodePoolInput } from "./args.js";

/** Prints the commands `add` would run, in order, without executing them. */
export function runNodePoolPlan(args: Record<string, unknown>, opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): number {
  try {
    const runtimeEnv = loadRuntimeEnv({
      cwd: opts.cwd ?? process.cwd(),
      envFile: coerceTrimmedString(args["env-file"]),
      env: opts.env ?? process.env,
    });
    const { skus, params } = resolveNodePoolInput(args);
    const azBin = coerceTrimmedString(args["az-bin"]) || runtimeEnv.values.SKUFALL_AZ_BIN;
    const candidates = buildCandidateList(skus);

    console.log(`plan: node pool ${params.poolName} on ${params.resourceGroup}/${params.clusterName} (${candidates.length} SKU(s))`);
    for (const candidate of candidates) {
      const request = buildProvisioningRequest(params, candidate);
      console.log(`${candidate.rank}. ${candidate.role} ${candidate.id}`);
      console.log(`   ${formatCommand(azBin, buildNodepoolAddArgs(request))}`);
    }
    return EXIT_OK;
  } catch (err) {
    const code = exitCodeForError(err);
    if (code === null) throw err;
    console.error(err instanceof Error ? err.message : String(err));
    return code;
  }
}

export const nodePoolPlan = defineCommand({
  meta: {
    name: "plan",
    description: "Show the SKU order and az commands without executing them.",
  },
  args: nodePoolArgs,
  run({ args }) {
    process.exitCode = runNodePoolPlan(args);
  },
});
