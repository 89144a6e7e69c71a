import { defineCommand } from "citty";
import { nodePoolAdd } from "./add.js";
import { nodePoolPlan } from "./plan.js";

export const nodepool = defineCommand({
  meta: {
    name: "nodepool",
    description: "AKS node pool operations with ordered SKU fallback.",
  },
  subCommands: {
    add: nodePoolAdd,
    plan: nodePoolPlan,
  },
});
