import { nodepool } from "./nodepool/index.js";

export const baseCommands = {
  nodepool,
};
