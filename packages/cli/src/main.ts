#!/usr/bin/env node
import path from "node:path";
import process from "node:process";
import { pathToFileURL } from "node:url";
import { defineCommand, runMain } from "citty";
import { baseCommands } from "./commands/registry.js";
import { readCliVersion } from "./lib/version.js";

const main = defineCommand({
  meta: {
    name: "skufall",
    description: "Provision AKS node pools from a priority-ordered list of VM SKUs.",
  },
  subCommands: baseCommands,
});

export async function mainEntry(): Promise<void> {
  const [nodeBin = process.execPath, script = "skufall", ...rest] = process.argv;
  const normalized = rest.filter((a) => a !== "--");
  if (normalized.includes("--version") || normalized.includes("-v")) {
    console.log(readCliVersion());
    process.exit(0);
    return;
  }
  process.argv = [nodeBin, script, ...normalized];
  await runMain(main);
}

function shouldRunMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return pathToFileURL(path.resolve(entry)).href === import.meta.url;
}

if (shouldRunMain()) {
  void mainEntry().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    if (process.env.SKUFALL_DEBUG === "1" && err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    process.exitCode = 1;
  });
}
