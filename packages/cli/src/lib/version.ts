import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export function resolvePackageRoot(fromUrl: string = import.meta.url): string {
  let dir = path.dirname(fileURLToPath(fromUrl));
  for (let i = 0; i < 5; i += 1) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.dirname(fileURLToPath(fromUrl));
}

export function readCliVersion(rootDir: string = resolvePackageRoot()): string {
  const raw = fs.readFileSync(path.join(rootDir, "package.json"), "utf8");
  const parsed: unknown = JSON.parse(raw);
  const version =
    parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string" ? parsed.version : "";
  if (!version) throw new Error("missing version in package.json");
  return version;
}
