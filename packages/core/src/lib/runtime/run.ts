import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";

export type RunOpts = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  maxOutputBytes?: number;
  signal?: AbortSignal;
};

export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  /** Combined stdout/stderr collected before the command ended. */
  readonly output: string;

  constructor(message: string, params: { command: string; exitCode: number | null; output: string }) {
    super(message);
    this.name = "CommandError";
    this.command = params.command;
    this.exitCode = params.exitCode;
    this.output = params.output;
  }
}

const SHELL_SAFE_ARG_RE = /^[A-Za-z0-9_./:=,@+%-]+$/;

export function formatCommand(cmd: string, args: readonly string[]): string {
  return [cmd, ...args]
    .map((arg) => (SHELL_SAFE_ARG_RE.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`))
    .join(" ");
}

/**
 * Runs a command with stdout and stderr interleaved into one buffer (like `2>&1`).
 * Resolves with the trimmed output on exit code 0; otherwise rejects with a
 * CommandError that still carries the output.
 */
export async function captureCombined(cmd: string, args: readonly string[], opts: RunOpts = {}): Promise<string> {
  if (opts.signal?.aborted) {
    throw new CommandError(`${cmd} aborted before start`, { command: cmd, exitCode: null, output: "" });
  }

  return await new Promise<string>((resolve, reject) => {
    let settled = false;
    let totalBytes = 0;
    const chunks: Buffer[] = [];
    const collected = () => Buffer.concat(chunks).toString("utf8").trim();

    const child = spawn(cmd, [...args], {
      cwd: opts.cwd,
      env: opts.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const finish = (err?: Error, value?: string) => {
      if (settled) return;
      settled = true;
      if (timeout) clearTimeout(timeout);
      opts.signal?.removeEventListener("abort", onAbort);
      if (err) reject(err);
      else resolve(value ?? "");
    };

    const fail = (message: string, exitCode: number | null) => {
      finish(new CommandError(message, { command: cmd, exitCode, output: collected() }));
    };

    const onAbort = () => {
      child.kill("SIGTERM");
      fail(`${cmd} aborted`, null);
    };

    const timeout = opts.timeoutMs
      ? setTimeout(() => {
          child.kill("SIGTERM");
          fail(`${cmd} timed out after ${opts.timeoutMs}ms`, null);
        }, opts.timeoutMs)
      : null;

    opts.signal?.addEventListener("abort", onAbort, { once: true });

    const onData = (buf: Buffer) => {
      if (opts.maxOutputBytes) {
        totalBytes += buf.length;
        if (totalBytes > opts.maxOutputBytes) {
          child.kill("SIGTERM");
          fail(`${cmd} output exceeded ${opts.maxOutputBytes} bytes`, null);
          return;
        }
      }
      chunks.push(Buffer.from(buf));
    };
    child.stdout.on("data", onData);
    child.stderr.on("data", onData);

    child.on("error", (err) => finish(err));
    child.on("close", (code) => {
      if (code === 0) finish(undefined, collected());
      else fail(`${cmd} exited with code ${code ?? "null"}`, code);
    });
  });
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) return false;
    await fs.access(filePath, fs.constants.X_OK);
    return true;
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT" || code === "EACCES" || code === "ENOTDIR") return false;
    throw err;
  }
}

/** Same lookup `command -v` does: explicit paths are checked directly, bare names against PATH. */
export async function resolveBinary(bin: string, env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
  const name = bin.trim();
  if (!name) return null;
  if (name.includes("/") || name.includes(path.sep)) {
    const resolved = path.resolve(name);
    return (await isExecutable(resolved)) ? resolved : null;
  }
  const dirs = String(env.PATH ?? "")
    .split(path.delimiter)
    .filter(Boolean);
  for (const dir of dirs) {
    const candidate = path.join(dir, name);
    if (await isExecutable(candidate)) return candidate;
  }
  return null;
}
