import { join } from "node:path";
import type { BackendSpec, WorkerInvocation } from "../src/drivers/types.js";

export const FIXTURES = join(__dirname, "fixtures");
export const STRUCTURE = join(FIXTURES, "structures", "POSCAR");

export function workerPath(name: string): string {
  return join(FIXTURES, "workers", name);
}

/** A backend whose "environment" is this Node binary running a fixture worker. */
export function nodeBackend(
  name: string,
  worker: string,
  extra: Partial<Omit<BackendSpec, "name" | "executable" | "script">> = {},
): BackendSpec {
  return {
    name,
    executable: process.execPath,
    script: workerPath(worker),
    ...extra,
  };
}

export function makeInvocation(overrides: Partial<WorkerInvocation> = {}): WorkerInvocation {
  return {
    spec: { name: "mace", executable: "/envs/mace/bin/python", modelId: "medium" },
    inputPath: "POSCAR",
    command: ["/envs/mace/bin/python", "POSCAR", "medium"],
    startedAt: new Date(0),
    finishedAt: new Date(1500),
    stdout: "",
    stderr: "",
    exitStatus: { kind: "exited", code: 0, signal: null },
    ...overrides,
  };
}

export function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

export async function waitFor(check: () => boolean, timeoutMs: number): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) {
      throw new Error("condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
}
