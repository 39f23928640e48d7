/** Local subprocess launcher. Spawns a backend's interpreter as a child process. */

import type { BackendSpec, ExitStatus, LaunchOptions, Launcher, WorkerInvocation } from "./types.js";
import { spawnWithTimeout, type SpawnResult } from "./spawn-helper.js";

/**
 * Argument vector for one worker: `[script] <structure-path> [modelId] [...args]`.
 */
export function buildWorkerArgs(spec: BackendSpec, inputPath: string): string[] {
  const args: string[] = [];
  if (spec.script) {
    args.push(spec.script);
  }
  args.push(inputPath);
  if (spec.modelId) {
    args.push(spec.modelId);
  }
  if (spec.args) {
    args.push(...spec.args);
  }
  return args;
}

function toExitStatus(result: SpawnResult, timeoutMs: number): ExitStatus {
  if (result.launchError !== undefined) {
    return { kind: "launch-failed", message: result.launchError };
  }
  if (result.aborted) {
    return { kind: "aborted" };
  }
  if (result.timedOut) {
    return { kind: "timed-out", timeoutMs };
  }
  return { kind: "exited", code: result.exitCode, signal: result.signal };
}

export class LocalLauncher implements Launcher {
  private baseEnv: NodeJS.ProcessEnv;

  constructor(options?: { env?: NodeJS.ProcessEnv }) {
    this.baseEnv = options?.env ?? process.env;
  }

  async launch(spec: BackendSpec, inputPath: string, options: LaunchOptions): Promise<WorkerInvocation> {
    const timeout = spec.timeoutMs ?? options.timeout;
    const args = buildWorkerArgs(spec, inputPath);

    const env: NodeJS.ProcessEnv = {
      ...this.baseEnv,
      ...spec.env,
    };

    const result = await spawnWithTimeout(spec.executable, args, {
      env,
      cwd: spec.cwd,
      timeout,
      killGraceMs: options.killGraceMs,
      signal: options.signal,
    });

    return {
      spec,
      inputPath,
      command: [spec.executable, ...args],
      startedAt: result.startedAt,
      finishedAt: result.finishedAt,
      stdout: result.stdout,
      stderr: result.stderr,
      exitStatus: toExitStatus(result, timeout),
    };
  }
}
