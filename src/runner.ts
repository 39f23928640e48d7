/**
 * Backend runner: launch one worker, extract its protocol record, and turn
 * every possible outcome into a BackendResult. Nothing thrown by the launcher
 * escapes this module.
 */

import type {
  BackendResult,
  BackendSpec,
  Launcher,
  WorkerInvocation,
} from "./drivers/types.js";
import { extractResult, truncateDetail } from "./extract.js";

const STDERR_TAIL_CHARS = 1000;

export interface RunBackendOptions {
  launcher: Launcher;
  timeout: number; // milliseconds, unless the spec carries its own
  killGraceMs?: number;
  signal?: AbortSignal;
  onInvocation?: (invocation: WorkerInvocation) => void;
}

export function elapsedSeconds(invocation: WorkerInvocation): number {
  return (invocation.finishedAt.getTime() - invocation.startedAt.getTime()) / 1000;
}

function formatSeconds(ms: number): string {
  return `${ms / 1000}s`;
}

function partialOutput(invocation: WorkerInvocation): string {
  const combined = [invocation.stdout.trim(), invocation.stderr.trim()]
    .filter((s) => s.length > 0)
    .join("\n");
  return combined.length > 0 ? `\n${truncateDetail(combined, STDERR_TAIL_CHARS)}` : "";
}

function stderrTail(invocation: WorkerInvocation): string {
  const stderr = invocation.stderr.trim();
  return stderr.length > 0 ? `\n--- stderr ---\n${truncateDetail(stderr, STDERR_TAIL_CHARS)}` : "";
}

/**
 * Map a finished invocation to the user-facing result. Pure; the launcher is
 * the only part that touches processes.
 */
export function toBackendResult(invocation: WorkerInvocation): BackendResult {
  const { spec, exitStatus } = invocation;
  const base = {
    name: spec.name,
    ...(spec.modelId !== undefined ? { modelId: spec.modelId } : {}),
  };

  switch (exitStatus.kind) {
    case "launch-failed":
      return {
        ...base,
        status: "LaunchFailed",
        detail: `failed to start ${spec.executable}: ${exitStatus.message}`,
      };

    case "timed-out":
      return {
        ...base,
        status: "Timeout",
        detail: `timed out after ${formatSeconds(exitStatus.timeoutMs)}${partialOutput(invocation)}`,
      };

    case "aborted":
      return {
        ...base,
        status: "Timeout",
        detail: `aborted after ${elapsedSeconds(invocation).toFixed(3)}s${partialOutput(invocation)}`,
      };

    case "exited": {
      const exitCode = exitStatus.code ?? undefined;
      const withExit = {
        ...base,
        ...(exitCode !== undefined ? { exitCode } : {}),
      };
      // Elapsed time only accompanies a decoded record.
      const withTiming = { ...withExit, elapsedSeconds: elapsedSeconds(invocation) };
      const extracted = extractResult(invocation.stdout);

      if (extracted.status === "Success") {
        return {
          ...withTiming,
          status: "Success",
          energy: extracted.energy,
          workerSeconds: extracted.workerSeconds,
          ...(exitCode !== undefined && exitCode !== 0
            ? { detail: `worker exited with code ${exitCode} after reporting a result` }
            : {}),
        };
      }

      if (extracted.status === "ComputationFailed") {
        return { ...withTiming, status: "ComputationFailed", detail: extracted.detail };
      }

      let prefix = "";
      if (exitStatus.signal) {
        prefix = `killed by ${exitStatus.signal}: `;
      } else if (exitCode !== undefined && exitCode !== 0) {
        prefix = `exit code ${exitCode}: `;
      }
      return {
        ...withExit,
        status: "MalformedOutput",
        detail: `${prefix}${extracted.detail}${stderrTail(invocation)}`,
      };
    }
  }
}

export async function runBackend(
  spec: BackendSpec,
  inputPath: string,
  options: RunBackendOptions,
): Promise<BackendResult> {
  let result: BackendResult;
  let invocation: WorkerInvocation;
  try {
    invocation = await options.launcher.launch(spec, inputPath, {
      timeout: options.timeout,
      killGraceMs: options.killGraceMs,
      signal: options.signal,
    });
    result = toBackendResult(invocation);
  } catch (err) {
    return {
      name: spec.name,
      status: "LaunchFailed",
      ...(spec.modelId !== undefined ? { modelId: spec.modelId } : {}),
      detail: err instanceof Error ? err.message : String(err),
    };
  }

  if (options.onInvocation) {
    try {
      options.onInvocation(invocation);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      result = {
        ...result,
        detail: [result.detail, `onInvocation hook failed: ${message}`].filter(Boolean).join("\n"),
      };
    }
  }

  return result;
}
