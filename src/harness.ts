/**
 * Benchmark harness: runs every requested backend against one structure file
 * through a bounded worker pool and assembles an order-preserving report.
 */

import { accessSync, constants, mkdirSync, statSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type {
  BackendResult,
  BackendSpec,
  BenchmarkReport,
  Launcher,
  WorkerInvocation,
} from "./drivers/types.js";
import { LocalLauncher } from "./drivers/local.js";
import { runBackend } from "./runner.js";
import { BenchmarkAbortedError, BenchmarkConfigError } from "./errors.js";
import { summarizeTimings } from "./stats.js";

export const DEFAULT_TIMEOUT_MS = 600_000; // 10 minutes
export const MAX_TIMEOUT_MS = 2 ** 31 - 1; // setTimeout's limit

export interface HarnessOptions {
  launcher?: Launcher;
  timeout?: number; // milliseconds, per backend
  concurrency?: number;
  killGraceMs?: number;
  signal?: AbortSignal;
  outputPath?: string;
  onProgress?: (progress: ProgressInfo) => void;
  onInvocation?: (invocation: WorkerInvocation) => void;
}

export interface ProgressInfo {
  completed: number;
  total: number;
  result: BackendResult;
  elapsed: string;
}

export function formatElapsed(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h${String(minutes % 60).padStart(2, "0")}m`;
  }
  if (minutes > 0) {
    return `${minutes}m${String(seconds % 60).padStart(2, "0")}s`;
  }
  return `${seconds}s`;
}

function checkTimeout(timeoutMs: number, label: string): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new BenchmarkConfigError(
      `${label} must be a positive number of milliseconds up to ${MAX_TIMEOUT_MS}, got ${timeoutMs}`,
    );
  }
}

/**
 * Reject requests that cannot produce a meaningful report: no backends,
 * ambiguous backend names, timeouts the timer cannot represent, or a
 * structure file the workers could not read.
 */
export function validateRequest(
  specs: readonly BackendSpec[],
  inputPath: string,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): void {
  if (specs.length === 0) {
    throw new BenchmarkConfigError("no backends requested");
  }

  checkTimeout(timeoutMs, "timeout");
  const seen = new Set<string>();
  for (const spec of specs) {
    if (seen.has(spec.name)) {
      throw new BenchmarkConfigError(`duplicate backend name "${spec.name}"`);
    }
    seen.add(spec.name);
    if (spec.timeoutMs !== undefined) {
      checkTimeout(spec.timeoutMs, `timeout of backend "${spec.name}"`);
    }
  }

  let isFile: boolean;
  try {
    accessSync(inputPath, constants.R_OK);
    isFile = statSync(inputPath).isFile();
  } catch {
    throw new BenchmarkConfigError(`structure file is not readable: ${inputPath}`);
  }
  if (!isFile) {
    throw new BenchmarkConfigError(`structure path is not a file: ${inputPath}`);
  }
}

export function computeSummary(results: BackendResult[]): BenchmarkReport["summary"] {
  const succeeded = results.filter((r) => r.status === "Success");
  const timed = succeeded.filter(
    (r): r is BackendResult & { elapsedSeconds: number } => r.elapsedSeconds !== undefined,
  );
  const energies = succeeded
    .map((r) => r.energy)
    .filter((e): e is number => e !== undefined);

  let fastest: BackendResult & { elapsedSeconds: number } | undefined;
  for (const r of timed) {
    if (!fastest || r.elapsedSeconds < fastest.elapsedSeconds) {
      fastest = r;
    }
  }

  const timing = summarizeTimings(timed.map((r) => r.elapsedSeconds));

  return {
    succeeded: succeeded.length,
    failed: results.length - succeeded.length,
    ...(fastest ? { fastest: fastest.name } : {}),
    meanElapsedSeconds: timing.mean,
    medianElapsedSeconds: timing.median,
    ...(energies.length >= 2
      ? { energySpread: Math.max(...energies) - Math.min(...energies) }
      : {}),
  };
}

export function saveReport(outputPath: string, report: BenchmarkReport): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, JSON.stringify(report, null, 2));
}

export async function runBenchmark(
  specs: readonly BackendSpec[],
  inputPath: string,
  options: HarnessOptions = {},
): Promise<BenchmarkReport> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  validateRequest(specs, inputPath, timeout);

  const { signal, onProgress } = options;
  if (signal?.aborted) {
    throw new BenchmarkAbortedError();
  }

  const launcher = options.launcher ?? new LocalLauncher();
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));

  // Slots are filled by request index so completion order never shows.
  const slots: Array<BackendResult | undefined> = specs.map(() => undefined);
  const startTime = Date.now();
  let completedCount = 0;
  let callbackError: unknown;

  const processSpec = async (index: number): Promise<void> => {
    const result = await runBackend(specs[index], inputPath, {
      launcher,
      timeout,
      killGraceMs: options.killGraceMs,
      signal,
      onInvocation: options.onInvocation,
    });
    slots[index] = result;
    completedCount++;

    if (onProgress) {
      try {
        onProgress({
          completed: completedCount,
          total: specs.length,
          result,
          elapsed: formatElapsed(Date.now() - startTime),
        });
      } catch (err) {
        // Rethrown once the pool drains so no worker is left running.
        if (callbackError === undefined) {
          callbackError = err;
        }
      }
    }
  };

  const queue = specs.map((_, index) => index);
  const running = new Set<Promise<void>>();

  while (queue.length > 0 || running.size > 0) {
    // Fill up to concurrency limit
    while (running.size < concurrency && !signal?.aborted) {
      const index = queue.shift();
      if (index === undefined) break;
      const promise = processSpec(index).then(() => {
        running.delete(promise);
      });
      running.add(promise);
    }

    if (running.size > 0) {
      await Promise.race(running);
    } else if (signal?.aborted) {
      break;
    }
  }

  if (signal?.aborted) {
    throw new BenchmarkAbortedError();
  }
  if (callbackError !== undefined) {
    throw callbackError;
  }

  const results = slots.filter((r): r is BackendResult => r !== undefined);
  if (results.length !== specs.length) {
    throw new Error(`expected ${specs.length} results, collected ${results.length}`);
  }

  const report: BenchmarkReport = {
    inputPath,
    generatedAt: new Date().toISOString(),
    config: {
      timeoutSeconds: timeout / 1000,
      concurrency,
    },
    results,
    summary: computeSummary(results),
  };

  if (options.outputPath) {
    saveReport(options.outputPath, report);
  }

  return report;
}
