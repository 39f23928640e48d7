/** Run-level failures. Per-backend failures are never thrown; see BackendResult. */

import type { ZodError } from "zod";

export class BenchmarkConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BenchmarkConfigError";
  }
}

export class BenchmarkAbortedError extends Error {
  constructor(message = "benchmark run aborted") {
    super(message);
    this.name = "BenchmarkAbortedError";
  }
}

/** `path: message` for every issue, joined with "; ". */
export function formatIssues(error: ZodError, rootLabel = "root"): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || rootLabel}: ${issue.message}`)
    .join("; ");
}
