/**
 * Launcher interface and the data shapes that flow through a benchmark run.
 *
 * The orchestrator is backend-agnostic. Launchers are the adapters that start
 * one backend's worker in its own environment and hand back whatever it
 * printed; everything after that is plain data.
 */

export interface BackendSpec {
  readonly name: string;
  readonly executable: string;
  readonly modelId?: string;
  readonly script?: string; // passed to the interpreter before the structure path
  readonly args?: readonly string[]; // appended after the model id, e.g. a task name
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string>>;
  readonly timeoutMs?: number; // overrides the run-wide timeout
}

export interface LaunchOptions {
  timeout: number; // milliseconds
  killGraceMs?: number;
  signal?: AbortSignal;
}

export type ExitStatus =
  | { kind: "exited"; code: number | null; signal: NodeJS.Signals | null }
  | { kind: "timed-out"; timeoutMs: number }
  | { kind: "aborted" }
  | { kind: "launch-failed"; message: string };

export interface WorkerInvocation {
  spec: BackendSpec;
  inputPath: string;
  command: string[];
  startedAt: Date;
  finishedAt: Date;
  stdout: string;
  stderr: string;
  exitStatus: ExitStatus;
}

export interface Launcher {
  launch(spec: BackendSpec, inputPath: string, options: LaunchOptions): Promise<WorkerInvocation>;
}

export type BackendStatus =
  | "Success"
  | "ComputationFailed"
  | "LaunchFailed"
  | "Timeout"
  | "MalformedOutput";

/**
 * Outcome for a single backend. `energy` is only set on Success and is passed
 * through in whatever units the backend reported.
 */
export interface BackendResult {
  name: string;
  status: BackendStatus;
  modelId?: string;
  energy?: number;
  elapsedSeconds?: number; // measured by the orchestrator, includes process startup
  workerSeconds?: number; // self-reported by the worker
  exitCode?: number;
  detail?: string;
}

/**
 * Aggregate result structure for a benchmark run.
 */
export interface BenchmarkReport {
  inputPath: string;
  generatedAt: string;
  config: {
    timeoutSeconds: number;
    concurrency: number;
  };
  results: BackendResult[];
  summary: {
    succeeded: number;
    failed: number;
    fastest?: string;
    meanElapsedSeconds: number;
    medianElapsedSeconds: number;
    energySpread?: number;
  };
}
