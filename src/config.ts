/**
 * Benchmark configuration: backends from a JSON file and/or `--backend` flags.
 *
 * Config file shape:
 *   {
 *     "timeoutSeconds": 600,
 *     "concurrency": 1,
 *     "script": "bench_driver.py",
 *     "backends": [
 *       { "name": "mace", "executable": "/opt/envs/mace/bin/python", "modelId": "mace" },
 *       { "name": "uma", "executable": "/opt/envs/uma/bin/python", "modelId": "uma-s-1p1",
 *         "args": ["omat"], "timeoutSeconds": 1200 }
 *     ]
 *   }
 *
 * `script` and `cwd` are resolved against the config file's directory.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import type { BackendSpec } from "./drivers/types.js";
import { BenchmarkConfigError, formatIssues } from "./errors.js";
import { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from "./harness.js";

const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMEOUT_MS / 1000);

const TimeoutSecondsSchema = z
  .number()
  .positive("Timeout must be a positive number of seconds")
  .finite("Timeout must be a finite number of seconds")
  .max(MAX_TIMEOUT_SECONDS, `Timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds`);

const BackendEntrySchema = z.object({
  name: z.string().min(1, "Backend name must not be empty"),
  executable: z.string().min(1, "Executable must not be empty"),
  modelId: z.string().min(1).optional(),
  script: z.string().min(1).optional(),
  cwd: z.string().min(1).optional(),
  env: z.record(z.string()).optional(),
  args: z.array(z.string()).optional(),
  timeoutSeconds: TimeoutSecondsSchema.optional(),
});

const ConfigFileSchema = z.object({
  timeoutSeconds: TimeoutSecondsSchema.optional(),
  concurrency: z.number().int().min(1).optional(),
  script: z.string().min(1).optional(),
  backends: z.array(BackendEntrySchema).default([]),
});

const RunSettingsSchema = z.object({
  timeoutSeconds: TimeoutSecondsSchema,
  concurrency: z.number().int().min(1, "Concurrency must be at least 1"),
});

type BackendEntry = z.infer<typeof BackendEntrySchema>;

export interface ConfigFile {
  timeoutSeconds?: number;
  concurrency?: number;
  backends: BackendSpec[];
}

export interface BenchConfig {
  timeoutMs: number;
  concurrency: number;
  backends: BackendSpec[];
}

export interface ConfigOverrides {
  file?: ConfigFile;
  backendArgs?: string[];
  script?: string;
  timeoutSeconds?: number;
  concurrency?: number;
}

function toBackendSpec(entry: BackendEntry, baseDir?: string, defaultScript?: string): BackendSpec {
  const at = (p: string): string => (baseDir ? resolve(baseDir, p) : p);
  const script = entry.script ?? defaultScript;

  return {
    name: entry.name,
    executable: entry.executable,
    ...(entry.modelId !== undefined ? { modelId: entry.modelId } : {}),
    ...(script !== undefined ? { script: at(script) } : {}),
    ...(entry.cwd !== undefined ? { cwd: at(entry.cwd) } : {}),
    ...(entry.env !== undefined ? { env: entry.env } : {}),
    ...(entry.args !== undefined ? { args: entry.args } : {}),
    ...(entry.timeoutSeconds !== undefined ? { timeoutMs: entry.timeoutSeconds * 1000 } : {}),
  };
}

export function loadConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new BenchmarkConfigError(
      `failed to read config ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BenchmarkConfigError(`invalid config ${path}: ${formatIssues(parsed.error)}`);
  }

  const baseDir = dirname(resolve(path));
  const { timeoutSeconds, concurrency, script, backends } = parsed.data;
  return {
    ...(timeoutSeconds !== undefined ? { timeoutSeconds } : {}),
    ...(concurrency !== undefined ? { concurrency } : {}),
    backends: backends.map((entry) => toBackendSpec(entry, baseDir, script)),
  };
}

/**
 * Parse a `--backend` flag: `name=executable[,modelId]`.
 */
export function parseBackendArg(arg: string): BackendSpec {
  const eq = arg.indexOf("=");
  if (eq <= 0) {
    throw new BenchmarkConfigError(
      `invalid --backend "${arg}": expected name=executable[,modelId]`,
    );
  }

  const name = arg.slice(0, eq).trim();
  const rest = arg.slice(eq + 1);
  const comma = rest.indexOf(",");
  const executable = (comma === -1 ? rest : rest.slice(0, comma)).trim();
  const modelId = comma === -1 ? undefined : rest.slice(comma + 1).trim();

  const parsed = BackendEntrySchema.safeParse({
    name,
    executable,
    ...(modelId ? { modelId } : {}),
  });
  if (!parsed.success) {
    throw new BenchmarkConfigError(`invalid --backend "${arg}": ${formatIssues(parsed.error)}`);
  }
  return toBackendSpec(parsed.data);
}

/**
 * Merge the config file with command-line flags. Flags win for run settings;
 * flag backends come after file backends; `script` fills in backends that
 * have none.
 */
export function resolveBenchConfig(overrides: ConfigOverrides): BenchConfig {
  const fileBackends = overrides.file?.backends ?? [];
  const flagBackends = (overrides.backendArgs ?? []).map(parseBackendArg);

  const backends = [...fileBackends, ...flagBackends].map((spec) =>
    spec.script === undefined && overrides.script !== undefined
      ? { ...spec, script: overrides.script }
      : spec,
  );

  if (backends.length === 0) {
    throw new BenchmarkConfigError("no backends configured (use --config or --backend)");
  }

  const settings = RunSettingsSchema.safeParse({
    timeoutSeconds:
      overrides.timeoutSeconds ?? overrides.file?.timeoutSeconds ?? DEFAULT_TIMEOUT_MS / 1000,
    concurrency: overrides.concurrency ?? overrides.file?.concurrency ?? 1,
  });
  if (!settings.success) {
    throw new BenchmarkConfigError(`invalid settings: ${formatIssues(settings.error)}`);
  }

  return {
    timeoutMs: settings.data.timeoutSeconds * 1000,
    concurrency: settings.data.concurrency,
    backends,
  };
}
