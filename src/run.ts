#!/usr/bin/env node
/**
 * CLI entry point for the benchmark harness.
 *
 * Usage:
 *   npx tsx src/run.ts POSCAR --config backends.json
 *   npx tsx src/run.ts POSCAR --script bench_driver.py \
 *     --backend mace=/opt/envs/mace/bin/python,mace \
 *     --backend sevenn=/opt/envs/sevenn/bin/python,sevenn
 */

import minimist from "minimist";
import { basename, join, resolve } from "node:path";
import type { WorkerInvocation } from "./drivers/types.js";
import { loadConfigFile, resolveBenchConfig } from "./config.js";
import { runBenchmark } from "./harness.js";
import { renderReport } from "./report.js";
import { abortOnSignals } from "./signals.js";
import { BenchmarkAbortedError, BenchmarkConfigError } from "./errors.js";

const USAGE = `
MLIP Benchmark Harness

Usage:
  npx tsx src/run.ts <structure> [options]

Required:
  <structure>       Structure file passed to every worker (or --structure)
  --config          JSON file listing backends, and/or
  --backend         name=executable[,modelId]  (repeatable)

Options:
  --script          Worker script passed to each interpreter before the structure path
  --timeout         Per-backend timeout in seconds (default: 600)
  --concurrency     Backends run in parallel (default: 1)
  --output          Report file path (default: results/benchmark_<structure>_<timestamp>.json)
  --no-save         Do not write a report file
  --json            Print the report as JSON instead of a table
  --verbose         Echo every worker's stdout/stderr to stderr
  --help            Show this help message
`.trim();

function printUsage(): void {
  console.log(USAGE);
}

function toStringList(value: unknown): string[] {
  if (value === undefined) return [];
  const values = Array.isArray(value) ? value : [value];
  return values.map((v) => String(v));
}

function optionalString(value: unknown): string | undefined {
  return value === undefined || value === "" ? undefined : String(value);
}

function optionalNumber(value: unknown): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function formatFilePart(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, "_");
}

function formatTimestamp(): string {
  return new Date().toISOString().replace(/[:.]/g, "-").slice(0, 19) + "Z";
}

function echoInvocation(invocation: WorkerInvocation): void {
  const label = invocation.spec.name.toUpperCase();
  console.error(`\n[INFO] ${invocation.spec.name}: ${invocation.command.join(" ")}`);
  console.error(`--- ${label} STDOUT ---\n${invocation.stdout}`);
  console.error(`--- ${label} STDERR ---\n${invocation.stderr}`);
}

async function main(): Promise<void> {
  const args = minimist(process.argv.slice(2), {
    string: ["structure", "config", "backend", "script", "output"],
    boolean: ["json", "verbose", "help", "save"],
    default: {
      save: true,
    },
    alias: {
      h: "help",
      b: "backend",
      c: "config",
    },
  });

  if (args.help) {
    printUsage();
    process.exit(0);
  }

  const structure = optionalString(args.structure) ?? optionalString(args._[0]);
  if (!structure) {
    console.error("Error: a structure file is required");
    printUsage();
    process.exit(1);
  }

  const configPath = optionalString(args.config);
  const config = resolveBenchConfig({
    file: configPath ? loadConfigFile(configPath) : undefined,
    backendArgs: toStringList(args.backend),
    script: optionalString(args.script),
    timeoutSeconds: optionalNumber(args.timeout),
    concurrency: optionalNumber(args.concurrency),
  });

  const outputPath = args.save
    ? optionalString(args.output) ??
      join(
        resolve(process.cwd(), "results"),
        `benchmark_${formatFilePart(basename(structure))}_${formatTimestamp()}.json`,
      )
    : undefined;

  console.error(`Structure: ${structure}`);
  console.error(
    `Backends: ${config.backends.map((b) => b.name).join(", ")} | Concurrency: ${config.concurrency} | Timeout: ${config.timeoutMs / 1000}s`,
  );
  if (outputPath) {
    console.error(`Output: ${outputPath}`);
  }
  console.error("");

  const controller = new AbortController();
  const releaseSignals = abortOnSignals(controller, {
    onSignal: (signal, first) => {
      process.stderr.write(
        first
          ? `\n${signal} received, stopping running workers...\n`
          : `\n${signal} received, still waiting for workers to exit\n`,
      );
    },
  });

  const report = await runBenchmark(config.backends, structure, {
    timeout: config.timeoutMs,
    concurrency: config.concurrency,
    signal: controller.signal,
    outputPath,
    onInvocation: args.verbose ? echoInvocation : undefined,
    onProgress: (progress) => {
      process.stderr.write(
        `\r[${progress.completed}/${progress.total}] ${progress.result.name}: ${progress.result.status} | elapsed: ${progress.elapsed}`,
      );
    },
  }).finally(releaseSignals);

  process.stderr.write("\n\n");

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(renderReport(report));
  }

  if (outputPath) {
    console.error(`\nResults saved to: ${outputPath}`);
  }
}

main().catch((err) => {
  if (err instanceof BenchmarkAbortedError) {
    console.error(`Aborted: ${err.message}`);
    process.exit(130);
  }
  if (err instanceof BenchmarkConfigError) {
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
  console.error("Fatal error:", err);
  process.exit(1);
});
