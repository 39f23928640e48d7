#!/usr/bin/env node
/**
 * Post-hoc view of saved benchmark reports.
 *
 * Usage:
 *   npx tsx src/analyze.ts                          # render most recent report
 *   npx tsx src/analyze.ts results/a.json           # render a specific report
 *   npx tsx src/analyze.ts results/a.json results/b.json
 *                                                   # per-backend consistency of two runs
 */

import { existsSync, readdirSync } from "node:fs";
import { join, resolve } from "node:path";
import { compareReports, loadReport, renderComparison, renderReport } from "./report.js";
import { BenchmarkConfigError } from "./errors.js";
import { summarizeTimings } from "./stats.js";

function findLatestReport(): string | null {
  const resultsDir = resolve(process.cwd(), "results");
  if (!existsSync(resultsDir)) {
    return null;
  }

  const files = readdirSync(resultsDir)
    .filter((f) => f.startsWith("benchmark_") && f.endsWith(".json"))
    .sort();

  if (files.length === 0) {
    return null;
  }

  return join(resultsDir, files[files.length - 1]);
}

function main(): void {
  const paths = process.argv.slice(2).map((p) => resolve(process.cwd(), p));

  if (paths.length === 0) {
    const latest = findLatestReport();
    if (!latest) {
      console.error("No report files found. Run a benchmark first, or specify a path.");
      console.error("Usage: npx tsx src/analyze.ts [report.json] [other-report.json]");
      process.exit(1);
    }
    console.error(`Analyzing most recent report: ${latest}`);
    paths.push(latest);
  }

  for (const path of paths) {
    if (!existsSync(path)) {
      console.error(`File not found: ${path}`);
      process.exit(1);
    }
  }

  if (paths.length === 1) {
    const report = loadReport(paths[0]);
    console.log(renderReport(report));
    return;
  }

  if (paths.length > 2) {
    console.error("Expected at most two report files");
    process.exit(1);
  }

  const a = loadReport(paths[0]);
  const b = loadReport(paths[1]);
  if (a.inputPath !== b.inputPath) {
    console.error(`Warning: reports benchmark different structures (${a.inputPath} vs ${b.inputPath})`);
  }

  const rows = compareReports(a, b);
  const ratios = rows
    .map((row) => row.elapsedRatio)
    .filter((r): r is number => r !== undefined);

  console.log(`A: ${paths[0]} (${a.generatedAt})`);
  console.log(`B: ${paths[1]} (${b.generatedAt})`);
  console.log("");
  console.log(renderComparison(rows));
  if (ratios.length > 0) {
    const ratio = summarizeTimings(ratios);
    console.log(`Elapsed ratio B/A: mean ${ratio.mean.toFixed(2)}x | median ${ratio.median.toFixed(2)}x`);
  }
}

try {
  main();
} catch (err) {
  if (err instanceof BenchmarkConfigError) {
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
  throw err;
}
