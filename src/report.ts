/**
 * Text rendering of benchmark reports, plus loading and comparing saved ones.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { BackendResult, BackendStatus, BenchmarkReport } from "./drivers/types.js";
import { BenchmarkConfigError, formatIssues } from "./errors.js";

const DETAIL_WIDTH = 60;

const BackendResultSchema = z.object({
  name: z.string(),
  status: z.enum(["Success", "ComputationFailed", "LaunchFailed", "Timeout", "MalformedOutput"]),
  modelId: z.string().optional(),
  energy: z.number().optional(),
  elapsedSeconds: z.number().optional(),
  workerSeconds: z.number().optional(),
  exitCode: z.number().int().optional(),
  detail: z.string().optional(),
});

const BenchmarkReportSchema = z.object({
  inputPath: z.string(),
  generatedAt: z.string(),
  config: z.object({
    timeoutSeconds: z.number(),
    concurrency: z.number().int(),
  }),
  results: z.array(BackendResultSchema),
  summary: z.object({
    succeeded: z.number().int(),
    failed: z.number().int(),
    fastest: z.string().optional(),
    meanElapsedSeconds: z.number(),
    medianElapsedSeconds: z.number(),
    energySpread: z.number().optional(),
  }),
});

export function loadReport(path: string): BenchmarkReport {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new BenchmarkConfigError(
      `failed to read report ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = BenchmarkReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BenchmarkConfigError(`invalid report ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function formatTable(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row.map((cell, i) => cell.padEnd(widths[i])).join("  ").trimEnd(),
  );
}

function formatEnergy(energy: number | undefined): string {
  return energy === undefined ? "-" : energy.toFixed(6);
}

function formatSeconds(seconds: number | undefined): string {
  return seconds === undefined ? "-" : `${seconds.toFixed(3)}s`;
}

export function summarizeDetail(detail: string | undefined, width: number = DETAIL_WIDTH): string {
  if (!detail) return "";
  const firstLine = detail.trim().split(/\r?\n/)[0] ?? "";
  return firstLine.length > width ? `${firstLine.slice(0, width - 3)}...` : firstLine;
}

function resultRow(result: BackendResult): string[] {
  return [
    result.name,
    result.modelId ?? "-",
    result.status,
    formatEnergy(result.energy),
    formatSeconds(result.elapsedSeconds),
    summarizeDetail(result.detail),
  ];
}

/**
 * Deterministic text summary: the same report always renders to the same
 * string.
 */
export function renderReport(report: BenchmarkReport): string {
  const { summary } = report;
  const table = formatTable([
    ["BACKEND", "MODEL", "STATUS", "ENERGY", "ELAPSED", "DETAIL"],
    ...report.results.map(resultRow),
  ]);

  let footer = `Succeeded: ${summary.succeeded}/${report.results.length}`;
  if (summary.fastest !== undefined) {
    footer += ` | Fastest: ${summary.fastest}`;
  }
  if (summary.energySpread !== undefined) {
    footer += ` | Energy spread: ${summary.energySpread.toFixed(6)}`;
  }

  return [
    `Structure: ${report.inputPath}`,
    `Generated: ${report.generatedAt}`,
    "",
    ...table,
    "",
    footer,
  ].join("\n");
}

export interface ComparisonRow {
  name: string;
  statusA?: BackendStatus;
  statusB?: BackendStatus;
  energyA?: number;
  energyB?: number;
  elapsedRatio?: number; // B / A
  consistent: boolean;
}

/**
 * Compare two runs backend by backend. Two runs are consistent for a backend
 * when both report the same status and the same energy; timing is expected to
 * differ and is only reported as a ratio.
 */
export function compareReports(a: BenchmarkReport, b: BenchmarkReport): ComparisonRow[] {
  const byNameA = new Map<string, BackendResult>();
  const byNameB = new Map<string, BackendResult>();
  for (const r of a.results) byNameA.set(r.name, r);
  for (const r of b.results) byNameB.set(r.name, r);

  const names = [
    ...a.results.map((r) => r.name),
    ...b.results.map((r) => r.name).filter((name) => !byNameA.has(name)),
  ];

  return names.map((name) => {
    const ra = byNameA.get(name);
    const rb = byNameB.get(name);
    const row: ComparisonRow = {
      name,
      consistent:
        ra !== undefined &&
        rb !== undefined &&
        ra.status === rb.status &&
        ra.energy === rb.energy,
    };
    if (ra) {
      row.statusA = ra.status;
      if (ra.energy !== undefined) row.energyA = ra.energy;
    }
    if (rb) {
      row.statusB = rb.status;
      if (rb.energy !== undefined) row.energyB = rb.energy;
    }
    const elapsedA = ra?.elapsedSeconds;
    const elapsedB = rb?.elapsedSeconds;
    if (elapsedA && elapsedB !== undefined) {
      row.elapsedRatio = elapsedB / elapsedA;
    }
    return row;
  });
}

export function renderComparison(rows: ComparisonRow[]): string {
  const table = formatTable([
    ["BACKEND", "STATUS A", "STATUS B", "ENERGY A", "ENERGY B", "TIME B/A", "MATCH"],
    ...rows.map((row) => [
      row.name,
      row.statusA ?? "-",
      row.statusB ?? "-",
      formatEnergy(row.energyA),
      formatEnergy(row.energyB),
      row.elapsedRatio === undefined ? "-" : `${row.elapsedRatio.toFixed(2)}x`,
      row.consistent ? "yes" : "no",
    ]),
  ]);
  const consistent = rows.filter((row) => row.consistent).length;
  return [...table, "", `Consistent: ${consistent}/${rows.length}`].join("\n");
}
