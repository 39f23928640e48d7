import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  compareReports,
  loadReport,
  renderComparison,
  renderReport,
  summarizeDetail,
} from "../src/report.js";
import { BenchmarkConfigError } from "../src/errors.js";
import type { BackendResult, BenchmarkReport } from "../src/drivers/types.js";

function makeReport(results: BackendResult[], summary: Partial<BenchmarkReport["summary"]> = {}): BenchmarkReport {
  return {
    inputPath: "structures/POSCAR",
    generatedAt: "2026-01-02T03:04:05.000Z",
    config: { timeoutSeconds: 600, concurrency: 1 },
    results,
    summary: {
      succeeded: results.filter((r) => r.status === "Success").length,
      failed: results.filter((r) => r.status !== "Success").length,
      meanElapsedSeconds: 0,
      medianElapsedSeconds: 0,
      ...summary,
    },
  };
}

const RESULTS: BackendResult[] = [
  { name: "mace", modelId: "medium", status: "Success", energy: -3.5, elapsedSeconds: 1.25 },
  { name: "sevenn", status: "ComputationFailed", elapsedSeconds: 0.5, detail: "model not found\nTraceback" },
  {
    name: "uma",
    modelId: "uma-s-1p1",
    status: "LaunchFailed",
    detail: "failed to start /x: spawn /x ENOENT",
  },
];

describe("renderReport", () => {
  test("renders one aligned row per backend", () => {
    const report = makeReport(RESULTS, { fastest: "mace" });

    expect(renderReport(report).split("\n")).toEqual([
      "Structure: structures/POSCAR",
      "Generated: 2026-01-02T03:04:05.000Z",
      "",
      "BACKEND  MODEL      STATUS             ENERGY     ELAPSED  DETAIL",
      "mace     medium     Success            -3.500000  1.250s",
      "sevenn   -          ComputationFailed  -          0.500s   model not found",
      "uma      uma-s-1p1  LaunchFailed       -          -        failed to start /x: spawn /x ENOENT",
      "",
      "Succeeded: 1/3 | Fastest: mace",
    ]);
  });

  test("is deterministic for the same report", () => {
    const report = makeReport(RESULTS);
    expect(renderReport(report)).toBe(renderReport(makeReport(RESULTS)));
  });

  test("includes the energy spread when available", () => {
    const report = makeReport(
      [
        { name: "mace", status: "Success", energy: -3.5, elapsedSeconds: 2 },
        { name: "sevenn", status: "Success", energy: -3.25, elapsedSeconds: 1 },
      ],
      { fastest: "sevenn", energySpread: 0.25 },
    );

    const lines = renderReport(report).split("\n");
    expect(lines[lines.length - 1]).toBe("Succeeded: 2/2 | Fastest: sevenn | Energy spread: 0.250000");
  });
});

describe("summarizeDetail", () => {
  test("keeps only the first line", () => {
    expect(summarizeDetail("first\nsecond")).toBe("first");
  });

  test("shortens long lines", () => {
    expect(summarizeDetail("abcdefghij", 8)).toBe("abcde...");
  });

  test("returns an empty string for missing detail", () => {
    expect(summarizeDetail(undefined)).toBe("");
  });
});

describe("compareReports", () => {
  const a = makeReport([
    { name: "mace", status: "Success", energy: -3.5, elapsedSeconds: 1 },
    { name: "sevenn", status: "Success", energy: -3.25, elapsedSeconds: 2 },
  ]);
  const b = makeReport([
    { name: "mace", status: "Success", energy: -3.5, elapsedSeconds: 2 },
    { name: "sevenn", status: "Timeout", detail: "timed out after 1s" },
    { name: "uma", status: "LaunchFailed", detail: "failed to start" },
  ]);

  test("matches backends by name and flags differences", () => {
    expect(compareReports(a, b)).toEqual([
      { name: "mace", statusA: "Success", statusB: "Success", energyA: -3.5, energyB: -3.5, elapsedRatio: 2, consistent: true },
      { name: "sevenn", statusA: "Success", statusB: "Timeout", energyA: -3.25, consistent: false },
      { name: "uma", statusB: "LaunchFailed", consistent: false },
    ]);
  });

  test("renders the comparison table", () => {
    expect(renderComparison(compareReports(a, b)).split("\n")).toEqual([
      "BACKEND  STATUS A  STATUS B      ENERGY A   ENERGY B   TIME B/A  MATCH",
      "mace     Success   Success       -3.500000  -3.500000  2.00x     yes",
      "sevenn   Success   Timeout       -3.250000  -          -         no",
      "uma      -         LaunchFailed  -          -          -         no",
      "",
      "Consistent: 1/3",
    ]);
  });
});

describe("loadReport", () => {
  let tmp: string;

  beforeEach(() => {
    tmp = mkdtempSync(join(tmpdir(), "mlip-bench-report-"));
  });

  afterEach(() => {
    rmSync(tmp, { recursive: true, force: true });
  });

  test("round-trips a saved report", () => {
    const report = makeReport(RESULTS, { fastest: "mace" });
    const path = join(tmp, "report.json");
    writeFileSync(path, JSON.stringify(report, null, 2));

    expect(loadReport(path)).toEqual(report);
  });

  test("rejects files that are not JSON", () => {
    const path = join(tmp, "broken.json");
    writeFileSync(path, "not json");

    expect(() => loadReport(path)).toThrow(BenchmarkConfigError);
    expect(() => loadReport(path)).toThrow(`failed to read report ${path}`);
  });

  test("rejects reports with an unknown status", () => {
    const path = join(tmp, "bad-status.json");
    const report = makeReport([{ name: "mace", status: "Success", energy: -1 }]);
    writeFileSync(
      path,
      JSON.stringify({ ...report, results: [{ name: "mace", status: "Exploded" }] }),
    );

    expect(() => loadReport(path)).toThrow(/^invalid report .*: results\.0\.status: /);
  });
});
