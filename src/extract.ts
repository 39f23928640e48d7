/**
 * Protocol record extraction.
 *
 * Workers print one JSON object to stdout:
 *   {"mlip": "mace", "energy": -3.5, "time": 0.27}   on success
 *   {"mlip": "mace", "error": "model not found"}    on failure
 *
 * Library banners, warnings and progress output share the same stream, so the
 * record has to be found in free text. The last candidate line wins.
 */

import { z } from "zod";
import { formatIssues } from "./errors.js";

export const MAX_DETAIL_CHARS = 2000;

const SuccessRecordSchema = z.object({
  energy: z.number().finite(),
  time: z.number().finite(),
});

export type ExtractedResult =
  | { status: "Success"; energy: number; workerSeconds: number; mlip?: string }
  | { status: "ComputationFailed"; detail: string; mlip?: string }
  | { status: "MalformedOutput"; detail: string };

/** Bound `text` to `max` chars, keeping the tail. */
export function truncateDetail(text: string, max: number = MAX_DETAIL_CHARS): string {
  if (text.length <= max) {
    return text;
  }
  const dropped = text.length - max;
  return `[... ${dropped} chars truncated]\n${text.slice(text.length - max)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Python's json.dumps writes non-finite floats as bare NaN / Infinity, which
 * JSON.parse rejects. Map them to null so the record is still recognised and
 * then fails numeric validation.
 */
function parseLenient(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Fall through to the non-finite rewrite
  }
  const rewritten = text.replace(/([:\[,]\s*)(?:-?Infinity|NaN)(?=\s*[,}\]])/g, "$1null");
  if (rewritten === text) {
    return undefined;
  }
  try {
    return JSON.parse(rewritten);
  } catch {
    return undefined;
  }
}

/**
 * Parse a protocol record out of a single line. Accepts the whole trimmed line
 * or, failing that, the span from its first `{` to its last `}` (for loggers
 * that prefix the payload).
 */
export function parseRecordLine(line: string): Record<string, unknown> | null {
  const trimmed = line.trim();
  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return null;
  }

  const candidates = start === 0 && end === trimmed.length - 1
    ? [trimmed]
    : [trimmed, trimmed.slice(start, end + 1)];

  for (const candidate of candidates) {
    const parsed = parseLenient(candidate);
    if (isRecord(parsed) && ("energy" in parsed || "error" in parsed)) {
      return parsed;
    }
  }
  return null;
}

export function extractResult(rawOutput: string): ExtractedResult {
  const lines = rawOutput.split(/\r?\n/);

  let record: Record<string, unknown> | null = null;
  let recordLine = "";
  for (let i = lines.length - 1; i >= 0; i--) {
    record = parseRecordLine(lines[i]);
    if (record) {
      recordLine = lines[i].trim();
      break;
    }
  }

  if (!record) {
    return {
      status: "MalformedOutput",
      detail: rawOutput.trim() === ""
        ? "no protocol record found (worker produced no output)"
        : `no protocol record found in output:\n${truncateDetail(rawOutput.trim())}`,
    };
  }

  const mlip = typeof record.mlip === "string" ? record.mlip : undefined;

  if ("error" in record && record.error !== undefined && record.error !== null) {
    const message = typeof record.error === "string" ? record.error : JSON.stringify(record.error);
    return {
      status: "ComputationFailed",
      detail: message,
      ...(mlip !== undefined ? { mlip } : {}),
    };
  }

  const parsed = SuccessRecordSchema.safeParse(record);
  if (!parsed.success) {
    return {
      status: "MalformedOutput",
      detail: `invalid protocol record (${formatIssues(parsed.error, "record")}): ${truncateDetail(recordLine)}`,
    };
  }

  return {
    status: "Success",
    energy: parsed.data.energy,
    workerSeconds: parsed.data.time,
    ...(mlip !== undefined ? { mlip } : {}),
  };
}
