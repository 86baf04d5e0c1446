import fs from "node:fs/promises";
import type { Logger } from "pino";
import type { z } from "zod";

export type DataUnavailableReason = "missing" | "unreadable" | "invalid_json" | "not_array";

export type JsonArrayRead =
  | { ok: true; items: unknown[] }
  | { ok: false; reason: DataUnavailableReason; detail: string };

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

const errorCode = (err: unknown): unknown => (err instanceof Error && "code" in err ? err.code : undefined);

/**
 * Read a file expected to hold a top-level JSON array.
 * File-level failures are returned, not thrown; callers pick the policy.
 */
export async function readJsonArray(filePath: string): Promise<JsonArrayRead> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return { ok: false, reason: "missing", detail: `not found at ${filePath}` };
    }
    return { ok: false, reason: "unreadable", detail: `could not be read at ${filePath}: ${errorMessage(err)}` };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: "invalid_json", detail: `at ${filePath} is not valid JSON: ${errorMessage(err)}` };
  }

  if (!Array.isArray(raw)) {
    return { ok: false, reason: "not_array", detail: `at ${filePath} must be a JSON array` };
  }

  return { ok: true, items: raw };
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parse every element against `schema`, keeping source order and dropping
 * elements that are not objects or fail to parse.
 */
export function parseRecords<T extends z.ZodTypeAny>(
  items: unknown[],
  schema: T,
  logger: Logger,
): Array<z.output<T>> {
  const records: Array<z.output<T>> = [];
  items.forEach((item, index) => {
    if (!isPlainObject(item)) {
      logger.debug({ index }, "Skipped non-object record");
      return;
    }
    const result = schema.safeParse(item);
    if (!result.success) {
      logger.debug({ index, issues: result.error.issues.map((i) => i.path.join(".")) }, "Skipped malformed record");
      return;
    }
    records.push(result.data);
  });
  return records;
}
