import type { Logger } from "pino";
import { PriceSnapshotSchema, type PriceSnapshot } from "../../domain/product";
import { parseRecords, readJsonArray } from "./jsonArrayFile";

/**
 * Load the price-snapshot log. Price data is supplementary, so any
 * file-level failure degrades to an empty log instead of failing the request.
 */
export async function loadSnapshots(filePath: string, logger: Logger): Promise<PriceSnapshot[]> {
  const read = await readJsonArray(filePath);
  if (!read.ok) {
    // A missing log is the normal state before the first scrape.
    const level = read.reason === "missing" ? "debug" : "warn";
    logger[level]({ path: filePath, reason: read.reason }, `Price snapshots file ${read.detail}; serving without prices`);
    return [];
  }
  return parseRecords(read.items, PriceSnapshotSchema, logger);
}
