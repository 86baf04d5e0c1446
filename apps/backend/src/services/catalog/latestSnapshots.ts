import type { PriceSnapshot } from "../../domain/product";
import { normalizeKey } from "./productKey";

// scraped_at is ISO-8601, so string order is time order as long as the scraper
// keeps one precision and zone format. Equal timestamps: the later entry wins.
const isNewer = (incoming: PriceSnapshot, current: PriceSnapshot | undefined): boolean =>
  current === undefined || incoming.scraped_at >= current.scraped_at;

/** Latest snapshot per normalized product key. */
export function latestByProduct(snapshots: readonly PriceSnapshot[]): Map<string, PriceSnapshot> {
  const latest = new Map<string, PriceSnapshot>();
  for (const snapshot of snapshots) {
    const key = normalizeKey(snapshot.product_key);
    if (!key) continue;
    if (isNewer(snapshot, latest.get(key))) {
      latest.set(key, snapshot);
    }
  }
  return latest;
}

/**
 * Latest snapshot per (normalized product key, store). Snapshots without a
 * store name cannot take part in a comparison and are dropped.
 * Stores keep the order in which they were first seen for each product.
 */
export function latestByProductAndStore(
  snapshots: readonly PriceSnapshot[],
): Map<string, Map<string, PriceSnapshot>> {
  const latest = new Map<string, Map<string, PriceSnapshot>>();
  for (const snapshot of snapshots) {
    const key = normalizeKey(snapshot.product_key);
    const store = (snapshot.supermarket_name ?? "").trim();
    if (!key || !store) continue;

    let byStore = latest.get(key);
    if (!byStore) {
      byStore = new Map();
      latest.set(key, byStore);
    }
    if (isNewer(snapshot, byStore.get(store))) {
      byStore.set(store, snapshot);
    }
  }
  return latest;
}
