import type {
  PriceSnapshot,
  Product,
  ProductCompareView,
  ProductView,
  StorePrice,
} from "../../domain/product";
import { latestByProduct, latestByProductAndStore } from "./latestSnapshots";
import { normalizeKey, resolveProductKey } from "./productKey";

const keyOf = (product: Product): string =>
  resolveProductKey(product.product_key, product.name, product.packaging_format);

/**
 * One view per catalog product, in catalog order, carrying the price fields of
 * its latest snapshot (all null when it has none).
 */
export function buildProductViews(
  products: readonly Product[],
  snapshots: readonly PriceSnapshot[],
): ProductView[] {
  const latest = latestByProduct(snapshots);

  return products.map((product) => {
    const key = keyOf(product);
    const snapshot = latest.get(normalizeKey(key));
    return {
      product_key: key,
      name: product.name,
      packaging_format: product.packaging_format,
      image: product.image,
      // An empty scraped price means "no price".
      price: snapshot?.price || null,
      unit_price: snapshot?.unit_price ?? null,
      source_url: snapshot?.source_url ?? null,
      scraped_at: snapshot?.scraped_at ?? null,
    };
  });
}

/** Trim + lowercase, drop empties, keep the first occurrence of each key. */
export function normalizeCompareKeys(keys: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of keys) {
    const key = normalizeKey(raw);
    if (key) seen.add(key);
  }
  return [...seen];
}

const toStorePrice = (snapshot: PriceSnapshot): StorePrice => ({
  price: snapshot.price,
  unit_price: snapshot.unit_price,
  source_url: snapshot.source_url,
  scraped_at: snapshot.scraped_at,
});

/**
 * Per-store latest prices for each requested key. A key with no catalog
 * product still yields an entry named after the key.
 */
export function buildCompareViews(
  products: readonly Product[],
  snapshots: readonly PriceSnapshot[],
  requestedKeys: readonly string[],
): ProductCompareView[] {
  const keys = normalizeCompareKeys(requestedKeys);
  if (keys.length === 0) return [];

  const byKey = new Map<string, Product>();
  for (const product of products) {
    const key = normalizeKey(keyOf(product));
    if (!byKey.has(key)) byKey.set(key, product);
  }
  const latest = latestByProductAndStore(snapshots);

  return keys.map((key) => {
    const product = byKey.get(key);
    // Own properties only: a store named "__proto__" must stay a key.
    const prices: Record<string, StorePrice> = Object.fromEntries(
      [...(latest.get(key) ?? [])].map(([store, snapshot]): [string, StorePrice] => [store, toStorePrice(snapshot)]),
    );
    return {
      product_key: key,
      name: product?.name ?? key,
      packaging_format: product?.packaging_format ?? null,
      image: product?.image ?? null,
      prices,
    };
  });
}
