/**
 * Product identity.
 *
 * Catalog entries may omit `product_key`; the scraper then keys snapshots by
 * the derived `name__packaging` form, so both sides must derive it the same way.
 * Every key used for grouping or lookup goes through normalizeKey.
 */

export function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

export function deriveProductKey(name: string, packagingFormat: string | null): string {
  return `${name.trim()}__${(packagingFormat ?? "").trim()}`.toLowerCase();
}

/** Explicit keys are returned verbatim (case preserved for display). */
export function resolveProductKey(
  productKey: string | null,
  name: string,
  packagingFormat: string | null,
): string {
  return productKey ? productKey : deriveProductKey(name, packagingFormat);
}
