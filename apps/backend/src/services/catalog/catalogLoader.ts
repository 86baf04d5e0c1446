import type { Logger } from "pino";
import { ProductSchema, type Product } from "../../domain/product";
import { parseRecords, readJsonArray, type DataUnavailableReason } from "./jsonArrayFile";

export class CatalogUnavailableError extends Error {
  constructor(
    readonly path: string,
    readonly reason: DataUnavailableReason,
    detail: string,
  ) {
    super(`Products file ${detail}.`);
    this.name = "CatalogUnavailableError";
  }
}

/**
 * Load the product catalog in source order.
 * Bad records are skipped; a missing or structurally invalid file throws.
 */
export async function loadCatalog(filePath: string, logger: Logger): Promise<Product[]> {
  const read = await readJsonArray(filePath);
  if (!read.ok) {
    throw new CatalogUnavailableError(filePath, read.reason, read.detail);
  }

  const products = parseRecords(read.items, ProductSchema, logger);
  if (products.length < read.items.length) {
    logger.debug(
      { path: filePath, skipped: read.items.length - products.length },
      "Skipped malformed catalog records",
    );
  }
  return products;
}
