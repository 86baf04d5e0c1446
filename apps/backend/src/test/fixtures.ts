/**
 * Test helpers: scratch data directories holding scraper-style JSON files.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import type { PriceSnapshot, Product } from "../domain/product";

export const silentLogger = pino({ level: "silent" });

export interface DataDir {
  dir: string;
  productsPath: string;
  snapshotsPath: string;
  /** Write a value as JSON, or a string verbatim. */
  writeProducts: (content: unknown) => void;
  writeSnapshots: (content: unknown) => void;
  cleanup: () => void;
}

export function createDataDir(): DataDir {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pricebook-"));
  const productsPath = path.join(dir, "products.json");
  const snapshotsPath = path.join(dir, "price_snapshots.json");
  const write = (filePath: string, content: unknown) =>
    fs.writeFileSync(filePath, typeof content === "string" ? content : JSON.stringify(content), "utf-8");

  return {
    dir,
    productsPath,
    snapshotsPath,
    writeProducts: (content) => write(productsPath, content),
    writeSnapshots: (content) => write(snapshotsPath, content),
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}

export const product = (overrides: Partial<Product> = {}): Product => ({
  name: "Eggs",
  packaging_format: "12pk",
  image: null,
  product_key: "eggs-12",
  ...overrides,
});

export const snapshot = (overrides: Partial<PriceSnapshot> = {}): PriceSnapshot => ({
  product_key: "eggs-12",
  supermarket_name: null,
  price: "$4.50",
  unit_price: null,
  source_url: null,
  scraped_at: "2024-01-01T00:00:00Z",
  ...overrides,
});
