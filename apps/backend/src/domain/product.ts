/**
 * Product + price snapshot records as written by the scraper, and the
 * denormalized views served by the API.
 */

import { z } from "zod";

/** Finite numbers become their decimal string form; everything else passes through. */
const coerceText = (value: unknown): unknown =>
  typeof value === "number" && Number.isFinite(value) ? String(value) : value;

const requiredText = z.preprocess(coerceText, z.string());

/** Optional fields collapse "", null, missing and unusable values to null. */
const optionalText = z.preprocess((value) => {
  const coerced = coerceText(value);
  return typeof coerced === "string" && coerced !== "" ? coerced : null;
}, z.string().nullable());

export const ProductSchema = z.object({
  name: requiredText,
  packaging_format: optionalText,
  image: optionalText,
  product_key: optionalText,
});
export type Product = z.infer<typeof ProductSchema>;

export const PriceSnapshotSchema = z.object({
  product_key: requiredText.pipe(z.string().min(1)),
  supermarket_name: optionalText,
  price: requiredText,
  unit_price: optionalText,
  source_url: optionalText,
  scraped_at: requiredText,
});
export type PriceSnapshot = z.infer<typeof PriceSnapshotSchema>;

export interface ProductView {
  product_key: string;
  name: string;
  packaging_format: string | null;
  image: string | null;
  price: string | null;
  unit_price: string | null;
  source_url: string | null;
  scraped_at: string | null;
}

export interface StorePrice {
  price: string;
  unit_price: string | null;
  source_url: string | null;
  scraped_at: string;
}

export interface ProductCompareView {
  product_key: string;
  name: string;
  packaging_format: string | null;
  image: string | null;
  prices: Record<string, StorePrice>;
}
