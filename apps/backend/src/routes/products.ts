/**
 * Products Router
 *
 * Listing, name search and per-store price comparison over the scraped
 * catalog. Handlers only parse query parameters; the join lives in
 * CatalogService.
 */

import type { Express, NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../app/context";
import { InvalidQueryError } from "../middleware/errorHandler";

// Repeated single-valued parameters: the first occurrence wins.
const firstValue = (value: unknown): unknown => (Array.isArray(value) ? value[0] : value);

// Plain decimal digits only: Number() would also accept "1e1", "0x5" and " 3".
const limitParam = (max: number, fallback: number) => {
  const message = `limit must be an integer between 1 and ${max}`;
  return z.preprocess(
    firstValue,
    z
      .string({ invalid_type_error: message })
      .regex(/^\d+$/, message)
      .transform(Number)
      .pipe(z.number().int(message).min(1, message).max(max, message))
      .default(String(fallback)),
  );
};

const listQuerySchema = z.object({
  limit: limitParam(500, 50),
});

const searchQuerySchema = z.object({
  q: z.preprocess(firstValue, z.string().default("")),
  limit: limitParam(50, 8),
});

const compareQuerySchema = z.object({
  key: z.preprocess(
    (value) => (Array.isArray(value) ? value : value === undefined ? [] : [value]),
    z.array(z.unknown()).transform((values) => values.filter((v): v is string => typeof v === "string")),
  ),
});

function parseQuery<T extends z.ZodTypeAny>(schema: T, query: Request["query"]): z.output<T> {
  const result = schema.safeParse(query);
  if (!result.success) {
    throw new InvalidQueryError(result.error.issues[0]?.message ?? "Invalid query parameters");
  }
  return result.data;
}

export function registerProductRoutes(app: Express, ctx: AppContext): void {
  const { catalog } = ctx;

  /**
   * GET /products?limit=50
   * Catalog order, latest price per product.
   */
  app.get("/products", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = parseQuery(listQuerySchema, req.query);
      res.json(await catalog.listProducts(limit));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /products/search?q=milk&limit=8
   * Prefix matches first, then shorter names.
   */
  app.get("/products/search", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { q, limit } = parseQuery(searchQuerySchema, req.query);
      res.json(await catalog.searchProducts(q, limit));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /products/compare?key=a&key=b
   * Latest price per store for each requested product key.
   */
  app.get("/products/compare", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { key } = parseQuery(compareQuerySchema, req.query);
      res.json(await catalog.compareProducts(key));
    } catch (error) {
      next(error);
    }
  });
}
