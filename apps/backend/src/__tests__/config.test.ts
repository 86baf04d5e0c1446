import { describe, it, expect } from "vitest";
import path from "node:path";
import { parseRuntimeConfig, resolveDataPaths } from "../config";

describe("config", () => {
  describe("resolveDataPaths", () => {
    const repoRoot = path.resolve("/srv/pricebook");

    it("defaults to the scraper checkout next to the repository", () => {
      expect(resolveDataPaths({}, repoRoot)).toEqual({
        productsPath: path.resolve("/srv/grocery-scraper/products.json"),
        snapshotsPath: path.resolve("/srv/grocery-scraper/price_snapshots.json"),
      });
    });

    it("places the snapshot log beside an overridden catalog", () => {
      expect(resolveDataPaths({ PRODUCTS_JSON_PATH: "/data/catalog.json" }, repoRoot)).toEqual({
        productsPath: path.resolve("/data/catalog.json"),
        snapshotsPath: path.resolve("/data/price_snapshots.json"),
      });
    });

    it("honours both overrides", () => {
      expect(
        resolveDataPaths(
          { PRODUCTS_JSON_PATH: "/data/catalog.json", PRICE_SNAPSHOTS_JSON_PATH: "/logs/prices.json" },
          repoRoot,
        ),
      ).toEqual({
        productsPath: path.resolve("/data/catalog.json"),
        snapshotsPath: path.resolve("/logs/prices.json"),
      });
    });
  });

  describe("parseRuntimeConfig", () => {
    it("applies defaults", () => {
      const config = parseRuntimeConfig({});
      expect(config).toMatchObject({
        port: 8000,
        host: "0.0.0.0",
        logLevel: "info",
        corsAllowOrigin: "*",
        gracefulShutdownMs: 10000,
      });
    });

    it("treats blank path variables as unset", () => {
      const config = parseRuntimeConfig({ PRODUCTS_JSON_PATH: "   ", PORT: "9100" });
      expect(config.port).toBe(9100);
      expect(path.basename(config.dataPaths.productsPath)).toBe("products.json");
      expect(path.basename(path.dirname(config.dataPaths.productsPath))).toBe("grocery-scraper");
    });

    it("rejects an unknown log level", () => {
      expect(() => parseRuntimeConfig({ LOG_LEVEL: "loud" })).toThrow();
    });
  });
});
