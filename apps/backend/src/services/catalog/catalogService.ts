import type { Logger } from "pino";
import type { PriceSnapshot, Product, ProductCompareView, ProductView } from "../../domain/product";
import { loadCatalog } from "./catalogLoader";
import { loadSnapshots } from "./snapshotLoader";
import { searchProducts } from "./productSearch";
import { buildCompareViews, buildProductViews, normalizeCompareKeys } from "./viewAssembler";

export interface CatalogDataPaths {
  productsPath: string;
  snapshotsPath: string;
}

/**
 * Read-side facade over the scraper's output files.
 *
 * Every call re-reads both files; nothing is cached between requests, so a
 * fresh scrape is visible on the next call.
 */
export class CatalogService {
  private readonly log: Logger;

  constructor(
    private readonly paths: CatalogDataPaths,
    logger: Logger,
  ) {
    this.log = logger.child({ module: "catalog" });
  }

  async listProducts(limit: number): Promise<ProductView[]> {
    const views = await this.loadViews();
    return views.slice(0, limit);
  }

  async searchProducts(query: string, limit: number): Promise<ProductView[]> {
    return searchProducts(await this.loadViews(), query, limit);
  }

  async compareProducts(keys: readonly string[]): Promise<ProductCompareView[]> {
    if (normalizeCompareKeys(keys).length === 0) {
      return [];
    }
    const { products, snapshots } = await this.loadAll();
    return buildCompareViews(products, snapshots, keys);
  }

  private async loadViews(): Promise<ProductView[]> {
    const { products, snapshots } = await this.loadAll();
    return buildProductViews(products, snapshots);
  }

  private async loadAll(): Promise<{ products: Product[]; snapshots: PriceSnapshot[] }> {
    const [products, snapshots] = await Promise.all([
      loadCatalog(this.paths.productsPath, this.log),
      loadSnapshots(this.paths.snapshotsPath, this.log),
    ]);
    this.log.debug({ products: products.length, snapshots: snapshots.length }, "Loaded catalog data");
    return { products, snapshots };
  }
}
