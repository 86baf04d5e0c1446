import { config as loadEnv } from "dotenv";
import { z } from "zod";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { CatalogDataPaths } from "./services/catalog/catalogService";

// Empty strings count as unset, same as a missing variable.
const optionalString = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}, z.string().optional());

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load .env from apps/backend directory, regardless of process.cwd()
const envPath = path.resolve(__dirname, "../.env");
if (fs.existsSync(envPath)) {
  const envResult = loadEnv({ path: envPath });
  if (envResult.error) {
    console.warn(`[config] Failed to load .env from ${envPath}:`, envResult.error.message);
  }
}

/** Repository root: apps/backend/src -> ../../.. */
export const REPO_ROOT = path.resolve(__dirname, "../../..");

/** The scraper checks out next to this repository and writes its JSON here. */
export const DEFAULT_SCRAPER_DIR_NAME = "grocery-scraper";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  PRODUCTS_JSON_PATH: optionalString,
  PRICE_SNAPSHOTS_JSON_PATH: optionalString,
  CORS_ALLOW_ORIGIN: z.string().default("*"),
  GRACEFUL_SHUTDOWN_MS: z.coerce.number().default(10000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function resolveDataPaths(
  env: Pick<EnvConfig, "PRODUCTS_JSON_PATH" | "PRICE_SNAPSHOTS_JSON_PATH">,
  repoRoot: string = REPO_ROOT,
): CatalogDataPaths {
  const productsPath = env.PRODUCTS_JSON_PATH
    ? path.resolve(env.PRODUCTS_JSON_PATH)
    : path.resolve(repoRoot, "..", DEFAULT_SCRAPER_DIR_NAME, "products.json");

  const snapshotsPath = env.PRICE_SNAPSHOTS_JSON_PATH
    ? path.resolve(env.PRICE_SNAPSHOTS_JSON_PATH)
    : path.join(path.dirname(productsPath), "price_snapshots.json");

  return { productsPath, snapshotsPath };
}

export function parseRuntimeConfig(env: NodeJS.ProcessEnv) {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    dataPaths: resolveDataPaths(parsed),
    corsAllowOrigin: parsed.CORS_ALLOW_ORIGIN,
    gracefulShutdownMs: parsed.GRACEFUL_SHUTDOWN_MS,
  };
}

export type RuntimeConfig = ReturnType<typeof parseRuntimeConfig>;

export const runtimeConfig: RuntimeConfig = parseRuntimeConfig(process.env);
