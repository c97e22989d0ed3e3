import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { UnknownSkuError } from "./errors.js";
import type { PriceCategory, PriceTable } from "./schema.js";
import { parsePriceCatalog, type ParsedPriceCatalog } from "./validate.js";

export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL("../data/us-central1.json", import.meta.url)
);

const CATEGORIES: readonly PriceCategory[] = [
  "compute",
  "database",
  "serverless",
  "storage",
  "network",
  "operations",
  "support",
];

/**
 * Build an immutable price table from a parsed catalog.
 * The parsed input is copied; later edits to it do not reach the table.
 */
export function createPriceTable(c: ParsedPriceCatalog): PriceTable {
  const copy = (category: PriceCategory) => Object.freeze({ ...c.categories[category] });

  return Object.freeze({
    catalog_id: c.catalog_id.trim(),
    currency: c.currency.toUpperCase(),
    region: c.region ?? null,
    categories: Object.freeze({
      compute: copy("compute"),
      database: copy("database"),
      serverless: copy("serverless"),
      storage: copy("storage"),
      network: copy("network"),
      operations: copy("operations"),
      support: copy("support"),
    }),
  });
}

export function loadPriceTable(filePath: string = DEFAULT_CATALOG_PATH): PriceTable {
  const raw = readFileSync(filePath, "utf8");
  return createPriceTable(parsePriceCatalog(JSON.parse(raw)));
}

export function price(table: PriceTable, category: PriceCategory, sku: string): number {
  const prices = table.categories[category];
  if (!Object.hasOwn(prices, sku)) {
    throw new UnknownSkuError(category, sku);
  }
  return prices[sku];
}

export function listSkus(table: PriceTable, category: PriceCategory): string[] {
  return Object.keys(table.categories[category]);
}

export function listCategories(): readonly PriceCategory[] {
  return CATEGORIES;
}
