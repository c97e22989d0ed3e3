import type { PriceCategory } from "./schema.js";
import type { ParsedPriceCatalog } from "./validate.js";

export type CatalogViolationCode = "MISSING_SKU" | "ZERO_PRICE";

export type CatalogViolation = {
  code: CatalogViolationCode;
  message: string;
  path: string; // JSON pointer-like path for debugging
};

// SKUs the estimation engine and the fixed scenarios look up.
export const REQUIRED_SKUS: ReadonlyArray<readonly [PriceCategory, string]> = [
  ["compute", "e2-small"],
  ["compute", "e2-medium"],
  ["compute", "e2-standard-2"],
  ["compute", "e2-standard-4"],
  ["database", "db-f1-micro"],
  ["database", "db-n1-standard-1"],
  ["database", "db-n1-standard-2"],
  ["database", "db-n1-standard-4"],
  ["serverless", "cpu_time"],
  ["serverless", "memory_time"],
  ["serverless", "requests"],
  ["serverless", "min_instance"],
  ["storage", "persistent_ssd"],
  ["storage", "sql_ssd"],
  ["network", "load_balancer"],
  ["network", "egress_internet"],
  ["operations", "monitoring_basic"],
  ["operations", "monitoring_premium"],
  ["support", "security_tooling"],
  ["support", "premium_support"],
];

// A zero here silently zeroes a usage-scaled cost line.
const USAGE_SCALED_SKUS: ReadonlyArray<readonly [PriceCategory, string]> = [
  ["serverless", "cpu_time"],
  ["serverless", "memory_time"],
  ["serverless", "requests"],
  ["storage", "persistent_ssd"],
  ["storage", "sql_ssd"],
  ["network", "egress_internet"],
];

export function checkCatalogInvariants(c: ParsedPriceCatalog): CatalogViolation[] {
  const v: CatalogViolation[] = [];

  // ---- Required SKUs must resolve
  for (const [category, sku] of REQUIRED_SKUS) {
    if (!Object.hasOwn(c.categories[category], sku)) {
      v.push({
        code: "MISSING_SKU",
        message: `Catalog '${c.catalog_id}' has no price for ${category}/${sku}`,
        path: `/categories/${category}/${sku}`,
      });
    }
  }

  // ---- Usage-scaled prices should be non-zero
  for (const [category, sku] of USAGE_SCALED_SKUS) {
    if (c.categories[category][sku] === 0) {
      v.push({
        code: "ZERO_PRICE",
        message: `Usage-scaled price ${category}/${sku} is 0`,
        path: `/categories/${category}/${sku}`,
      });
    }
  }

  return v;
}
