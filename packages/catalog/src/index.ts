// ---------- Catalog (stable public API) ----------
export {
  createPriceTable,
  loadPriceTable,
  price,
  listSkus,
  listCategories,
  DEFAULT_CATALOG_PATH,
} from "./price-table.js";

export { parsePriceCatalog, PriceCatalogSchema } from "./validate.js";
export type { ParsedPriceCatalog } from "./validate.js";

export { checkCatalogInvariants, REQUIRED_SKUS } from "./invariants.js";
export type { CatalogViolation, CatalogViolationCode } from "./invariants.js";

export { UnknownSkuError } from "./errors.js";

export type * from "./schema.js";
