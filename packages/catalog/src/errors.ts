import type { PriceCategory } from "./schema.js";

export class UnknownSkuError extends Error {
  readonly code = "UNKNOWN_SKU";

  constructor(
    readonly category: PriceCategory,
    readonly sku: string
  ) {
    super(`Unknown SKU '${sku}' in price category '${category}'`);
    this.name = "UnknownSkuError";
  }
}
