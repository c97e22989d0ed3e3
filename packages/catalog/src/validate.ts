import { z } from "zod";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const CurrencyCode = z.string().min(3).max(3);

const UnitPrice = z
  .number()
  .refine(Number.isFinite, "Must be a finite number")
  .refine((v) => v >= 0, "Price must not be negative");

// Zod v4 record requires (keyType, valueType)
const SkuPrices = z.record(z.string().min(1), UnitPrice);

/* ------------------------------------------------------------------ */
/*                               Catalog                              */
/* ------------------------------------------------------------------ */

export const PriceCatalogSchema = z.object({
  catalog_id: z.string().min(1),
  currency: CurrencyCode,
  region: z.string().optional(),

  categories: z.object({
    compute: SkuPrices,
    database: SkuPrices,
    serverless: SkuPrices,
    storage: SkuPrices,
    network: SkuPrices,
    operations: SkuPrices,
    support: SkuPrices,
  }),
});

export type ParsedPriceCatalog = z.infer<typeof PriceCatalogSchema>;

export function parsePriceCatalog(input: unknown): ParsedPriceCatalog {
  return PriceCatalogSchema.parse(input);
}
