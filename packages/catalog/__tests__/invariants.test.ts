import { describe, it, expect } from "vitest";
import { checkCatalogInvariants } from "../src/invariants.js";
import { parsePriceCatalog } from "../src/validate.js";
import { bundledCatalogDocument } from "./_helpers/catalog.js";

describe("checkCatalogInvariants", () => {
  it("reports nothing for the bundled catalog", () => {
    expect(checkCatalogInvariants(parsePriceCatalog(bundledCatalogDocument()))).toEqual([]);
  });

  it("reports a missing required SKU with its path", () => {
    const doc = bundledCatalogDocument();
    delete doc.categories.database["db-n1-standard-4"];

    expect(checkCatalogInvariants(parsePriceCatalog(doc))).toEqual([
      {
        code: "MISSING_SKU",
        message: "Catalog 'gcp-us-central1' has no price for database/db-n1-standard-4",
        path: "/categories/database/db-n1-standard-4",
      },
    ]);
  });

  it("does not require optional SKUs", () => {
    const doc = bundledCatalogDocument();
    delete doc.categories.operations.logging;
    delete doc.categories.storage.persistent_standard;

    expect(checkCatalogInvariants(parsePriceCatalog(doc))).toEqual([]);
  });

  it("flags a zero usage-scaled price", () => {
    const doc = bundledCatalogDocument();
    doc.categories.network.egress_internet = 0;

    const v = checkCatalogInvariants(parsePriceCatalog(doc));
    expect(v.map((x) => `${x.code} ${x.path}`)).toEqual([
      "ZERO_PRICE /categories/network/egress_internet",
    ]);
  });

  it("does not flag a zero flat fee", () => {
    const doc = bundledCatalogDocument();
    doc.categories.network.load_balancer = 0;

    expect(checkCatalogInvariants(parsePriceCatalog(doc))).toEqual([]);
  });
});
