import { readFileSync } from "node:fs";

import {
  checkCatalogInvariants,
  createPriceTable,
  DEFAULT_CATALOG_PATH,
  parsePriceCatalog,
} from "../packages/catalog/src/index.js";
import { compareScenarios, SCENARIO_NAMES } from "../packages/simulate/src/index.js";
import { renderCostReport } from "../packages/explain/src/index.js";

const raw = JSON.parse(readFileSync(process.argv[2] ?? DEFAULT_CATALOG_PATH, "utf-8"));

const parsed = parsePriceCatalog(raw);
const violations = checkCatalogInvariants(parsed);

if (violations.length) {
  console.error("Catalog violations:");
  for (const v of violations) console.error(`- ${v.code} ${v.path}: ${v.message}`);
  process.exitCode = 1;
} else {
  const table = createPriceTable(parsed);
  const results = compareScenarios(table, SCENARIO_NAMES);
  console.log(renderCostReport([...results.values()], { generatedAt: new Date() }));
}
