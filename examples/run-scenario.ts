import { loadPriceTable } from "../packages/catalog/src/price-table.js";
import { aggregateScenario } from "../packages/simulate/src/aggregate.js";

const table = loadPriceTable();
const name = process.argv[2] ?? "production";

console.log(JSON.stringify(aggregateScenario(table, name), null, 2));
