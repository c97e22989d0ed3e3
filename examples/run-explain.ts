import { loadPriceTable } from "../packages/catalog/src/price-table.js";
import { buildScenarioExplainTree } from "../packages/explain/src/explain-scenario-tree.js";

const table = loadPriceTable();
const tree = buildScenarioExplainTree(table, process.argv[2] ?? "demo");

for (const c of tree.computations) {
  console.log(`${c.name}: ${c.formula}`);
  console.log(`  = ${c.substituted}`);
  console.log(`  = ${c.value.toFixed(4)}`);
}
for (const n of tree.notes) console.log(`NOTE: ${n}`);
console.log(`monthly=${tree.result.monthly_cost.toFixed(2)} annual=${tree.result.annual_cost.toFixed(2)}`);
