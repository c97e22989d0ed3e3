import { price } from "../../catalog/src/price-table.js";
import type { PriceTable } from "../../catalog/src/schema.js";

// Preemptible nodes bill at 20% of the on-demand rate.
export const PREEMPTIBLE_FACTOR = 0.2;

export function computeNodeCost(
  table: PriceTable,
  machineType: string,
  nodeCount: number,
  preemptible: boolean
): number {
  let cost = price(table, "compute", machineType) * nodeCount;
  if (preemptible) cost *= PREEMPTIBLE_FACTOR;
  return cost;
}
