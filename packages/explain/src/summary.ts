import type { CostLine, ScenarioResult } from "../../simulate/src/types.js";

// Largest lines first; ties keep breakdown order.
export function topCostComponents(r: ScenarioResult, n = 3): CostLine[] {
  return [...r.cost_breakdown].sort((a, b) => b.amount - a.amount).slice(0, n);
}

export function costShare(r: ScenarioResult, line: CostLine): number {
  return r.monthly_cost === 0 ? 0 : (line.amount / r.monthly_cost) * 100;
}
