import type { PriceTable } from "../../catalog/src/schema.js";
import { computeNodeCost } from "../../compute/src/nodes.js";
import { computeManagedDbCost } from "../../compute/src/managed-db.js";
import { computeServerlessCost, workerUsage } from "../../compute/src/serverless.js";
import {
  computeEgressCost,
  computeLoadBalancerCost,
  computeMonitoringCost,
  computeStorageCost,
  computeSurchargeCost,
} from "../../compute/src/usage.js";
import { parseScenarioName, scenarioDefinition } from "./scenarios.js";
import type { CostBreakdown, ScenarioDefinition, ScenarioName, ScenarioResult } from "./types.js";

export function aggregateScenario(table: PriceTable, name: string): ScenarioResult {
  return aggregateDefinition(table, scenarioDefinition(parseScenarioName(name)));
}

/**
 * Aggregate every named scenario independently.
 *
 * All names are checked before anything is computed, so an unknown name
 * fails the whole comparison. Map order follows first appearance in `names`.
 */
export function compareScenarios(
  table: PriceTable,
  names: readonly string[]
): Map<ScenarioName, ScenarioResult> {
  const kinds = names.map(parseScenarioName);

  const results = new Map<ScenarioName, ScenarioResult>();
  for (const kind of kinds) {
    if (results.has(kind)) continue;
    results.set(kind, aggregateDefinition(table, scenarioDefinition(kind)));
  }
  return results;
}

export function sumBreakdown(breakdown: CostBreakdown): number {
  return breakdown.reduce((acc, line) => acc + line.amount, 0);
}

function aggregateDefinition(table: PriceTable, def: ScenarioDefinition): ScenarioResult {
  const { usage, components: c } = def;
  const worker = workerUsage(usage);

  const breakdown: CostBreakdown = [
    {
      component: "compute_nodes",
      amount: computeNodeCost(table, c.compute.machine_type, c.compute.node_count, c.compute.preemptible),
    },
    {
      component: "managed_db",
      amount: computeManagedDbCost(
        table,
        c.database.machine_type,
        c.database.storage_gb,
        c.database.high_availability,
        c.database.backup_gb
      ),
    },
    {
      component: "serverless_web",
      amount: computeServerlessCost(
        table,
        usage.requests_per_month,
        usage.avg_cpu_time_ms,
        usage.avg_memory_mb,
        c.serverless.web_min_instances
      ),
    },
    {
      component: "serverless_worker",
      amount: computeServerlessCost(
        table,
        worker.requests_per_month,
        worker.avg_cpu_time_ms,
        worker.avg_memory_mb,
        c.serverless.worker_min_instances
      ),
    },
    { component: "storage", amount: computeStorageCost(table, usage.storage_gb) },
    { component: "load_balancer", amount: computeLoadBalancerCost(table) },
    { component: "egress", amount: computeEgressCost(table, usage.egress_gb) },
    { component: "monitoring", amount: computeMonitoringCost(table, c.monitoring) },
    ...c.surcharges.map((s) => ({
      component: s.component,
      amount: computeSurchargeCost(table, s.sku),
    })),
  ];

  const monthly_cost = sumBreakdown(breakdown);

  return {
    scenario: def.kind,
    description: def.description,
    usage_stats: { ...usage },
    cost_breakdown: breakdown,
    monthly_cost,
    annual_cost: monthly_cost * 12,
  };
}
