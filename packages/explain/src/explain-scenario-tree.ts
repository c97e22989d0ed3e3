import { price } from "../../catalog/src/price-table.js";
import type { PriceCategory, PriceTable } from "../../catalog/src/schema.js";
import { BACKUP_RATE_FACTOR } from "../../compute/src/managed-db.js";
import { PREEMPTIBLE_FACTOR } from "../../compute/src/nodes.js";
import { workerUsage, type ServerlessUsage } from "../../compute/src/serverless.js";
import { monitoringSku } from "../../compute/src/usage.js";
import { aggregateScenario } from "../../simulate/src/aggregate.js";
import { scenarioDefinition } from "../../simulate/src/scenarios.js";
import type { ExplainTree } from "./tree.js";

/**
 * Explain every cost line of a scenario as formula, substituted formula and
 * value. Values are the breakdown amounts of `aggregateScenario`, so the tree
 * never disagrees with the numbers a report prints.
 */
export function buildScenarioExplainTree(table: PriceTable, name: string): ExplainTree {
  const r = aggregateScenario(table, name);
  const def = scenarioDefinition(r.scenario);
  const c = def.components;

  const inputs: ExplainTree["inputs"] = [];
  const use = (category: PriceCategory, sku: string): string => {
    const unit_price = price(table, category, sku);
    if (!inputs.some((i) => i.category === category && i.sku === sku)) {
      inputs.push({ category, sku, unit_price });
    }
    return fmt(unit_price);
  };

  const serverless = (u: ServerlessUsage, minInstances: number) => ({
    formula:
      "(requests / 1000000) * requests_rate + (requests * cpu_ms / 1000) * cpu_rate" +
      " + (requests * cpu_ms / 1000 * memory_mb / 1024) * memory_rate + min_instances * min_instance_rate",
    substituted:
      `(${u.requests_per_month} / 1000000) * ${use("serverless", "requests")}` +
      ` + (${u.requests_per_month} * ${u.avg_cpu_time_ms} / 1000) * ${use("serverless", "cpu_time")}` +
      ` + (${u.requests_per_month} * ${u.avg_cpu_time_ms} / 1000 * ${u.avg_memory_mb} / 1024) * ${use("serverless", "memory_time")}` +
      ` + ${minInstances} * ${use("serverless", "min_instance")}`,
  });

  const notes: string[] = [];
  const computations: ExplainTree["computations"] = r.cost_breakdown.map((line) => {
    switch (line.component) {
      case "compute_nodes": {
        const unit = use("compute", c.compute.machine_type);
        const discount = c.compute.preemptible ? ` * ${PREEMPTIBLE_FACTOR}` : "";
        if (c.compute.preemptible) notes.push("Compute nodes are preemptible (80% discount).");
        return {
          name: line.component,
          formula: `${c.compute.machine_type} * node_count${discount}`,
          substituted: `${unit} * ${c.compute.node_count}${discount}`,
          value: line.amount,
        };
      }

      case "managed_db": {
        const unit = use("database", c.database.machine_type);
        const ssd = use("storage", "sql_ssd");
        const ha = c.database.high_availability ? " * 2" : "";
        if (c.database.high_availability) notes.push("Database runs with a standby replica (HA).");
        return {
          name: line.component,
          formula: `${c.database.machine_type}${ha} + storage_gb * sql_ssd + backup_gb * sql_ssd * ${BACKUP_RATE_FACTOR}`,
          substituted: `${unit}${ha} + ${c.database.storage_gb} * ${ssd} + ${c.database.backup_gb} * ${ssd} * ${BACKUP_RATE_FACTOR}`,
          value: line.amount,
        };
      }

      case "serverless_web":
        return {
          name: line.component,
          ...serverless(def.usage, c.serverless.web_min_instances),
          value: line.amount,
        };

      case "serverless_worker":
        notes.push("Worker path assumes 1/10 of the requests at 2x CPU time and 2x memory.");
        return {
          name: line.component,
          ...serverless(workerUsage(def.usage), c.serverless.worker_min_instances),
          value: line.amount,
        };

      case "storage":
        return {
          name: line.component,
          formula: "storage_gb * persistent_ssd",
          substituted: `${def.usage.storage_gb} * ${use("storage", "persistent_ssd")}`,
          value: line.amount,
        };

      case "load_balancer":
        return {
          name: line.component,
          formula: "load_balancer",
          substituted: use("network", "load_balancer"),
          value: line.amount,
        };

      case "egress":
        return {
          name: line.component,
          formula: "egress_gb * egress_internet",
          substituted: `${def.usage.egress_gb} * ${use("network", "egress_internet")}`,
          value: line.amount,
        };

      case "monitoring": {
        const sku = monitoringSku(c.monitoring);
        return { name: line.component, formula: sku, substituted: use("operations", sku), value: line.amount };
      }

      case "security":
      case "support": {
        const surcharge = c.surcharges.find((s) => s.component === line.component);
        if (!surcharge) throw new Error(`No surcharge SKU for ${line.component} in ${r.scenario}`);
        return {
          name: line.component,
          formula: surcharge.sku,
          substituted: use("support", surcharge.sku),
          value: line.amount,
        };
      }
    }
  });

  return {
    scenario: r.scenario,
    inputs,
    computations,
    result: { monthly_cost: r.monthly_cost, annual_cost: r.annual_cost },
    notes,
  };
}

function fmt(n: number): string {
  return Number.isFinite(n) ? String(n) : "NaN";
}
