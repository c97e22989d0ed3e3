import { price } from "../../catalog/src/price-table.js";
import type { MonitoringTier, PriceTable, SupportSku } from "../../catalog/src/schema.js";

export function computeStorageCost(table: PriceTable, storageGb: number): number {
  return storageGb * price(table, "storage", "persistent_ssd");
}

export function computeEgressCost(table: PriceTable, egressGb: number): number {
  return egressGb * price(table, "network", "egress_internet");
}

export function computeLoadBalancerCost(table: PriceTable): number {
  return price(table, "network", "load_balancer");
}

export function monitoringSku(tier: MonitoringTier): "monitoring_basic" | "monitoring_premium" {
  switch (tier) {
    case "basic":
      return "monitoring_basic";
    case "premium":
      return "monitoring_premium";
  }
}

export function computeMonitoringCost(table: PriceTable, tier: MonitoringTier): number {
  return price(table, "operations", monitoringSku(tier));
}

export function computeSurchargeCost(table: PriceTable, sku: SupportSku): number {
  return price(table, "support", sku);
}
