// ---------- Per-service costs (stable public API) ----------
export { computeNodeCost, PREEMPTIBLE_FACTOR } from "./nodes.js";

export {
  computeManagedDbCost,
  computeManagedDbCostParts,
  BACKUP_RATE_FACTOR,
} from "./managed-db.js";
export type { ManagedDbCostParts } from "./managed-db.js";

export {
  computeServerlessCost,
  computeServerlessCostParts,
  workerUsage,
} from "./serverless.js";
export type { ServerlessCostParts, ServerlessUsage } from "./serverless.js";

// ---------- Flat and volume-priced lines ----------
export {
  computeStorageCost,
  computeEgressCost,
  computeLoadBalancerCost,
  computeMonitoringCost,
  computeSurchargeCost,
  monitoringSku,
} from "./usage.js";
