// Scenario contract for the whole monorepo.
// Compute + Explain read these shapes, not ad-hoc records.

import type {
  ComputeMachineType,
  DatabaseMachineType,
  MonitoringTier,
  SupportSku,
} from "../../catalog/src/schema.js";

export type ScenarioName = "demo" | "staging" | "production" | "enterprise";

export type UsageProfile = {
  readonly requests_per_month: number;
  readonly avg_cpu_time_ms: number;
  readonly avg_memory_mb: number;
  readonly storage_gb: number;
  readonly egress_gb: number;
};

export type ComponentSelection = {
  readonly compute: {
    readonly machine_type: ComputeMachineType;
    readonly node_count: number;
    readonly preemptible: boolean;
  };
  readonly database: {
    readonly machine_type: DatabaseMachineType;
    readonly storage_gb: number;
    readonly high_availability: boolean;
    readonly backup_gb: number;
  };
  readonly monitoring: MonitoringTier;
  readonly serverless: {
    readonly web_min_instances: number;
    readonly worker_min_instances: number;
  };
  readonly surcharges: ReadonlyArray<{
    readonly component: "security" | "support";
    readonly sku: SupportSku;
  }>;
};

export type ScenarioDefinition<K extends ScenarioName = ScenarioName> = {
  readonly kind: K;
  readonly description: string;
  readonly usage: UsageProfile;
  readonly components: ComponentSelection;
};

export type CostComponent =
  | "compute_nodes"
  | "managed_db"
  | "serverless_web"
  | "serverless_worker"
  | "storage"
  | "load_balancer"
  | "egress"
  | "monitoring"
  | "security"
  | "support";

export type CostLine = {
  component: CostComponent;
  amount: number;
};

// Insertion order is computation order.
export type CostBreakdown = CostLine[];

export type ScenarioResult = {
  scenario: ScenarioName;
  description: string;
  usage_stats: UsageProfile;
  cost_breakdown: CostBreakdown;
  monthly_cost: number;
  annual_cost: number;
};
