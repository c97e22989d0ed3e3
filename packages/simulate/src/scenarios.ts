import { UnknownScenarioError } from "./errors.js";
import type { ScenarioDefinition, ScenarioName } from "./types.js";

export const SCENARIO_NAMES: readonly ScenarioName[] = [
  "demo",
  "staging",
  "production",
  "enterprise",
];

/**
 * Map a runtime name onto a scenario tag. Case-sensitive: callers lowercase
 * user input themselves.
 */
export function parseScenarioName(input: string): ScenarioName {
  switch (input) {
    case "demo":
    case "staging":
    case "production":
    case "enterprise":
      return input;
    default:
      throw new UnknownScenarioError(input);
  }
}

/* ---------------------------- Definitions ---------------------------- */

export function scenarioDefinition(kind: ScenarioName): ScenarioDefinition {
  switch (kind) {
    case "demo":
      return {
        kind,
        description: "Demo environment for demonstrations",
        usage: {
          requests_per_month: 10_000,
          avg_cpu_time_ms: 200,
          avg_memory_mb: 256,
          storage_gb: 50,
          egress_gb: 10,
        },
        components: {
          compute: { machine_type: "e2-small", node_count: 1, preemptible: true },
          database: {
            machine_type: "db-f1-micro",
            storage_gb: 20,
            high_availability: false,
            backup_gb: 5,
          },
          monitoring: "basic",
          serverless: { web_min_instances: 0, worker_min_instances: 0 },
          surcharges: [],
        },
      };

    case "staging":
      return {
        kind,
        description: "Staging environment for testing",
        usage: {
          requests_per_month: 50_000,
          avg_cpu_time_ms: 300,
          avg_memory_mb: 512,
          storage_gb: 100,
          egress_gb: 25,
        },
        components: {
          compute: { machine_type: "e2-medium", node_count: 2, preemptible: false },
          database: {
            machine_type: "db-n1-standard-1",
            storage_gb: 50,
            high_availability: false,
            backup_gb: 15,
          },
          monitoring: "basic",
          serverless: { web_min_instances: 0, worker_min_instances: 0 },
          surcharges: [],
        },
      };

    case "production":
      return {
        kind,
        description: "Production environment",
        usage: {
          requests_per_month: 200_000,
          avg_cpu_time_ms: 500,
          avg_memory_mb: 1024,
          storage_gb: 200,
          egress_gb: 100,
        },
        components: {
          compute: { machine_type: "e2-standard-2", node_count: 3, preemptible: false },
          database: {
            machine_type: "db-n1-standard-2",
            storage_gb: 100,
            high_availability: true,
            backup_gb: 50,
          },
          monitoring: "premium",
          serverless: { web_min_instances: 1, worker_min_instances: 1 },
          surcharges: [],
        },
      };

    case "enterprise":
      // multi-region
      return {
        kind,
        description: "Enterprise multi-region deployment",
        usage: {
          requests_per_month: 1_000_000,
          avg_cpu_time_ms: 750,
          avg_memory_mb: 2048,
          storage_gb: 500,
          egress_gb: 500,
        },
        components: {
          compute: { machine_type: "e2-standard-4", node_count: 6, preemptible: false },
          database: {
            machine_type: "db-n1-standard-4",
            storage_gb: 200,
            high_availability: true,
            backup_gb: 100,
          },
          monitoring: "premium",
          serverless: { web_min_instances: 0, worker_min_instances: 1 },
          surcharges: [
            { component: "security", sku: "security_tooling" },
            { component: "support", sku: "premium_support" },
          ],
        },
      };
  }
}
