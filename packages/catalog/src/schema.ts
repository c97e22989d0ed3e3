// Price catalog schema v1
// Types only. No functions.

export type CurrencyCode = string;

/* ----------------------------- Categories ---------------------------- */

export type PriceCategory =
  | "compute"
  | "database"
  | "serverless"
  | "storage"
  | "network"
  | "operations"
  | "support";

/* -------------------------------- SKUs ------------------------------- */

// Per node-month.
export type ComputeMachineType = "e2-small" | "e2-medium" | "e2-standard-2" | "e2-standard-4";

// Per instance-month, before HA doubling.
export type DatabaseMachineType =
  | "db-f1-micro"
  | "db-g1-small"
  | "db-n1-standard-1"
  | "db-n1-standard-2"
  | "db-n1-standard-4";

export type ServerlessSku =
  | "cpu_time" // per vCPU-second
  | "memory_time" // per GB-second
  | "requests" // per million requests
  | "min_instance"; // per always-on instance-month

export type StorageSku = "persistent_ssd" | "persistent_standard" | "sql_ssd";

export type NetworkSku = "load_balancer" | "egress_internet";

export type OperationsSku = "monitoring_basic" | "monitoring_premium" | "logging" | "secret_manager";

export type SupportSku = "security_tooling" | "premium_support";

export type MonitoringTier = "basic" | "premium";

/* ------------------------------ Catalog ------------------------------ */

export interface PriceCatalog {
  catalog_id: string;
  currency: CurrencyCode;
  region?: string;

  // category -> sku -> unit price
  categories: Record<PriceCategory, Record<string, number>>;
}

export interface PriceTable {
  readonly catalog_id: string;
  readonly currency: CurrencyCode;
  readonly region: string | null;
  readonly categories: Readonly<Record<PriceCategory, Readonly<Record<string, number>>>>;
}
