import { price } from "../../catalog/src/price-table.js";
import type { PriceTable } from "../../catalog/src/schema.js";

export type ServerlessCostParts = {
  request: number;
  cpu: number;
  memory: number;
  reserved: number;
  total: number;
};

export type ServerlessUsage = {
  requests_per_month: number;
  avg_cpu_time_ms: number;
  avg_memory_mb: number;
};

/**
 * Serverless cost split into request, CPU, memory and reserved-instance terms.
 *
 * Every invocation is billed as exactly one vCPU for its CPU time, and memory
 * is held for the same duration. Reserved instances are a flat fee each.
 */
export function computeServerlessCostParts(
  table: PriceTable,
  requestsPerMonth: number,
  avgCpuTimeMs: number,
  avgMemoryMb: number,
  minInstances = 0
): ServerlessCostParts {
  const request = (requestsPerMonth / 1_000_000) * price(table, "serverless", "requests");

  const cpuSeconds = (requestsPerMonth * avgCpuTimeMs) / 1000;
  const cpu = cpuSeconds * price(table, "serverless", "cpu_time");

  const gbSeconds = (cpuSeconds * avgMemoryMb) / 1024;
  const memory = gbSeconds * price(table, "serverless", "memory_time");

  const reserved = minInstances * price(table, "serverless", "min_instance");

  return { request, cpu, memory, reserved, total: request + cpu + memory + reserved };
}

export function computeServerlessCost(
  table: PriceTable,
  requestsPerMonth: number,
  avgCpuTimeMs: number,
  avgMemoryMb: number,
  minInstances = 0
): number {
  return computeServerlessCostParts(table, requestsPerMonth, avgCpuTimeMs, avgMemoryMb, minInstances)
    .total;
}

/**
 * Background-worker load derived from the web path's nominal usage:
 * a tenth of the requests, each taking twice the CPU time and memory.
 * This is a fixed product heuristic, not a measured model.
 */
export function workerUsage(u: ServerlessUsage): ServerlessUsage {
  return {
    requests_per_month: Math.floor(u.requests_per_month / 10),
    avg_cpu_time_ms: u.avg_cpu_time_ms * 2,
    avg_memory_mb: u.avg_memory_mb * 2,
  };
}
