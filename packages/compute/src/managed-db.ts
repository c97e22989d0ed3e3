import { price } from "../../catalog/src/price-table.js";
import type { PriceTable } from "../../catalog/src/schema.js";

// Backups bill at 8% of the primary SSD rate.
export const BACKUP_RATE_FACTOR = 0.08;

export type ManagedDbCostParts = {
  base: number;
  storage: number;
  backup: number;
  total: number;
};

/**
 * Managed database cost split into its three terms.
 * HA runs a standby replica, so the instance charge is paid twice.
 */
export function computeManagedDbCostParts(
  table: PriceTable,
  machineType: string,
  storageGb: number,
  highAvailability: boolean,
  backupGb: number
): ManagedDbCostParts {
  let base = price(table, "database", machineType);
  if (highAvailability) base *= 2;

  const ssd = price(table, "storage", "sql_ssd");
  const storage = storageGb * ssd;
  const backup = backupGb * ssd * BACKUP_RATE_FACTOR;

  return { base, storage, backup, total: base + storage + backup };
}

export function computeManagedDbCost(
  table: PriceTable,
  machineType: string,
  storageGb: number,
  highAvailability: boolean,
  backupGb: number
): number {
  return computeManagedDbCostParts(table, machineType, storageGb, highAvailability, backupGb).total;
}
