/**
 * Commander option parsers
 */

import { InvalidArgumentError } from "commander";

import { isResourceType, type ResourceType, type SyncMode } from "../../types/index.js";

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function parseSyncMode(value: string): SyncMode {
  if (value !== "full" && value !== "incremental") {
    throw new InvalidArgumentError("Must be 'full' or 'incremental'.");
  }
  return value;
}

export function parseResourceType(value: string): ResourceType {
  if (!isResourceType(value)) {
    throw new InvalidArgumentError(
      "Must be one of properties, units, vendors, leases, work_orders, expenses."
    );
  }
  return value;
}
