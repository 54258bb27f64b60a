/**
 * Remote record → canonical row mapping
 *
 * The remote API names the same field differently across endpoints and
 * versions. Each canonical column lists its accepted source fields in
 * priority order; the first present, non-empty one wins.
 */

import type {
  LeaseStatus,
  UnitStatus,
  WorkOrderPriority,
  WorkOrderStatus,
} from "../../db/types.js";
import type { RemoteRecord, ResourceType } from "../../types/index.js";

// ============================================================================
// Errors
// ============================================================================

export class RecordMappingError extends Error {
  code = "RECORD_MAPPING_ERROR" as const;
  field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "RecordMappingError";
    this.field = field;
  }
}

// ============================================================================
// Field Aliases
// ============================================================================

export const EXTERNAL_ID_FIELDS: Record<ResourceType, readonly string[]> = {
  properties: ["property_id", "id"],
  units: ["unit_id", "id"],
  vendors: ["vendor_id", "id"],
  leases: ["occupancy_id", "lease_id", "id"],
  work_orders: ["work_order_id", "id"],
  expenses: ["txn_id", "id"],
};

export const GL_ACCOUNT_FIELDS = [
  "account_number",
  "gl_account_number",
  "account",
] as const;

const PROPERTY_NAME_FIELDS = [
  "property_name",
  "name",
  "property_address",
  "property",
  "property_street",
];

// ============================================================================
// Vocabulary Maps
// ============================================================================

const UNIT_STATUS: Record<string, UnitStatus> = {
  occupied: "occupied",
  rented: "occupied",
  leased: "occupied",
  vacant: "vacant",
  available: "vacant",
  empty: "vacant",
  "not ready": "not_ready",
  not_ready: "not_ready",
  maintenance: "not_ready",
};

const LEASE_STATUS: Record<string, LeaseStatus> = {
  current: "active",
  active: "active",
  notice: "active",
  past: "past",
  evict: "past",
  ended: "past",
  future: "future",
  pending: "future",
};

const WORK_ORDER_STATUS: Record<string, WorkOrderStatus> = {
  open: "open",
  new: "open",
  pending: "open",
  submitted: "open",
  in_progress: "in_progress",
  "in progress": "in_progress",
  assigned: "in_progress",
  working: "in_progress",
  scheduled: "in_progress",
  completed: "completed",
  done: "completed",
  closed: "completed",
  resolved: "completed",
  cancelled: "cancelled",
  canceled: "cancelled",
  rejected: "cancelled",
};

const WORK_ORDER_PRIORITY: Record<string, WorkOrderPriority> = {
  low: "low",
  minor: "low",
  normal: "normal",
  medium: "normal",
  standard: "normal",
  high: "high",
  urgent: "high",
  important: "high",
  emergency: "emergency",
  critical: "emergency",
  immediate: "emergency",
};

function mapVocabulary<T extends string>(
  vocabulary: Record<string, T>,
  value: string | null,
  fallback: T
): T {
  if (value === null) {
    return fallback;
  }
  return vocabulary[value.trim().toLowerCase()] ?? fallback;
}

export function mapUnitStatus(value: string | null): UnitStatus {
  return mapVocabulary(UNIT_STATUS, value, "vacant");
}

export function mapLeaseStatus(value: string | null): LeaseStatus {
  return mapVocabulary(LEASE_STATUS, value, "active");
}

export function mapWorkOrderStatus(value: string | null): WorkOrderStatus {
  return mapVocabulary(WORK_ORDER_STATUS, value, "open");
}

export function mapWorkOrderPriority(value: string | null): WorkOrderPriority {
  return mapVocabulary(WORK_ORDER_PRIORITY, value, "normal");
}

// ============================================================================
// Field Readers
// ============================================================================

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}

function firstPresent(
  record: RemoteRecord,
  fields: readonly string[]
): { field: string; value: unknown } | null {
  for (const field of fields) {
    const value = record[field];
    if (isPresent(value)) {
      return { field, value };
    }
  }
  return null;
}

export function readString(
  record: RemoteRecord,
  fields: readonly string[]
): string | null {
  const found = firstPresent(record, fields);
  if (found === null) {
    return null;
  }
  if (typeof found.value === "string") {
    return found.value.trim();
  }
  if (typeof found.value === "number" || typeof found.value === "boolean") {
    return String(found.value);
  }
  throw new RecordMappingError(
    `Field '${found.field}' is not a scalar value`,
    found.field
  );
}

/**
 * Parse a money amount. Strings may carry currency symbols, thousands
 * separators or whitespace ("$1,234.50"); everything but digits, '.' and
 * '-' is stripped before parsing.
 */
export function parseAmount(value: unknown): number | null {
  if (!isPresent(value)) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const cleaned = value.replace(/[^0-9.-]/g, "");
    if (cleaned === "" || !/^-?\d*\.?\d+$|^-?\d+\.$/.test(cleaned)) {
      return null;
    }
    return Number(cleaned);
  }
  return null;
}

export function readAmount(
  record: RemoteRecord,
  fields: readonly string[]
): number | null {
  const found = firstPresent(record, fields);
  if (found === null) {
    return null;
  }
  const amount = parseAmount(found.value);
  if (amount === null) {
    throw new RecordMappingError(
      `Field '${found.field}' is not a valid amount`,
      found.field
    );
  }
  return amount;
}

export function readInteger(
  record: RemoteRecord,
  fields: readonly string[]
): number | null {
  const amount = readAmount(record, fields);
  return amount === null ? null : Math.trunc(amount);
}

export function readBoolean(
  record: RemoteRecord,
  fields: readonly string[],
  fallback: boolean
): boolean {
  const found = firstPresent(record, fields);
  if (found === null) {
    return fallback;
  }
  const value = found.value;
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value !== 0;
  }
  if (typeof value === "string") {
    return ["yes", "true", "1", "y"].includes(value.trim().toLowerCase());
  }
  return fallback;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Calendar date as YYYY-MM-DD. Accepts ISO dates/datetimes and
 * US-style MM/DD/YYYY.
 */
export function readDate(
  record: RemoteRecord,
  fields: readonly string[]
): string | null {
  const value = readString(record, fields);
  if (value === null) {
    return null;
  }

  const iso = /^(\d{4})-(\d{2})-(\d{2})/.exec(value);
  if (iso !== null) {
    return `${iso[1] ?? ""}-${iso[2] ?? ""}-${iso[3] ?? ""}`;
  }

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(value);
  if (us !== null) {
    return `${us[3] ?? ""}-${pad(Number(us[1]))}-${pad(Number(us[2]))}`;
  }

  throw new RecordMappingError(`Unparseable date '${value}'`);
}

export function readTimestamp(
  record: RemoteRecord,
  fields: readonly string[]
): Date | null {
  const value = readString(record, fields);
  if (value === null) {
    return null;
  }
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new RecordMappingError(`Unparseable timestamp '${value}'`);
  }
  return new Date(time);
}

/**
 * Leading digits of a GL account ("6210 - Water" → "6210"), or the raw
 * value when it has no numeric prefix
 */
export function extractGlAccountNumber(record: RemoteRecord): string | null {
  const value = readString(record, GL_ACCOUNT_FIELDS);
  if (value === null) {
    return null;
  }
  const match = /^(\d+)/.exec(value);
  return match?.[1] ?? value;
}

/**
 * External identifier of a remote record, or null when absent
 */
export function extractExternalId(
  resourceType: ResourceType,
  record: RemoteRecord
): string | null {
  try {
    return readString(record, EXTERNAL_ID_FIELDS[resourceType]);
  } catch {
    return null;
  }
}

function requireExternalId(
  resourceType: ResourceType,
  record: RemoteRecord
): string {
  const externalId = extractExternalId(resourceType, record);
  if (externalId === null) {
    throw new RecordMappingError(
      `Missing external id (expected one of ${EXTERNAL_ID_FIELDS[resourceType].join(", ")})`
    );
  }
  return externalId;
}

function isActive(record: RemoteRecord): boolean {
  const visibility = readString(record, ["visibility"]);
  return visibility === null || visibility === "Active";
}

// ============================================================================
// Mapped Records
// ============================================================================

export interface PropertyValues {
  name: string;
  address_line1: string | null;
  address_line2: string | null;
  city: string | null;
  state: string | null;
  zip: string | null;
  county: string | null;
  property_type: string;
  unit_count: number;
  portfolio: string | null;
  is_active: boolean;
}

export interface UnitValues {
  unit_number: string;
  unit_type: string | null;
  sqft: number | null;
  bedrooms: number | null;
  bathrooms: number | null;
  status: UnitStatus;
  market_rent: number | null;
  advertised_rent: number | null;
  is_active: boolean;
  rentable: boolean;
}

export interface VendorValues {
  company_name: string;
  contact_name: string | null;
  email: string | null;
  phone: string | null;
  address_street: string | null;
  address_city: string | null;
  address_state: string | null;
  address_zip: string | null;
  vendor_type: string | null;
  vendor_trades: string | null;
  workers_comp_expires: string | null;
  liability_ins_expires: string | null;
  auto_ins_expires: string | null;
  state_lic_expires: string | null;
  do_not_use: boolean;
  is_active: boolean;
}

export interface LeaseValues {
  tenant_name: string | null;
  start_date: string | null;
  end_date: string | null;
  rent: number;
  security_deposit: number | null;
  status: LeaseStatus;
}

export interface WorkOrderValues {
  vendor_name: string | null;
  opened_at: Date | null;
  closed_at: Date | null;
  status: WorkOrderStatus;
  priority: WorkOrderPriority;
  category: string | null;
  description: string | null;
  amount: number | null;
  vendor_bill_amount: number | null;
  estimate_amount: number | null;
  vendor_trade: string | null;
  work_order_type: string | null;
}

export interface ExpenseValues {
  reference_number: string | null;
  bill_date: string | null;
  due_date: string | null;
  description: string | null;
  gl_account: string | null;
  gl_account_name: string | null;
  gl_account_number: string | null;
  amount: number | null;
  paid: number | null;
  unpaid: number | null;
  payee_name: string | null;
  work_order_external_id: string | null;
}

/**
 * External ids of the records a mapped record points at
 */
export interface RecordReferences {
  property?: string | null;
  unit?: string | null;
  vendor?: string | null;
}

interface MappedBase<K extends ResourceType, V> {
  resourceType: K;
  externalId: string;
  values: V;
  references: RecordReferences;
}

export type MappedRecord =
  | MappedBase<"properties", PropertyValues>
  | MappedBase<"units", UnitValues>
  | MappedBase<"vendors", VendorValues>
  | MappedBase<"leases", LeaseValues>
  | MappedBase<"work_orders", WorkOrderValues>
  | MappedBase<"expenses", ExpenseValues>;

/**
 * Which references must resolve for a record to be stored. Optional
 * references that do not resolve are stored as null.
 */
export const REQUIRED_REFERENCES: Record<
  ResourceType,
  readonly (keyof RecordReferences)[]
> = {
  properties: [],
  units: ["property"],
  vendors: [],
  leases: ["unit"],
  work_orders: ["property"],
  expenses: ["property"],
};

// ============================================================================
// Mappers
// ============================================================================

function nestedId(record: RemoteRecord, key: string): string | null {
  const nested = record[key];
  if (typeof nested === "object" && nested !== null && "id" in nested) {
    const id = nested.id;
    if (typeof id === "string" || typeof id === "number") {
      return String(id);
    }
  }
  return null;
}

function referenceId(
  record: RemoteRecord,
  field: string,
  nestedKey: string
): string | null {
  const value = record[field];
  if (typeof value === "string" || typeof value === "number") {
    return isPresent(value) ? String(value) : null;
  }
  return nestedId(record, nestedKey);
}

export function mapProperty(record: RemoteRecord): MappedRecord {
  return {
    resourceType: "properties",
    externalId: requireExternalId("properties", record),
    references: {},
    values: {
      name: readString(record, PROPERTY_NAME_FIELDS) ?? "Unknown Property",
      address_line1: readString(record, ["property_street", "address"]),
      address_line2: readString(record, ["property_street2", "address2"]),
      city: readString(record, ["property_city", "city"]),
      state: readString(record, ["property_state", "state"]),
      zip: readString(record, ["property_zip", "zip"]),
      county: readString(record, ["property_county", "county"]),
      property_type:
        readString(record, ["property_type", "type"]) ?? "residential",
      unit_count:
        readInteger(record, ["units", "number_of_units", "unit_count"]) ?? 0,
      portfolio: readString(record, ["portfolio"]),
      is_active: isActive(record),
    },
  };
}

export function mapUnit(record: RemoteRecord): MappedRecord {
  return {
    resourceType: "units",
    externalId: requireExternalId("units", record),
    references: { property: referenceId(record, "property_id", "property") },
    values: {
      unit_number:
        readString(record, ["unit_name", "unit_number", "name"]) ?? "Unknown",
      unit_type: readString(record, ["unit_type", "billed_as"]),
      sqft: readInteger(record, ["sqft", "square_feet"]),
      bedrooms: readInteger(record, ["bedrooms"]),
      bathrooms: readAmount(record, ["bathrooms"]),
      status: mapUnitStatus(readString(record, ["unit_status", "status"])),
      market_rent: readAmount(record, ["market_rent"]),
      advertised_rent: readAmount(record, ["advertised_rent"]),
      is_active: isActive(record),
      rentable: readBoolean(record, ["rentable"], true),
    },
  };
}

export function mapVendor(record: RemoteRecord): MappedRecord {
  return {
    resourceType: "vendors",
    externalId: requireExternalId("vendors", record),
    references: {},
    values: {
      company_name:
        readString(record, ["company_name", "name"]) ?? "Unknown Vendor",
      contact_name: readString(record, ["contact_name", "name"]),
      email: readString(record, ["email", "primary_email"]),
      phone: readString(record, ["phone", "primary_phone"]),
      address_street: readString(record, ["address", "street"]),
      address_city: readString(record, ["city"]),
      address_state: readString(record, ["state"]),
      address_zip: readString(record, ["zip", "postal_code"]),
      vendor_type: readString(record, ["vendor_type"]),
      vendor_trades: readString(record, ["vendor_trades"]),
      workers_comp_expires: readDate(record, ["workers_comp_expires"]),
      liability_ins_expires: readDate(record, ["liability_ins_expires"]),
      auto_ins_expires: readDate(record, ["auto_ins_expires"]),
      state_lic_expires: readDate(record, ["state_lic_expires"]),
      do_not_use: readBoolean(
        record,
        ["do_not_use_for_work_order", "do_not_use"],
        false
      ),
      is_active: isActive(record),
    },
  };
}

export function mapLease(record: RemoteRecord): MappedRecord {
  return {
    resourceType: "leases",
    externalId: requireExternalId("leases", record),
    references: { unit: referenceId(record, "unit_id", "unit") },
    values: {
      tenant_name: readString(record, ["tenant", "tenant_name", "name"]),
      start_date: readDate(record, [
        "lease_from",
        "start_date",
        "lease_start",
        "move_in",
      ]),
      end_date: readDate(record, ["lease_to", "end_date", "lease_end"]),
      rent: readAmount(record, ["rent", "monthly_rent", "rent_amount"]) ?? 0,
      security_deposit: readAmount(record, ["deposit", "security_deposit"]),
      status: mapLeaseStatus(readString(record, ["status", "lease_status"])),
    },
  };
}

export function mapWorkOrder(record: RemoteRecord): MappedRecord {
  return {
    resourceType: "work_orders",
    externalId: requireExternalId("work_orders", record),
    references: {
      property: referenceId(record, "property_id", "property"),
      unit: referenceId(record, "unit_id", "unit"),
      vendor: referenceId(record, "vendor_id", "vendor"),
    },
    values: {
      vendor_name: readString(record, ["vendor_name", "vendor"]),
      opened_at: readTimestamp(record, ["created_at", "opened_at"]),
      closed_at: readTimestamp(record, ["completed_on", "work_completed_on"]),
      status: mapWorkOrderStatus(readString(record, ["status"])),
      priority: mapWorkOrderPriority(readString(record, ["priority"])),
      category: readString(record, ["work_order_type", "work_order_issue"]),
      description: readString(record, [
        "job_description",
        "service_request_description",
        "instructions",
      ]),
      amount: readAmount(record, ["amount"]),
      vendor_bill_amount: readAmount(record, ["vendor_bill_amount"]),
      estimate_amount: readAmount(record, ["estimate_amount", "estimate"]),
      vendor_trade: readString(record, ["vendor_trade"]),
      work_order_type: readString(record, ["work_order_type"]),
    },
  };
}

export function mapExpense(record: RemoteRecord): MappedRecord {
  return {
    resourceType: "expenses",
    externalId: requireExternalId("expenses", record),
    references: {
      property: referenceId(record, "property_id", "property"),
      unit: referenceId(record, "unit_id", "unit"),
      vendor: referenceId(record, "vendor_id", "vendor"),
    },
    values: {
      reference_number: readString(record, ["reference_number"]),
      bill_date: readDate(record, ["bill_date"]),
      due_date: readDate(record, ["due_date"]),
      description: readString(record, ["description"]),
      gl_account: readString(record, ["account", "gl_account"]),
      gl_account_name: readString(record, ["account_name", "gl_account_name"]),
      gl_account_number: extractGlAccountNumber(record),
      amount: readAmount(record, ["amount", "paid"]),
      paid: readAmount(record, ["paid"]),
      unpaid: readAmount(record, ["unpaid"]),
      payee_name: readString(record, ["payee_name"]),
      work_order_external_id: readString(record, ["work_order_id"]),
    },
  };
}

const MAPPERS: Record<ResourceType, (record: RemoteRecord) => MappedRecord> = {
  properties: mapProperty,
  units: mapUnit,
  vendors: mapVendor,
  leases: mapLease,
  work_orders: mapWorkOrder,
  expenses: mapExpense,
};

/**
 * Map one remote record. Throws RecordMappingError when the record cannot
 * be represented (missing identifier, malformed number or date).
 */
export function mapRecord(
  resourceType: ResourceType,
  record: RemoteRecord
): MappedRecord {
  return MAPPERS[resourceType](record);
}
