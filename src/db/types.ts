import type {
  ConnectionStatus,
  FailureDetail,
  RemoteRecord,
  ResourceErrorsMap,
  ResourceMetricsMap,
  ResourceType,
  SyncMode,
  SyncRunStatus,
  SyncTrigger,
} from "../types/index.js";
import type { Generated, Insertable, Selectable, Updateable } from "kysely";

// ============================================================================
// ENUM Types (matching CHECK constraints in postgres-schema.sql)
// ============================================================================

export type UnitStatus = "occupied" | "vacant" | "not_ready";

export type LeaseStatus = "active" | "past" | "future";

export type WorkOrderStatus =
  | "open"
  | "in_progress"
  | "completed"
  | "cancelled";

export type WorkOrderPriority = "low" | "normal" | "high" | "emergency";

// ============================================================================
// SYNC Tables
// ============================================================================

/**
 * connections - Remote API credentials and health
 */
export interface ConnectionsTable {
  id: Generated<number>;
  name: string;
  base_url: string;
  client_id: string;
  client_secret_encrypted: string | null;
  status: Generated<ConnectionStatus>;
  last_success_at: Date | null;
  last_error: string | null;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

/**
 * sync_runs - One execution of the ingestion pipeline
 */
export interface SyncRunsTable {
  id: Generated<number>;
  connection_id: number;
  mode: SyncMode;
  status: Generated<SyncRunStatus>;
  triggered_by: SyncTrigger;
  started_at: Date | null;
  ended_at: Date | null;
  resources_synced: Generated<number>;
  errors_count: Generated<number>;
  error_summary: string | null;
  resource_metrics: Generated<ResourceMetricsMap>;
  resource_errors: Generated<ResourceErrorsMap>;
  created_at: Generated<Date>;
}

/**
 * raw_events - Append-only copy of every fetched remote record
 */
export interface RawEventsTable {
  id: Generated<number>;
  sync_run_id: number;
  resource_type: ResourceType;
  external_id: string | null;
  payload: RemoteRecord;
  pulled_at: Generated<Date>;
  processed_at: Date | null;
}

/**
 * sync_failure_alerts - Consecutive-failure state per connection
 */
export interface SyncFailureAlertsTable {
  id: Generated<number>;
  connection_id: number;
  consecutive_failures: Generated<number>;
  last_alert_sent_at: Date | null;
  acknowledged_at: Date | null;
  acknowledged_by: string | null;
  failure_details: Generated<FailureDetail[]>;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

/**
 * settings - Configuration overrides keyed by (category, key)
 */
export interface SettingsTable {
  id: Generated<number>;
  category: string;
  key: string;
  value: unknown;
  updated_at: Generated<Date>;
}

// ============================================================================
// CANONICAL Tables
// ============================================================================

/**
 * properties - Managed buildings. notes/latitude/longitude are owned by
 * other subsystems and never written by ingestion.
 */
export interface PropertiesTable {
  id: Generated<number>;
  external_id: string;
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
  notes: string | null;
  latitude: number | null;
  longitude: number | null;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface UnitsTable {
  id: Generated<number>;
  external_id: string;
  property_id: number;
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
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface VendorsTable {
  id: Generated<number>;
  external_id: string;
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
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface LeasesTable {
  id: Generated<number>;
  external_id: string;
  unit_id: number;
  tenant_name: string | null;
  start_date: string | null;
  end_date: string | null;
  rent: number;
  security_deposit: number | null;
  status: LeaseStatus;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface WorkOrdersTable {
  id: Generated<number>;
  external_id: string;
  property_id: number;
  unit_id: number | null;
  vendor_id: number | null;
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
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

/**
 * expenses - Vendor bill detail lines
 */
export interface ExpensesTable {
  id: Generated<number>;
  external_id: string;
  property_id: number;
  unit_id: number | null;
  vendor_id: number | null;
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
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  // Sync bookkeeping
  connections: ConnectionsTable;
  sync_runs: SyncRunsTable;
  raw_events: RawEventsTable;
  sync_failure_alerts: SyncFailureAlertsTable;
  settings: SettingsTable;

  // Canonical layer
  properties: PropertiesTable;
  units: UnitsTable;
  vendors: VendorsTable;
  leases: LeasesTable;
  work_orders: WorkOrdersTable;
  expenses: ExpensesTable;
}

// ============================================================================
// Row Types (for convenience)
// ============================================================================

export type Connection = Selectable<ConnectionsTable>;
export type NewConnection = Insertable<ConnectionsTable>;
export type ConnectionUpdate = Updateable<ConnectionsTable>;

export type SyncRun = Selectable<SyncRunsTable>;
export type NewSyncRun = Insertable<SyncRunsTable>;

export type RawEvent = Selectable<RawEventsTable>;
export type NewRawEvent = Insertable<RawEventsTable>;

export type SyncFailureAlert = Selectable<SyncFailureAlertsTable>;

export type Setting = Selectable<SettingsTable>;

export type Property = Selectable<PropertiesTable>;
export type Unit = Selectable<UnitsTable>;
export type Vendor = Selectable<VendorsTable>;
export type Lease = Selectable<LeasesTable>;
export type WorkOrder = Selectable<WorkOrdersTable>;
export type Expense = Selectable<ExpensesTable>;

/**
 * Tables whose rows are keyed by the remote system's identifier
 */
export type CanonicalTable =
  | "properties"
  | "units"
  | "vendors"
  | "leases"
  | "work_orders"
  | "expenses";
