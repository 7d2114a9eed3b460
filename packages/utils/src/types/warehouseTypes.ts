/**
 * Warehouse Planner - Core Types
 *
 * Data models shared by the bin allocator, conveyor, truck optimizer and the
 * truck load stack.
 */

// ============================================================================
// PACKAGES
// ============================================================================

export interface Package {
  readonly tracking_id: string;
  readonly size: number;
  readonly destination: string;
}

// ============================================================================
// STORAGE
// ============================================================================

export interface BinRecord {
  bin_id: number;
  capacity: number;
  current_usage: number;
  location_code: string;
}

export type OccupyResult =
  | { ok: true; used_space: number }
  | { ok: false; error: WarehouseError };

/**
 * Anything that can hold packages. StorageBin is the only variant today.
 */
export interface StorageUnit {
  occupySpace(amount: number): OccupyResult;
  availableSpace(): number;
}

// ============================================================================
// SHIPMENT EVENTS
// ============================================================================

export type ShipmentStatus = 'STORED' | 'LOADED' | 'REMOVED';

export interface ShipmentEvent {
  tracking_id: string;
  bin_id: number | null;
  status: ShipmentStatus;
  timestamp: Date;
}

// ============================================================================
// ERRORS
// ============================================================================

export type WarehouseErrorCode =
  | 'NO_SUITABLE_BIN'
  | 'CAPACITY_EXCEEDED'
  | 'EMPTY_STACK'
  | 'INVALID_BIN'
  | 'EVENT_SINK_FAILURE'
  | 'USAGE_SINK_FAILURE';

export interface WarehouseError {
  code: WarehouseErrorCode;
  tracking_id?: string;
  bin_id?: number;
  message: string;
  suggestion: string;
  severity: 'error' | 'warning';
}

// ============================================================================
// COLLABORATORS
// ============================================================================

export interface BinSource {
  loadBins(): Promise<BinRecord[]>;
}

export interface UsageSink {
  updateBinUsage(binId: number, currentUsage: number): Promise<void>;
}

export interface EventSink {
  logShipmentEvent(event: ShipmentEvent): Promise<void>;
}

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

// ============================================================================
// RESULTS
// ============================================================================

export interface StoredPackage {
  tracking_id: string;
  size: number;
  bin_id: number;
  location_code: string;
  used_space: number;
}

export interface ConveyorReport {
  processed: number;
  stored: StoredPackage[];
  failed: WarehouseError[];
  warnings: WarehouseError[];
}

export interface TruckLoadPlan {
  packages: Package[];
  total_size: number;
  max_capacity: number;
  nodes_explored: number;
  truncated: boolean;
}

export interface TruckLoadOptions {
  /** Stop exploring after this many search nodes and keep the best found. */
  maxNodes?: number;
}

export interface RegistryLoadSummary {
  loaded: number;
  rejected: WarehouseError[];
  total_capacity: number;
  total_used: number;
}
