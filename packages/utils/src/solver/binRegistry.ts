/**
 * Warehouse Planner - Bin Registry
 *
 * Holds the storage bins in (capacity, bin_id) order and answers best-fit
 * queries for incoming packages.
 */

import {
  BinRecord,
  OccupyResult,
  Package,
  StorageUnit,
  WarehouseError
} from '../types';

// ============================================================================
// STORAGE BIN
// ============================================================================

export class StorageBin implements StorageUnit {
  readonly bin_id: number;
  readonly capacity: number;
  readonly location_code: string;
  private used: number;

  constructor(record: BinRecord) {
    this.bin_id = record.bin_id;
    this.capacity = record.capacity;
    this.location_code = record.location_code;
    this.used = record.current_usage;
  }

  get used_space(): number {
    return this.used;
  }

  occupySpace(amount: number): OccupyResult {
    if (this.used + amount > this.capacity) {
      return {
        ok: false,
        error: {
          code: 'CAPACITY_EXCEEDED',
          bin_id: this.bin_id,
          message: `Bin ${this.bin_id} cannot take ${amount} more (used ${this.used} of ${this.capacity})`,
          suggestion: 'Reload inventory and retry allocation',
          severity: 'error'
        }
      };
    }

    this.used += amount;
    return { ok: true, used_space: this.used };
  }

  availableSpace(): number {
    return this.capacity - this.used;
  }

  snapshot(): BinRecord {
    return {
      bin_id: this.bin_id,
      capacity: this.capacity,
      current_usage: this.used,
      location_code: this.location_code
    };
  }
}

export function compareBins(a: StorageBin, b: StorageBin): number {
  if (a.capacity !== b.capacity) return a.capacity - b.capacity;
  return a.bin_id - b.bin_id;
}

// ============================================================================
// RECORD VALIDATION
// ============================================================================

export function validateBinRecord(record: BinRecord): WarehouseError[] {
  const errors: WarehouseError[] = [];

  if (!Number.isInteger(record.capacity) || record.capacity <= 0) {
    errors.push({
      code: 'INVALID_BIN',
      bin_id: record.bin_id,
      message: `Capacity ${record.capacity} must be a positive integer`,
      suggestion: 'Fix the bin record in storage',
      severity: 'error'
    });
  }

  if (
    !Number.isInteger(record.current_usage) ||
    record.current_usage < 0 ||
    record.current_usage > record.capacity
  ) {
    errors.push({
      code: 'INVALID_BIN',
      bin_id: record.bin_id,
      message: `Usage ${record.current_usage} is outside 0..${record.capacity}`,
      suggestion: 'Fix the bin record in storage',
      severity: 'error'
    });
  }

  return errors;
}

// ============================================================================
// REGISTRY
// ============================================================================

export interface RegistryLoadResult {
  loaded: number;
  rejected: WarehouseError[];
}

export class BinRegistry {
  private sorted: StorageBin[] = [];
  private byId = new Map<number, StorageBin>();

  /**
   * Replaces the whole bin set. This is the only place the order is
   * computed: capacity never changes after load, so usage updates keep the
   * order valid.
   */
  load(records: BinRecord[]): RegistryLoadResult {
    const rejected: WarehouseError[] = [];
    const bins: StorageBin[] = [];
    const seen = new Set<number>();

    for (const record of records) {
      const errors = validateBinRecord(record);
      if (seen.has(record.bin_id)) {
        errors.push({
          code: 'INVALID_BIN',
          bin_id: record.bin_id,
          message: `Duplicate bin id ${record.bin_id}`,
          suggestion: 'Bin ids must be unique',
          severity: 'error'
        });
      }
      if (errors.length > 0) {
        rejected.push(...errors);
        continue;
      }
      seen.add(record.bin_id);
      bins.push(new StorageBin(record));
    }

    bins.sort(compareBins);
    this.sorted = bins;
    this.byId = new Map(bins.map((b): [number, StorageBin] => [b.bin_id, b]));

    return { loaded: bins.length, rejected };
  }

  /**
   * Binary narrowing over capacity order. A midpoint that fits both
   * capacity and free space becomes the best so far and the search moves
   * left; anything else moves right.
   */
  findBestFit(pkg: Package): StorageBin | null {
    let low = 0;
    let high = this.sorted.length - 1;
    let bestFit: StorageBin | null = null;

    while (low <= high) {
      const mid = Math.floor((low + high) / 2);
      const current = this.sorted[mid];

      if (current.capacity >= pkg.size && current.availableSpace() >= pkg.size) {
        bestFit = current;
        high = mid - 1;
      } else {
        low = mid + 1;
      }
    }

    return bestFit;
  }

  occupy(bin: StorageBin, amount: number): OccupyResult {
    return bin.occupySpace(amount);
  }

  get(binId: number): StorageBin | undefined {
    return this.byId.get(binId);
  }

  bins(): readonly StorageBin[] {
    return this.sorted;
  }

  get size(): number {
    return this.sorted.length;
  }

  totalCapacity(): number {
    return this.sorted.reduce((sum, b) => sum + b.capacity, 0);
  }

  totalUsed(): number {
    return this.sorted.reduce((sum, b) => sum + b.used_space, 0);
  }
}
