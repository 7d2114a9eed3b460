/**
 * Warehouse Planner - Warehouse Controller
 *
 * Owns one bin registry, one conveyor and one truck stack, and talks to
 * storage only through the BinSource / UsageSink / EventSink collaborators.
 * Build one per warehouse and hand it to whoever needs it.
 */

import {
  BinSource,
  ConveyorReport,
  EventSink,
  Logger,
  Package,
  RegistryLoadSummary,
  ShipmentStatus,
  StoredPackage,
  TruckLoadOptions,
  TruckLoadPlan,
  UsageSink,
  WarehouseError
} from '../types';
import { BinRegistry, StorageBin } from './binRegistry';
import { ConveyorQueue } from './conveyorQueue';
import { optimizeTruckLoad } from './truckLoadOptimizer';
import { TruckLoadStack } from './truckLoadStack';

export interface WarehouseControllerDeps {
  binSource: BinSource;
  usageSink: UsageSink;
  eventSink: EventSink;
  logger?: Logger;
  now?: () => Date;
  truckLoadOptions?: TruckLoadOptions;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class WarehouseController {
  readonly registry = new BinRegistry();
  private readonly conveyor = new ConveyorQueue();
  private readonly truck = new TruckLoadStack();
  private readonly binSource: BinSource;
  private readonly usageSink: UsageSink;
  private readonly eventSink: EventSink;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly truckLoadOptions: TruckLoadOptions;

  constructor(deps: WarehouseControllerDeps) {
    this.binSource = deps.binSource;
    this.usageSink = deps.usageSink;
    this.eventSink = deps.eventSink;
    this.logger = deps.logger ?? console;
    this.now = deps.now ?? (() => new Date());
    this.truckLoadOptions = deps.truckLoadOptions ?? {};
  }

  // ============================================================================
  // INVENTORY
  // ============================================================================

  async loadInventory(): Promise<RegistryLoadSummary> {
    const records = await this.binSource.loadBins();
    const result = this.registry.load(records);

    for (const error of result.rejected) {
      this.logger.warn(`[Inventory] Skipped bin ${error.bin_id}: ${error.message}`);
    }
    this.logger.info(`[Inventory] Loaded ${result.loaded} bins`);

    return {
      loaded: result.loaded,
      rejected: result.rejected,
      total_capacity: this.registry.totalCapacity(),
      total_used: this.registry.totalUsed()
    };
  }

  getBins(): StorageBin[] {
    return [...this.registry.bins()];
  }

  // ============================================================================
  // CONVEYOR (INBOUND)
  // ============================================================================

  addToConveyor(pkg: Package): void {
    this.conveyor.enqueue(pkg);
  }

  addManyToConveyor(packages: Package[]): number {
    for (const pkg of packages) {
      this.conveyor.enqueue(pkg);
    }
    return this.conveyor.size;
  }

  getConveyorSize(): number {
    return this.conveyor.size;
  }

  /**
   * Drains the conveyor in arrival order. A package that cannot be stored
   * is reported and skipped; it never stops the rest of the batch.
   */
  async runConveyor(): Promise<ConveyorReport> {
    const report: ConveyorReport = { processed: 0, stored: [], failed: [], warnings: [] };
    this.logger.info(`[Conveyor] Processing ${this.conveyor.size} items...`);

    for (const pkg of this.conveyor.drain()) {
      report.processed++;

      const bin = this.registry.findBestFit(pkg);
      if (!bin) {
        report.failed.push({
          code: 'NO_SUITABLE_BIN',
          tracking_id: pkg.tracking_id,
          message: `No suitable bin for ${pkg.tracking_id} (size ${pkg.size})`,
          suggestion: 'Free bin space or add a larger bin',
          severity: 'error'
        });
        this.logger.warn(`[Conveyor] FAIL: No suitable bin for ${pkg.tracking_id} (Size ${pkg.size})`);
        continue;
      }

      const occupied = this.registry.occupy(bin, pkg.size);
      if (!occupied.ok) {
        report.failed.push({ ...occupied.error, tracking_id: pkg.tracking_id });
        this.logger.error(`[Conveyor] Error storing ${pkg.tracking_id}: ${occupied.error.message}`);
        continue;
      }

      const usageWarning = await this.persistUsage(bin);
      if (usageWarning) report.warnings.push({ ...usageWarning, tracking_id: pkg.tracking_id });

      const eventWarning = await this.recordEvent(pkg.tracking_id, bin.bin_id, 'STORED');
      if (eventWarning) report.warnings.push(eventWarning);

      const stored: StoredPackage = {
        tracking_id: pkg.tracking_id,
        size: pkg.size,
        bin_id: bin.bin_id,
        location_code: bin.location_code,
        used_space: occupied.used_space
      };
      report.stored.push(stored);
      this.logger.info(`[Conveyor] Stored ${pkg.tracking_id} (Size ${pkg.size}) in Bin ${bin.bin_id}`);
    }

    return report;
  }

  // ============================================================================
  // TRUCK (OUTBOUND)
  // ============================================================================

  optimizeTruckSpace(
    packages: readonly Package[],
    maxCapacity: number,
    options: TruckLoadOptions = this.truckLoadOptions
  ): TruckLoadPlan {
    const plan = optimizeTruckLoad(packages, maxCapacity, options);
    if (plan.truncated) {
      this.logger.warn(
        `[Truck] Search stopped after ${plan.nodes_explored} nodes; plan may not be optimal`
      );
    }
    return plan;
  }

  async loadTruck(pkg: Package): Promise<void> {
    this.truck.push(pkg);
    this.logger.info(`[Truck] Loaded ${pkg.tracking_id} onto truck.`);
    await this.recordEvent(pkg.tracking_id, null, 'LOADED');
  }

  async loadOptimizedTruck(
    packages: readonly Package[],
    maxCapacity: number,
    options?: TruckLoadOptions
  ): Promise<TruckLoadPlan> {
    const plan = this.optimizeTruckSpace(packages, maxCapacity, options);
    for (const pkg of plan.packages) {
      await this.loadTruck(pkg);
    }
    return plan;
  }

  async undoLastLoad(): Promise<Package | null> {
    const pkg = this.truck.pop();
    if (!pkg) {
      this.logger.warn('[Truck] Truck is empty, nothing to undo.');
      return null;
    }

    this.logger.info(`[Truck] Undo: Removed ${pkg.tracking_id} from truck.`);
    await this.recordEvent(pkg.tracking_id, null, 'REMOVED');
    return pkg;
  }

  getTruckContents(): Package[] {
    return this.truck.toArray();
  }

  getTruckLoadSize(): number {
    return this.truck.totalSize();
  }

  // ============================================================================
  // COLLABORATOR CALLS
  // ============================================================================

  private async persistUsage(bin: StorageBin): Promise<WarehouseError | null> {
    try {
      await this.usageSink.updateBinUsage(bin.bin_id, bin.used_space);
      return null;
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`[Storage] Usage update failed for bin ${bin.bin_id}: ${message}`);
      return {
        code: 'USAGE_SINK_FAILURE',
        bin_id: bin.bin_id,
        message: `Usage update failed: ${message}`,
        suggestion: 'Stored in memory only; reload inventory after storage recovers',
        severity: 'warning'
      };
    }
  }

  private async recordEvent(
    trackingId: string,
    binId: number | null,
    status: ShipmentStatus
  ): Promise<WarehouseError | null> {
    try {
      await this.eventSink.logShipmentEvent({
        tracking_id: trackingId,
        bin_id: binId,
        status,
        timestamp: this.now()
      });
      return null;
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`[Storage] Logging failed: ${message}`);
      return {
        code: 'EVENT_SINK_FAILURE',
        tracking_id: trackingId,
        message: `Logging ${status} failed: ${message}`,
        suggestion: 'The action itself succeeded; check the shipment log store',
        severity: 'warning'
      };
    }
  }
}
