import {
  bins, type Bin, type InsertBin,
  shipmentLogs, type ShipmentLog,
} from "@shared/schema";
import type {
  BinRecord,
  BinSource,
  EventSink,
  ShipmentEvent,
  ShipmentStatus,
  UsageSink,
} from "@utils";
import { asc, eq } from "drizzle-orm";
import type { Database } from "./db";

export interface IStorage extends BinSource, UsageSink, EventSink {
  // Bin methods
  resetBins(records: InsertBin[]): Promise<void>;

  // Shipment log methods
  getShipmentLogs(status?: ShipmentStatus): Promise<ShipmentLog[]>;
}

function toBinRecord(bin: Bin): BinRecord {
  return {
    bin_id: bin.bin_id,
    capacity: bin.capacity,
    current_usage: bin.current_usage,
    location_code: bin.location_code,
  };
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  // ============================================================================
  // BIN METHODS
  // ============================================================================

  async loadBins(): Promise<BinRecord[]> {
    const rows = await this.db.select().from(bins);
    return rows.map(toBinRecord);
  }

  async updateBinUsage(binId: number, currentUsage: number): Promise<void> {
    await this.db
      .update(bins)
      .set({ current_usage: currentUsage })
      .where(eq(bins.bin_id, binId));
  }

  async resetBins(records: InsertBin[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(bins);
      if (records.length > 0) {
        await tx.insert(bins).values(records);
      }
    });
  }

  // ============================================================================
  // SHIPMENT LOG METHODS
  // ============================================================================

  async logShipmentEvent(event: ShipmentEvent): Promise<void> {
    await this.db.insert(shipmentLogs).values({
      tracking_id: event.tracking_id,
      bin_id: event.bin_id,
      status: event.status,
      timestamp: event.timestamp,
    });
  }

  async getShipmentLogs(status?: ShipmentStatus): Promise<ShipmentLog[]> {
    return this.db
      .select()
      .from(shipmentLogs)
      .where(status ? eq(shipmentLogs.status, status) : undefined)
      .orderBy(asc(shipmentLogs.id));
  }
}

/**
 * Process-local storage. Used when no DATABASE_URL is configured and by the
 * API tests.
 */
export class MemStorage implements IStorage {
  private binsById = new Map<number, Bin>();
  private logs: ShipmentLog[] = [];
  private nextLogId = 1;

  async loadBins(): Promise<BinRecord[]> {
    return Array.from(this.binsById.values()).map(toBinRecord);
  }

  async updateBinUsage(binId: number, currentUsage: number): Promise<void> {
    const bin = this.binsById.get(binId);
    if (!bin) {
      throw new Error(`Bin ${binId} not found`);
    }
    this.binsById.set(binId, { ...bin, current_usage: currentUsage });
  }

  async resetBins(records: InsertBin[]): Promise<void> {
    this.binsById = new Map(
      records.map((record): [number, Bin] => [
        record.bin_id,
        {
          bin_id: record.bin_id,
          capacity: record.capacity,
          current_usage: record.current_usage ?? 0,
          location_code: record.location_code,
        },
      ])
    );
  }

  async logShipmentEvent(event: ShipmentEvent): Promise<void> {
    this.logs.push({
      id: this.nextLogId++,
      tracking_id: event.tracking_id,
      bin_id: event.bin_id,
      status: event.status,
      timestamp: event.timestamp,
    });
  }

  async getShipmentLogs(status?: ShipmentStatus): Promise<ShipmentLog[]> {
    return this.logs
      .filter((log) => !status || log.status === status)
      .map((log) => ({ ...log }));
  }
}
