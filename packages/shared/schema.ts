import { pgTable, text, serial, integer, timestamp } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Storage bins - capacity is fixed, current_usage grows with each stored package
export const bins = pgTable("bins", {
  bin_id: integer("bin_id").primaryKey(),
  capacity: integer("capacity").notNull(),
  current_usage: integer("current_usage").notNull().default(0),
  location_code: text("location_code").notNull(),
});

export const insertBinSchema = createInsertSchema(bins);

export type InsertBin = z.infer<typeof insertBinSchema>;
export type Bin = typeof bins.$inferSelect;

// Shipment status enum
export const shipmentStatusEnum = ['STORED', 'LOADED', 'REMOVED'] as const;

// Shipment logs - append-only record of every store / load / undo
export const shipmentLogs = pgTable("shipment_logs", {
  id: serial("id").primaryKey(),
  tracking_id: text("tracking_id").notNull(),
  bin_id: integer("bin_id"), // null for truck events
  status: text("status", { enum: shipmentStatusEnum }).notNull(),
  timestamp: timestamp("timestamp").defaultNow().notNull(),
});

export type ShipmentLog = typeof shipmentLogs.$inferSelect;

// ============================================================================
// API REQUEST SCHEMAS
// ============================================================================

export const packageSchema = z.object({
  tracking_id: z.string().min(1),
  size: z.number().int().positive(),
  destination: z.string().default(""),
});

export const conveyorRequestSchema = z.object({
  packages: z.array(packageSchema).min(1),
});

export const truckOptimizeSchema = z.object({
  packages: z.array(packageSchema),
  max_capacity: z.number().int().nonnegative(),
  max_nodes: z.number().int().positive().optional(),
});

export const truckLoadSchema = z.object({
  packages: z.array(packageSchema).min(1),
  max_capacity: z.number().int().nonnegative().optional(),
});

export const shipmentLogQuerySchema = z.object({
  status: z.enum(shipmentStatusEnum).optional(),
});
