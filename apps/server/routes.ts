import type { Express } from "express";
import { createServer, type Server } from "http";
import {
  conveyorRequestSchema,
  shipmentLogQuerySchema,
  truckLoadSchema,
  truckOptimizeSchema,
} from "@shared/schema";
import type { WarehouseController, WarehouseError } from "@utils";
import type { IStorage } from "./storage";

export interface RouteDeps {
  controller: WarehouseController;
  storage: IStorage;
}

const EMPTY_TRUCK: WarehouseError = {
  code: "EMPTY_STACK",
  message: "Truck is empty, nothing to undo",
  suggestion: "Load a package before undoing",
  severity: "warning",
};

export async function registerRoutes(app: Express, deps: RouteDeps): Promise<Server> {
  const { controller, storage } = deps;

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // ============================================================================
  // BIN ROUTES
  // ============================================================================

  app.get("/api/bins", (_req, res) => {
    const bins = controller.getBins().map((bin) => ({
      ...bin.snapshot(),
      available_space: bin.availableSpace(),
    }));
    res.json({ bins });
  });

  app.get("/api/bins/:binId", (req, res) => {
    const binId = Number(req.params.binId);
    const bin = Number.isInteger(binId) ? controller.registry.get(binId) : undefined;
    if (!bin) {
      return res.status(404).json({ error: "Bin not found" });
    }
    res.json({ ...bin.snapshot(), available_space: bin.availableSpace() });
  });

  app.post("/api/bins/reload", async (_req, res) => {
    try {
      const summary = await controller.loadInventory();
      res.json(summary);
    } catch (error) {
      console.error("Inventory reload error:", error);
      res.status(500).json({ error: "Failed to reload inventory" });
    }
  });

  // ============================================================================
  // CONVEYOR ROUTES
  // ============================================================================

  app.post("/api/conveyor", (req, res) => {
    const parsed = conveyorRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
    }

    const queued = controller.addManyToConveyor(parsed.data.packages);
    res.status(202).json({ queued });
  });

  app.get("/api/conveyor", (_req, res) => {
    res.json({ queued: controller.getConveyorSize() });
  });

  app.post("/api/conveyor/run", async (_req, res) => {
    try {
      const report = await controller.runConveyor();
      res.json(report);
    } catch (error) {
      console.error("Conveyor run error:", error);
      res.status(500).json({ error: "Failed to run conveyor" });
    }
  });

  // ============================================================================
  // TRUCK ROUTES
  // ============================================================================

  app.get("/api/truck", (_req, res) => {
    res.json({
      packages: controller.getTruckContents(),
      total_size: controller.getTruckLoadSize(),
    });
  });

  app.post("/api/truck/optimize", (req, res) => {
    const parsed = truckOptimizeSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
    }

    const { packages, max_capacity, max_nodes } = parsed.data;
    const plan = max_nodes === undefined
      ? controller.optimizeTruckSpace(packages, max_capacity)
      : controller.optimizeTruckSpace(packages, max_capacity, { maxNodes: max_nodes });
    res.json(plan);
  });

  app.post("/api/truck/load", async (req, res) => {
    const parsed = truckLoadSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
    }

    try {
      const { packages, max_capacity } = parsed.data;
      if (max_capacity !== undefined) {
        const plan = await controller.loadOptimizedTruck(packages, max_capacity);
        return res.status(201).json({ loaded: plan.packages, plan });
      }

      for (const pkg of packages) {
        await controller.loadTruck(pkg);
      }
      res.status(201).json({ loaded: packages });
    } catch (error) {
      console.error("Truck load error:", error);
      res.status(500).json({ error: "Failed to load truck" });
    }
  });

  app.post("/api/truck/undo", async (_req, res) => {
    try {
      const removed = await controller.undoLastLoad();
      if (!removed) {
        return res.status(409).json({ error: EMPTY_TRUCK.message, code: EMPTY_TRUCK.code });
      }
      res.json({ removed });
    } catch (error) {
      console.error("Truck undo error:", error);
      res.status(500).json({ error: "Failed to undo truck load" });
    }
  });

  // ============================================================================
  // SHIPMENT LOG ROUTES
  // ============================================================================

  app.get("/api/logs", async (req, res) => {
    const parsed = shipmentLogQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
    }

    try {
      const logs = await storage.getShipmentLogs(parsed.data.status);
      res.json({ logs });
    } catch (error) {
      console.error("Shipment log error:", error);
      res.status(500).json({ error: "Failed to fetch shipment logs" });
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
