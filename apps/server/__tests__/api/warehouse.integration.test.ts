import request from "supertest";
import { createTestApp } from "../testApp";
import type { Express } from "express";

const inbound = [
  { tracking_id: "PKG_SMALL", size: 45, destination: "NY" },
  { tracking_id: "PKG_HUGE", size: 120, destination: "CA" },
  { tracking_id: "PKG_MID", size: 30, destination: "TX" },
];

const candidates = [
  { tracking_id: "BOX_A", size: 50, destination: "NY" },
  { tracking_id: "BOX_B", size: 60, destination: "CA" },
  { tracking_id: "BOX_C", size: 40, destination: "TX" },
];

describe("Warehouse API Integration Tests", () => {
  let app: Express;

  beforeEach(async () => {
    ({ app } = await createTestApp());
  });

  describe("Health", () => {
    it("GET /api/health should respond ok", async () => {
      const response = await request(app).get("/api/health").expect(200);
      expect(response.body).toEqual({ status: "ok" });
    });
  });

  describe("Bins", () => {
    it("GET /api/bins should list seeded bins smallest first", async () => {
      const response = await request(app)
        .get("/api/bins")
        .expect("Content-Type", /json/)
        .expect(200);

      expect(response.body.bins.map((b: { bin_id: number }) => b.bin_id)).toEqual([1, 2, 3, 4, 5]);
      expect(response.body.bins[0]).toEqual({
        bin_id: 1,
        capacity: 50,
        current_usage: 0,
        location_code: "A1",
        available_space: 50,
      });
    });

    it("GET /api/bins/:binId should return 404 for unknown bins", async () => {
      const response = await request(app).get("/api/bins/999").expect(404);
      expect(response.body.error).toBe("Bin not found");
    });
  });

  describe("Conveyor", () => {
    it("POST /api/conveyor should reject invalid packages", async () => {
      const response = await request(app)
        .post("/api/conveyor")
        .send({ packages: [{ tracking_id: "BAD", size: -1 }] })
        .expect(400);

      expect(response.body.error).toBe("Invalid input");
    });

    it("POST /api/conveyor then run should store by best fit", async () => {
      const queued = await request(app)
        .post("/api/conveyor")
        .send({ packages: inbound })
        .expect(202);
      expect(queued.body.queued).toBe(3);

      const run = await request(app).post("/api/conveyor/run").expect(200);
      expect(run.body.processed).toBe(3);
      expect(run.body.stored.map((s: { bin_id: number }) => s.bin_id)).toEqual([1, 3, 2]);
      expect(run.body.failed).toEqual([]);

      const bin = await request(app).get("/api/bins/2").expect(200);
      expect(bin.body.current_usage).toBe(30);
      expect(bin.body.available_space).toBe(70);

      const logs = await request(app).get("/api/logs").expect(200);
      expect(logs.body.logs.map((l: { tracking_id: string; status: string }) => [l.tracking_id, l.status])).toEqual([
        ["PKG_SMALL", "STORED"],
        ["PKG_HUGE", "STORED"],
        ["PKG_MID", "STORED"],
      ]);
    });

    it("POST /api/conveyor/run should report packages that fit nowhere", async () => {
      await request(app)
        .post("/api/conveyor")
        .send({ packages: [{ tracking_id: "PALLET", size: 900 }] })
        .expect(202);

      const run = await request(app).post("/api/conveyor/run").expect(200);
      expect(run.body.stored).toEqual([]);
      expect(run.body.failed[0].code).toBe("NO_SUITABLE_BIN");
    });

    it("POST /api/bins/reload should pick up persisted usage", async () => {
      await request(app).post("/api/conveyor").send({ packages: inbound }).expect(202);
      await request(app).post("/api/conveyor/run").expect(200);

      const reload = await request(app).post("/api/bins/reload").expect(200);
      expect(reload.body.loaded).toBe(5);
      expect(reload.body.total_used).toBe(195);
    });
  });

  describe("Truck", () => {
    it("POST /api/truck/optimize should choose the fullest load", async () => {
      const response = await request(app)
        .post("/api/truck/optimize")
        .send({ packages: candidates, max_capacity: 100 })
        .expect(200);

      expect(response.body.packages.map((p: { tracking_id: string }) => p.tracking_id)).toEqual(["BOX_B", "BOX_C"]);
      expect(response.body.total_size).toBe(100);
      expect(response.body.truncated).toBe(false);
    });

    it("POST /api/truck/optimize should honour max_nodes", async () => {
      const response = await request(app)
        .post("/api/truck/optimize")
        .send({ packages: candidates, max_capacity: 100, max_nodes: 1 })
        .expect(200);

      expect(response.body.truncated).toBe(true);
      expect(response.body.packages).toEqual([]);
    });

    it("POST /api/truck/optimize should require a capacity", async () => {
      await request(app)
        .post("/api/truck/optimize")
        .send({ packages: candidates })
        .expect(400);
    });

    it("POST /api/truck/load with capacity should load the optimized set", async () => {
      const load = await request(app)
        .post("/api/truck/load")
        .send({ packages: candidates, max_capacity: 100 })
        .expect(201);
      expect(load.body.loaded.map((p: { tracking_id: string }) => p.tracking_id)).toEqual(["BOX_B", "BOX_C"]);

      const truck = await request(app).get("/api/truck").expect(200);
      expect(truck.body.total_size).toBe(100);
    });

    it("POST /api/truck/undo should remove loads newest first", async () => {
      await request(app).post("/api/truck/load").send({ packages: candidates }).expect(201);

      const first = await request(app).post("/api/truck/undo").expect(200);
      expect(first.body.removed.tracking_id).toBe("BOX_C");

      const second = await request(app).post("/api/truck/undo").expect(200);
      expect(second.body.removed.tracking_id).toBe("BOX_B");

      const truck = await request(app).get("/api/truck").expect(200);
      expect(truck.body.packages.map((p: { tracking_id: string }) => p.tracking_id)).toEqual(["BOX_A"]);
    });

    it("POST /api/truck/undo should return 409 on an empty truck", async () => {
      const response = await request(app).post("/api/truck/undo").expect(409);
      expect(response.body).toEqual({ error: "Truck is empty, nothing to undo", code: "EMPTY_STACK" });
    });

    it("GET /api/logs should record loads and removals", async () => {
      await request(app)
        .post("/api/truck/load")
        .send({ packages: [candidates[0]] })
        .expect(201);
      await request(app).post("/api/truck/undo").expect(200);

      const logs = await request(app).get("/api/logs").expect(200);
      expect(logs.body.logs.map((l: { status: string; bin_id: number | null }) => [l.status, l.bin_id])).toEqual([
        ["LOADED", null],
        ["REMOVED", null],
      ]);
    });

    it("GET /api/logs should filter by status", async () => {
      await request(app).post("/api/truck/load").send({ packages: candidates }).expect(201);
      await request(app).post("/api/truck/undo").expect(200);

      const logs = await request(app).get("/api/logs?status=LOADED").expect(200);
      expect(logs.body.logs.map((l: { tracking_id: string; status: string }) => [l.tracking_id, l.status])).toEqual([
        ["BOX_A", "LOADED"],
        ["BOX_B", "LOADED"],
        ["BOX_C", "LOADED"],
      ]);
    });

    it("GET /api/logs should reject an unknown status", async () => {
      const response = await request(app).get("/api/logs?status=SHIPPED").expect(400);
      expect(response.body.error).toBe("Invalid input");
    });
  });
});
