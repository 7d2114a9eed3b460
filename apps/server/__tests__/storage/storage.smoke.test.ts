import { MemStorage } from "../../storage";
import { DEFAULT_BINS, seedBins } from "../../seed";

describe("Server Storage Module", () => {
  it("should seed the default bins smallest first", async () => {
    const storage = new MemStorage();
    const count = await seedBins(storage);

    expect(count).toBe(DEFAULT_BINS.length);
    const bins = await storage.loadBins();
    expect(bins.map((b) => b.capacity)).toEqual([50, 100, 150, 200, 500]);
  });

  it("should replace bins on reseed", async () => {
    const storage = new MemStorage();
    await seedBins(storage);
    await seedBins(storage, [{ bin_id: 9, capacity: 10, current_usage: 2, location_code: "Z9" }]);

    expect(await storage.loadBins()).toEqual([
      { bin_id: 9, capacity: 10, current_usage: 2, location_code: "Z9" },
    ]);
  });

  it("should persist usage updates", async () => {
    const storage = new MemStorage();
    await seedBins(storage);
    await storage.updateBinUsage(2, 30);

    const bins = await storage.loadBins();
    expect(bins.find((b) => b.bin_id === 2)?.current_usage).toBe(30);
  });

  it("should reject usage updates for unknown bins", async () => {
    const storage = new MemStorage();
    await expect(storage.updateBinUsage(42, 1)).rejects.toThrow("Bin 42 not found");
  });

  it("should append shipment events with increasing ids", async () => {
    const storage = new MemStorage();
    const timestamp = new Date("2024-03-01T12:00:00.000Z");
    await storage.logShipmentEvent({ tracking_id: "A", bin_id: 1, status: "STORED", timestamp });
    await storage.logShipmentEvent({ tracking_id: "A", bin_id: null, status: "LOADED", timestamp });

    expect(await storage.getShipmentLogs()).toEqual([
      { id: 1, tracking_id: "A", bin_id: 1, status: "STORED", timestamp },
      { id: 2, tracking_id: "A", bin_id: null, status: "LOADED", timestamp },
    ]);
  });

  it("should filter shipment events by status", async () => {
    const storage = new MemStorage();
    const timestamp = new Date("2024-03-01T12:00:00.000Z");
    await storage.logShipmentEvent({ tracking_id: "A", bin_id: 1, status: "STORED", timestamp });
    await storage.logShipmentEvent({ tracking_id: "A", bin_id: null, status: "LOADED", timestamp });
    await storage.logShipmentEvent({ tracking_id: "A", bin_id: null, status: "REMOVED", timestamp });

    expect(await storage.getShipmentLogs("LOADED")).toEqual([
      { id: 2, tracking_id: "A", bin_id: null, status: "LOADED", timestamp },
    ]);
  });
});
