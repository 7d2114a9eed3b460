import type { InsertBin } from "@shared/schema";
import type { IStorage } from "./storage";

// Small to large, all empty
export const DEFAULT_BINS: InsertBin[] = [
  { bin_id: 1, capacity: 50, current_usage: 0, location_code: "A1" },
  { bin_id: 2, capacity: 100, current_usage: 0, location_code: "A2" },
  { bin_id: 3, capacity: 150, current_usage: 0, location_code: "B1" },
  { bin_id: 4, capacity: 200, current_usage: 0, location_code: "B2" },
  { bin_id: 5, capacity: 500, current_usage: 0, location_code: "C1" },
];

export async function seedBins(
  storage: IStorage,
  records: InsertBin[] = DEFAULT_BINS
): Promise<number> {
  await storage.resetBins(records);
  console.log(`[Storage] Seeded ${records.length} empty bins`);
  return records.length;
}
