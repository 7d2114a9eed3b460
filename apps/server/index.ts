import express, { type Request, Response, NextFunction } from "express";
import cors from "cors";
import { WarehouseController } from "@utils";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { registerRoutes } from "./routes";
import { seedBins } from "./seed";
import { DatabaseStorage, MemStorage, type IStorage } from "./storage";

const app = express();
const config = loadConfig();

app.use(cors());
app.use(express.json());
app.use(express.urlencoded({ extended: false }));

function log(message: string) {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  console.log(`${formattedTime} [server] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;

      if (logLine.length > 80) {
        logLine = logLine.slice(0, 79) + "…";
      }

      log(logLine);
    }
  });

  next();
});

function createStorage(): IStorage {
  if (config.DATABASE_URL) {
    const { db } = createDatabase(config.DATABASE_URL);
    log("Using PostgreSQL storage");
    return new DatabaseStorage(db);
  }
  log("DATABASE_URL not set, using in-memory storage");
  return new MemStorage();
}

async function main(): Promise<void> {
  const storage = createStorage();

  if (config.SEED_ON_START) {
    await seedBins(storage);
  }

  const controller = new WarehouseController({
    binSource: storage,
    usageSink: storage,
    eventSink: storage,
    truckLoadOptions: { maxNodes: config.TRUCK_MAX_NODES },
  });
  await controller.loadInventory();

  const server = await registerRoutes(app, { controller, storage });

  app.use((err: Error & { status?: number; statusCode?: number }, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status || err.statusCode || 500;
    const message = err.message || "Internal Server Error";

    console.error(`[server] ${message}`);
    res.status(status).json({ message });
  });

  server.listen(config.PORT, "0.0.0.0", () => {
    log(`API server running on port ${config.PORT}`);
  });
}

main().catch((error: unknown) => {
  console.error("[server] Failed to start:", error);
  process.exit(1);
});
