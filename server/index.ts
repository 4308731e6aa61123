import "dotenv/config";
import express from "express";
import { createServer } from "http";
import path from "path";
import { registerRoutes } from "./routes";
import { closePool } from "./db";
import {
  JsonTemplateStore,
  MemoryOutputSlot,
  NarrativeBatchService,
  SummaryBlockOutputSlot,
  describeError,
  loadNarrativeConfig,
  type OutputSlot,
} from "./src/narrative";

process.on("unhandledRejection", (reason) => {
  console.error("[Process] Unhandled Rejection:", reason);
});

process.on("uncaughtException", (error) => {
  console.error("[Process] Uncaught Exception:", error);
  process.exit(1);
});

async function gracefulShutdown(signal: string) {
  console.log(`[Process] Received ${signal}, shutting down gracefully...`);
  try {
    await closePool();
    process.exit(0);
  } catch (err) {
    console.error("[Process] Error during shutdown:", err);
    process.exit(1);
  }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

const app = express();
const httpServer = createServer(app);

app.use(express.json({ limit: "10mb" }));

app.use((req, res, next) => {
  const start = Date.now();
  res.on("finish", () => {
    if (req.path.startsWith("/api")) {
      log(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
    }
  });
  next();
});

function outputSlotFromEnv(): OutputSlot {
  const outputDir = process.env.NARRATIVE_OUTPUT_DIR?.trim();
  if (!outputDir) return new MemoryOutputSlot();
  return new SummaryBlockOutputSlot((domainKey) => path.join(outputDir, `${domainKey}.md`));
}

(async () => {
  try {
    const config = loadNarrativeConfig();
    const templatesFile = process.env.NARRATIVE_TEMPLATES_FILE || path.resolve("config", "prompt-templates.json");
    const templateStore = await JsonTemplateStore.fromFile(templatesFile);
    log(`Loaded ${templateStore.keywords().length} prompt template(s) from ${templatesFile}`, "startup");

    const service = new NarrativeBatchService(config, {
      templateStore,
      outputSlot: outputSlotFromEnv(),
    });
    await registerRoutes(httpServer, app, service);

    const port = parseInt(process.env.PORT || "5000", 10);
    httpServer.listen(port, "0.0.0.0", () => {
      log(`serving on port ${port} (${config.backendKind} backend, ${config.workerCount} workers)`);
    });
  } catch (error) {
    console.error("Failed to start server:", describeError(error));
    if (error instanceof Error && error.stack) {
      console.error("Error stack:", error.stack);
    }
    process.exit(1);
  }
})();
