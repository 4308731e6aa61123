import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { callOutcomeEnum } from "@shared/schema";
import { NarrativeError, describeError } from "./src/narrative/errors";
import type { NarrativeBatchService } from "./src/narrative/narrativeBatchService";
import { modelTierEnum } from "./src/narrative/types";

// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const batchRequestSchema = z.object({
  inputs: z
    .array(
      z.object({
        domainKey: z.string().min(1),
        inputText: z.string().min(1),
        taskId: z.string().min(1).optional(),
        tier: z.enum(modelTierEnum).optional(),
        dependsOn: z.array(z.string().min(1)).optional(),
      }),
    )
    .min(1, "At least one domain input is required"),
});

const attemptQuerySchema = z.object({
  taskId: z.string().optional(),
  modelId: z.string().optional(),
  domainKey: z.string().optional(),
  outcome: z.enum(callOutcomeEnum).optional(),
});

function zodDetails(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join(".") || "(body)"}: ${e.message}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════════════════════

export function createNarrativeRouter(service: NarrativeBatchService): express.Router {
  const router = express.Router();

  router.get("/health", async (_req, res, next) => {
    try {
      const health = await service.health();
      res.status(health.reachable ? 200 : 503).json({
        status: health.reachable ? "healthy" : "degraded",
        timestamp: new Date().toISOString(),
        backend: health,
      });
    } catch (error) {
      next(error);
    }
  });

  router.post("/batches", async (req, res, next) => {
    const parsed = batchRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid request", details: zodDetails(parsed.error) });
    }

    try {
      const { report } = await service.runBatch(parsed.data.inputs);
      res.status(201).json(report);
    } catch (error) {
      next(error);
    }
  });

  router.get("/batches", (_req, res) => {
    res.json(service.listRuns());
  });

  router.get("/batches/:batchId", (req, res) => {
    const run = service.getRun(req.params.batchId);
    if (!run) return res.status(404).json({ error: "Batch not found" });
    res.json(run.report);
  });

  router.get("/batches/:batchId/usage", (req, res) => {
    const run = service.getRun(req.params.batchId);
    if (!run) return res.status(404).json({ error: "Batch not found" });
    res.json(run.usageLog.summary());
  });

  router.get("/batches/:batchId/attempts", (req, res) => {
    const run = service.getRun(req.params.batchId);
    if (!run) return res.status(404).json({ error: "Batch not found" });

    const filter = attemptQuerySchema.safeParse(req.query);
    if (!filter.success) {
      return res.status(400).json({ error: "Invalid query", details: zodDetails(filter.error) });
    }
    res.json(run.usageLog.listAttempts(filter.data));
  });

  router.get("/batches/:batchId/transitions", (req, res) => {
    const run = service.getRun(req.params.batchId);
    if (!run) return res.status(404).json({ error: "Batch not found" });
    const taskId = typeof req.query.taskId === "string" ? req.query.taskId : undefined;
    res.json(run.usageLog.listTransitions(taskId));
  });

  return router;
}

/** NarrativeErrors carry their own status; anything else is a 500. */
export function narrativeErrorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof NarrativeError) {
    console.error(`[API] ${err.name}: ${err.message}`);
    res.status(err.httpStatus).json({ error: err.message, code: err.code });
    return;
  }
  console.error("[API] Unhandled error:", err);
  res.status(500).json({ error: describeError(err) || "Internal Server Error" });
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  service: NarrativeBatchService,
): Promise<Server> {
  app.use("/api/narratives", createNarrativeRouter(service));
  app.use(narrativeErrorHandler);
  return httpServer;
}
