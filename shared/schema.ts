import { sql } from "drizzle-orm";
import { pgTable, text, varchar, integer, timestamp, boolean, serial, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============== NARRATIVE GENERATION ATTEMPTS ==============
// One row per backend call. Rows are only ever inserted.
export const callOutcomeEnum = ["success", "error", "timeout"] as const;
export type CallOutcome = typeof callOutcomeEnum[number];

export const generationAttempts = pgTable("generation_attempts", {
  id: serial("id").primaryKey(),
  recordId: varchar("record_id").notNull().unique(),
  batchId: varchar("batch_id").notNull(),
  taskId: text("task_id").notNull(),
  domainKey: text("domain_key").notNull(),
  tier: text("tier").notNull(), // domain, synthesis, large
  modelId: text("model_id").notNull(),
  attemptNumber: integer("attempt_number").notNull(),
  outcome: text("outcome").notNull(),
  tokensIn: integer("tokens_in").notNull().default(0),
  tokensOut: integer("tokens_out").notNull().default(0),
  totalTokens: integer("total_tokens").notNull().default(0),
  durationMs: integer("duration_ms").notNull(),
  qualityScore: integer("quality_score"),
  passed: boolean("passed"),
  errorMessage: text("error_message"),
  startedAt: timestamp("started_at").notNull(),
  endedAt: timestamp("ended_at").notNull(),
  createdAt: timestamp("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  batchIdx: index("generation_attempts_batch_idx").on(table.batchId),
  modelIdx: index("generation_attempts_model_idx").on(table.modelId),
}));

export const insertGenerationAttemptSchema = createInsertSchema(generationAttempts, {
  outcome: z.enum(callOutcomeEnum),
}).omit({
  id: true,
  createdAt: true,
});

export type GenerationAttemptRow = typeof generationAttempts.$inferSelect;
export type InsertGenerationAttempt = z.infer<typeof insertGenerationAttemptSchema>;
