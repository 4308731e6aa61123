/**
 * Narrative Batch Service
 *
 * Wires configuration, backend, registry, validator, cache and usage log into
 * one batch run, and keeps finished runs in memory for the HTTP layer.
 */

import { v4 as uuidv4 } from "uuid";
import { buildModelDescriptors, temperatureFor, type NarrativeConfig } from "./config";
import { createBackend, type BackendAdapter } from "./backends";
import { ConfigurationError, describeError } from "./errors";
import { GenerationOrchestrator } from "./generationOrchestrator";
import { ModelRegistry } from "./modelRegistry";
import { createNarrativeCache, type NarrativeCache } from "./narrativeCache";
import type { OutputSlot } from "./outputSlots";
import type { TemplateStore } from "./promptTemplates";
import { ClinicalQualityValidator, type QualityValidator } from "./qualityValidator";
import { TaskScheduler } from "./taskScheduler";
import type { BackendKind, BatchReport, GenerationTask, ModelTier } from "./types";
import { UsageLog, type UsageLogSink } from "./usageLog";
import { createUsageLogSink } from "./usageLogSinks";

export interface DomainNarrativeInput {
  domainKey: string;
  inputText: string;
  /** defaults to domainKey */
  taskId?: string;
  tier?: ModelTier;
  dependsOn?: string[];
}

export interface BatchServiceDependencies {
  templateStore: TemplateStore;
  backend?: BackendAdapter;
  cache?: NarrativeCache;
  outputSlot?: OutputSlot;
  validator?: QualityValidator;
  /** null disables telemetry flushing; undefined uses config.telemetrySink */
  sink?: UsageLogSink | null;
  now?: () => number;
}

export interface BatchRun {
  report: BatchReport;
  usageLog: UsageLog;
}

export interface BackendHealth {
  backendKind: BackendKind;
  reachable: boolean;
  models: string[];
  error?: string;
}

export class NarrativeBatchService {
  private readonly cache: NarrativeCache;
  private readonly validator: QualityValidator;
  private readonly runs = new Map<string, BatchRun>();
  private backendInstance: BackendAdapter | undefined;

  constructor(
    private readonly config: NarrativeConfig,
    private readonly deps: BatchServiceDependencies,
  ) {
    this.cache = deps.cache ?? createNarrativeCache(config.cacheLocation);
    this.validator = deps.validator ?? new ClinicalQualityValidator({
      threshold: config.validationThreshold,
      strict: config.validator.strict,
      minChars: config.validator.minChars,
      maxChars: config.validator.maxChars,
    });
    this.backendInstance = deps.backend;
  }

  private get backend(): BackendAdapter {
    this.backendInstance ??= createBackend(this.config);
    return this.backendInstance;
  }

  /** Resolve each input's template and tier settings into a task. */
  buildTasks(inputs: readonly DomainNarrativeInput[]): GenerationTask[] {
    return inputs.map((input) => {
      const template = this.deps.templateStore.templateFor(input.domainKey);
      if (!template) {
        throw new ConfigurationError(`No prompt template for domain '${input.domainKey}'`);
      }
      const tier = input.tier ?? "domain";
      return {
        taskId: input.taskId ?? input.domainKey,
        domainKey: input.domainKey,
        inputText: input.inputText,
        tier,
        templateId: template.id,
        temperature: temperatureFor(this.config, tier),
        maxOutputTokens: this.config.maxOutputTokens,
        dependsOn: input.dependsOn,
      };
    });
  }

  async runBatch(inputs: readonly DomainNarrativeInput[]): Promise<BatchRun> {
    const batchId = uuidv4();
    const tasks = this.buildTasks(inputs);
    const sink = this.deps.sink === undefined ? createUsageLogSink(this.config) : this.deps.sink ?? undefined;
    const usageLog = new UsageLog(batchId, sink);

    try {
      const registry = new ModelRegistry(buildModelDescriptors(this.config), this.backend);
      await registry.refreshAvailability();

      const orchestrator = new GenerationOrchestrator({
        registry,
        backend: this.backend,
        validator: this.validator,
        cache: this.cache,
        templates: this.deps.templateStore,
        usageLog,
        outputSlot: this.deps.outputSlot,
        settings: {
          maxRetries: this.config.maxRetries,
          callTimeoutMs: this.config.callTimeoutMs,
          taskTimeBudgetMs: this.config.taskTimeBudgetMs,
          exhaustionPolicy: this.config.exhaustionPolicy,
        },
        now: this.deps.now,
      });
      const scheduler = new TaskScheduler(this.config.workerCount, (task) => orchestrator.run(task), usageLog);

      const report = await scheduler.run(tasks, batchId);
      const run: BatchRun = { report, usageLog };
      this.runs.set(batchId, run);
      return run;
    } finally {
      try {
        await usageLog.close();
      } catch (error) {
        console.error(`[NarrativeBatch] Usage log flush failed for batch ${batchId}:`, describeError(error));
      }
    }
  }

  getRun(batchId: string): BatchRun | undefined {
    return this.runs.get(batchId);
  }

  listRuns(): BatchReport[] {
    return Array.from(this.runs.values(), (run) => run.report);
  }

  async health(): Promise<BackendHealth> {
    try {
      const models = await this.backend.listAvailableModels();
      return { backendKind: this.config.backendKind, reachable: true, models };
    } catch (error) {
      return { backendKind: this.config.backendKind, reachable: false, models: [], error: describeError(error) };
    }
  }
}

/** One-shot batch run without keeping a service around. */
export async function runNarrativeBatch(
  config: NarrativeConfig,
  inputs: readonly DomainNarrativeInput[],
  deps: BatchServiceDependencies,
): Promise<BatchRun> {
  return new NarrativeBatchService(config, deps).runBatch(inputs);
}
