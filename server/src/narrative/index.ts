export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./backends";
export * from "./modelRegistry";
export * from "./qualityValidator";
export * from "./narrativeCache";
export * from "./usageLog";
export * from "./usageLogSinks";
export * from "./promptTemplates";
export * from "./outputSlots";
export * from "./generationOrchestrator";
export * from "./taskScheduler";
export * from "./narrativeBatchService";
