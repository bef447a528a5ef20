/**
 * Core interfaces for ext-sorter
 */

export * from "./IRunConfig";
export * from "./ICopyOutcome";
export * from "./IPathClassifier";
export * from "./ICollisionResolver";
export * from "./IRetryPolicy";
export * from "./IFileCopier";
export * from "./ITreeWalker";
export * from "./IScheduler";
export * from "./IReportAggregator";
export * from "./ILogger";
