/**
 * Core library exports for ext-sorter
 */

export * from "./PathClassifier";
export * from "./CollisionResolver";
export * from "./KeyedMutex";
export * from "./RetryPolicy";
export * from "./ErrorClassifier";
export * from "./FileCopier";
export * from "./TreeWalker";
export * from "./BoundedQueue";
export * from "./CopyTask";
export * from "./Scheduler";
export * from "./ReportAggregator";
export * from "./ConfigLoader";
export * from "./Logger";
