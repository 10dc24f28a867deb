/**
 * @module
 * Run independent units of work in parallel, let each report to its own
 * callback, and stop them all as soon as one result satisfies a shared
 * "definition of done".
 */

// Coordinator and per-task pipeline
export * from "./task-group";
export * from "./task-handle";

// Outcomes, the definition of done and the registry of results
export * from "./outcome";
export * from "./evaluator";
export * from "./result-registry";

// Shared worker pool and cooperative cancellation
export * from "./executor";
export * from "./cancellation";

// Logging context bracket, correlation values and task context
export {
  type LoggingContext,
  type CorrelationContext,
  type TaskContext,
  type TaskStage,
  withLoggingContext,
  createCorrelationContext,
  useCorrelation,
  useTaskContext,
} from "./context";

// Errors and logging
export * from "./errors";
export * from "./logger";
