// Host model
export * from "./host/types.js";
export {
  SimulatedHost,
  SimulatedDesign,
  SimulatedParameter,
  SimulatedViewport,
  SimulatedEvent,
  type SimulatedHostOptions,
} from "./host/simulated-host.js";

// Executor
export {
  TransactionalExecutor,
  TRACEBACK_SEPARATOR,
  DEFAULT_TRANSACTION_LABEL,
  type HostNamespace,
  type TransactionalExecutorParams,
} from "./executor/transactional-executor.js";
export { VmWorkRunner, OutputCapture, formatTrace, type WorkRunner, type WorkContext } from "./executor/work-runner.js";
export { ExecutionState } from "./executor/execution-state.js";
export { driveUntil } from "./executor/drive.js";

// Actions, registry, dispatch
export * from "./actions/index.js";
export { ActionRegistry, defineAction, formatIssues, type ActionSpec, type RegisteredAction } from "./action-registry.js";
export { Dispatcher } from "./dispatcher.js";

// HTTP
export { createApp, actionNameFromPath, type BridgeApp } from "./app.js";
export { BridgeServer } from "./http-server.js";
export { createBridgeContext, type BridgeContext, type BridgeContextParams } from "./bridge.js";
export { loadConfig, defaultAddinConfig, type AddinConfig } from "./config.js";
