/**
 * tapdeck: asynchronous core of a Homebrew front end
 *
 * A task coordinator that lets a fixed-cadence render loop start long-running
 * package operations and collect their results frame by frame without ever
 * waiting on them.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// Tasks
export {
  TaskCoordinator,
  TaskSet,
  EnrichmentQueue,
  Executor,
  ResultCell,
  createSingletonJob,
  createTaskResult,
  isEmptyTaskResult,
  mergeFragment,
  singletonKey,
  describeTask,
  DEFAULT_MAX_CONCURRENT,
  DEFAULT_TIMEOUT_MS,
} from "./tasks/index.js";
export type {
  TaskCoordinatorOptions,
  TaskRequest,
  SingletonRequest,
  DetailRequest,
  SingletonTask,
  SingletonKind,
  TaskResult,
  TaskFragment,
  DetailResult,
  OperationCompletion,
  AbandonPolicy,
  EnrichmentOutcome,
  EnrichmentCompletion,
  EnrichmentLookup,
  RequestOutcome,
  CellRead,
  CellGuard,
  CellStatus,
  BackgroundWork,
  ExecutorOptions,
} from "./tasks/index.js";

// Domain
export {
  createPackage,
  needsDetail,
  PACKAGE_TYPES,
  parseServiceStatus,
  isServiceRunning,
} from "./domain/index.js";
export type {
  Package,
  PackageType,
  CleanupItem,
  CleanupPreview,
  Service,
  ServiceStatus,
} from "./domain/index.js";

// Provider
export { BrewProvider } from "./provider/index.js";
export type {
  PackageProvider,
  PackageAction,
  MaintenanceOp,
  ServiceAction,
  ProviderCallOptions,
  BrewProviderOptions,
} from "./provider/index.js";

// Configuration
export { loadConfig, saveConfig, createDefaultConfig, applyEnvOverrides } from "./config/index.js";
export type { TapdeckConfig } from "./config/index.js";

// Utilities
export {
  createLogger,
  createLogCapture,
  getLogger,
  setLogger,
  TapdeckError,
  ConfigError,
  ProviderError,
  ExecutorError,
  ResultCellError,
  TimeoutError,
  isTapdeckError,
  formatError,
} from "./utils/index.js";
