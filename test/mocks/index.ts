/**
 * Central mock exports for testing
 */

export {
  MockCommandExecutor,
  MockExecaError,
  mockExecutor,
  type MockCommandResult,
  type MockCommandConfig,
  type ExecutedCommand,
} from "./execa.js";

export {
  FakePackageProvider,
  CallQueue,
  flushBackground,
  type PendingCall,
} from "./fake-provider.js";

export { createSilentLogger } from "./logger.js";

export { createRecordingOutput, type RecordingOutput } from "./output.js";

export { createTestSession, type TestSession } from "./session.js";
