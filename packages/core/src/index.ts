/**
 * @tunegrab/core
 *
 * Core orchestration package containing:
 * - Error taxonomy
 * - Resilient call wrapper and session cell
 * - Operation lifecycle
 * - Progress reporter
 * - Auto-clear registry
 * - Download state machine
 * - Recent-downloads history store
 * - Chat platform port and shared types
 */

// Errors
export {
  TuneGrabError,
  ValidationError,
  ConfigError,
  NotFoundError,
  RetriesExhaustedError,
  AuthenticationFailedError,
  AmbiguousOutputError,
  DownloadIncompleteError,
  DownloaderError,
  OperationCancelledError,
  StateTransitionError,
  describeError,
  toOperationFailure,
  type FailureKind,
  type OperationFailure,
} from './errors/index.js';

// Resilience
export {
  resilientCall,
  createPolicy,
  isNetworkError,
  isRetryable,
  errorChain,
  SessionCell,
  type CallPolicy,
  type PolicyDefaults,
  type CallErrorKind,
  type CallErrorClass,
  type ErrorClassifier,
  type SessionSnapshot,
} from './resilience/index.js';

// Operation lifecycle
export { Operation, type OperationInit } from './operation.js';

// Progress
export {
  ProgressReporter,
  StatusMessage,
  type ProgressReporterOptions,
  type MessageRecorder,
} from './progress/reporter.js';

// Auto-clear
export {
  ClearRegistry,
  type ClearRegistryOptions,
  type ClearSummary,
} from './clear/registry.js';

// State machine
export {
  DownloadStateMachine,
  DOWNLOAD_STATES,
  isValidTransition,
  getNextStates,
  type DownloadState,
  type DownloadStateTransition,
  type TransitionListener,
} from './stateMachine.js';

// History
export { HistoryStore, type HistoryStoreOptions } from './history/store.js';
export { HISTORY_COLUMNS, CURRENT_SCHEMA } from './history/schema.js';

// Types
export type {
  ConversationId,
  MessageId,
  TextContent,
  AudioContent,
  DocumentContent,
  OutgoingContent,
  SendOptions,
  DeleteOutcome,
  ChatClient,
} from './chat/types.js';

export type {
  Thumbnail,
  MediaItem,
  TagField,
  MetadataWarning,
  DownloadResult,
} from './types/media.js';

export type { HistoryRecord } from './types/history.js';
