/**
 * Punto de entrada del motor de descargas: reexporta BackoffPolicy, RetryExecutor,
 * ProgressAggregator, ConcurrencyCoordinator, SessionController, EventBus, el modelo de
 * sesión y los tipos compartidos.
 *
 * @module engines
 */

export { default as backoffPolicy, BackoffPolicy } from './BackoffPolicy';
export type { BackoffPolicyOptions } from './BackoffPolicy';
export { ItemStatus } from './types';
export type {
  ItemStatusType,
  FormatOptions,
  DownloadItem,
  DownloadSession,
  MediaBackend,
  ResolveOptions,
  ResolvedEntry,
  ResolvedMedia,
  BackendDownloadOptions,
  BackendDownloadResult,
  BackendProgressEvent,
  BackendProgressPhase,
} from './types';
export {
  canTransition,
  isTerminalStatus,
  transitionItem,
  TERMINAL_STATUSES,
} from './ItemStateMachine';
export type { TransitionDetails } from './ItemStateMachine';
export {
  createSessionId,
  createSession,
  createItem,
  completedCount,
  failedCount,
  cancelledCount,
  sessionProgress,
  itemDuration,
  toItemSnapshot,
  toSessionSnapshot,
} from './SessionModel';
export { EngineError, classifyError, classifyMessage, errorMessageOf } from './ErrorClassifier';
export type { ClassifiedError } from './ErrorClassifier';
export { RetryExecutor, defaultSleep } from './RetryExecutor';
export type {
  RetryOutcome,
  RetryInfo,
  RetryHooks,
  ExecuteOptions,
  SleepFn,
  RetryExecutorOptions,
  RetryableOperation,
} from './RetryExecutor';
export { ProgressAggregator } from './ProgressAggregator';
export type { ItemProgressSample, ProgressAggregatorOptions } from './ProgressAggregator';
export { ConcurrencyCoordinator, clampConcurrency } from './ConcurrencyCoordinator';
export type {
  CoordinatorEvent,
  CoordinatorOptions,
  CoordinatorResult,
} from './ConcurrencyCoordinator';
export { EngineEventBus } from './EventBus';
export type {
  EngineEventMap,
  EngineEventName,
  ItemStatusEvent,
  SessionLogEvent,
  SessionProgressEvent,
} from './EventBus';
export {
  default as SessionController,
  buildSessionItems,
  effectivePlaylistLimit,
} from './SessionController';
export type {
  StartSessionResult,
  DiskSpaceCheck,
  SessionControllerOptions,
  BuiltItems,
} from './SessionController';
