export { LeaseService, type LeaseServiceOptions } from './LeaseService';
export { LeaseStore, type ClaimStrategy, type WithLeaseOptions } from './LeaseStore';
export { Lease, type LeaseOwner, type LeaseInit } from './lease/Lease';
export { LeaseState, VALID_TRANSITIONS, isValidTransition, type ReleaseReason } from './lease/LeaseState';
export {
  SessionLockManager,
  type SessionLockManagerOptions,
  type LockedRecordAction,
  type LockedRecordHandler,
  type ForceLoadOptions,
  type RecordSnapshot,
} from './lease/SessionLockManager';
export {
  SerializedWriteChannel,
  type SerializedWriteChannelOptions,
  type WriteOperation,
} from './channel/SerializedWriteChannel';
export {
  RemoteRecordGateway,
  type RemoteRecordGatewayOptions,
  type RecordUpdater,
  type GatewayRetryConfig,
} from './gateway/RemoteRecordGateway';
export { calculateBackoffDelay, type BackoffConfig } from './gateway/backoff';
export { HealthMonitor, type HealthMonitorConfig } from './health/HealthMonitor';
export { ActiveLeaseSet } from './scheduler/ActiveLeaseSet';
export {
  AutoSaveScheduler,
  type AutoSaveConfig,
  type AutoSaveTickResult,
  type LeaseSaver,
} from './scheduler/AutoSaveScheduler';
export {
  IntervalTickSource,
  ManualTickSource,
  waitForTicks,
  type TickSource,
  type TickListener,
} from './scheduler/TickSource';
export type { IKeyValueStore, IStoreProvider, StoreEntry, StoreTransform } from './storage/IKeyValueStore';
export { MemoryKeyValueStore, MemoryStoreProvider, type MemoryStoreOptions } from './storage/MemoryKeyValueStore';
export { validateEnv, configFromEnv, type EnvConfig, type EnvLeaseSettings } from './config/env-schema';
export { TimerRegistry } from './utils/TimerRegistry';
export { logger, type Logger } from './utils/logger';
