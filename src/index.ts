/**
 * Proof Registry: ownership-tracked proof-of-existence claims.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Result,
  Principal,
  Keypair,
  Fingerprint,
  Identity,
  LogicalTimestamp,
  ClaimRecord,
  Origin,
  ClaimEvent,
  ClaimEventType,
  ClaimError,
  ClaimErrorType,
  LogicalClock,
  EventSink,
  ClaimStore,
} from './core/types.js';

// ── Crypto ──
export {
  generateKeypair,
  sign,
  verify,
  blake2b256,
  blake2b128,
  blake2128Concat,
  canonicalize,
  signObject,
  verifyObjectSignature,
  toBase64url,
  fromBase64url,
  toHex,
  fromHex,
  isHex,
  isCanonicalKeyId,
} from './core/crypto.js';

// ── Claims ──
export { ClaimService } from './core/claims.js';
export type { ClaimCall, ClaimServiceOptions } from './core/claims.js';
export { signed, root, none, ensureSigned } from './core/origin.js';
export { describeClaimError } from './core/errors.js';

// ── Collaborators ──
export { ManualClock, monotonicClock } from './core/clock.js';
export { RecordingEventSink, EventBus } from './core/events.js';
export type { EventBusOptions, SubscriberErrorHandler } from './core/events.js';

// ── Configuration ──
export { loadConfig, DEFAULT_PROOF_LIMIT } from './core/config.js';
export type { ClaimRegistryConfig, StorageKind } from './core/config.js';
export { createClaimRegistry, loadClaimRegistry } from './core/factory.js';
export type { ClaimRegistry, ClaimRegistryDeps } from './core/factory.js';

// ── Observability ──
export {
  LogLevel,
  createLogger,
  ConsoleLogger,
  parseLogLevel,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogOutput,
  resetLogOutput,
} from './core/logger.js';
export type { Logger, LogEntry, LogLevelName } from './core/logger.js';
export { MetricsCollector, globalMetrics } from './core/metrics.js';
export type { MetricsAdapter, MetricsSnapshot, CounterSample, Tags } from './core/metrics.js';

// ── Dispatch ──
export { CallDispatcher, signCall } from './dispatch/dispatcher.js';
export type { DispatcherOptions } from './dispatch/dispatcher.js';
export { AuditLog } from './dispatch/audit.js';
export type { AuditEntry, AuditDecision } from './dispatch/audit.js';
export type { CallMethod, CallPayload, CallEnvelope, DispatchError } from './dispatch/types.js';

// ── Storage ──
export { MemoryClaimStore } from './storage/memory.js';
export { SqliteClaimStore } from './storage/sqlite.js';
