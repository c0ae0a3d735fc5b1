/**
 * Proof Registry Core Types
 * Single source of truth for all shared types and interfaces.
 */

// ── Result Type ──

/** Discriminated union result type for error handling without exceptions */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ── Cryptographic Primitives ──

/** A principal identified by an Ed25519 public key */
export interface Principal {
  /** Base64url-encoded Ed25519 public key (32 bytes → 43 chars, no padding) */
  id: string;
  name?: string;
}

/** Ed25519 keypair */
export interface Keypair {
  principal: Principal;
  privateKey: Uint8Array;
}

// ── Claims ──

/** Opaque byte sequence identifying a claimed piece of data */
export type Fingerprint = Uint8Array;

/** Opaque authenticated caller/owner handle */
export type Identity = string;

/** Non-decreasing counter supplied by the clock (e.g. a block height) */
export type LogicalTimestamp = number;

export interface ClaimRecord {
  owner: Identity;
  registeredAt: LogicalTimestamp;
}

// ── Origin ──

/** Where a call came from. Only signed origins may claim, revoke or transfer. */
export type Origin =
  | { type: 'signed'; who: Identity }
  | { type: 'root' }
  | { type: 'none' };

// ── Events ──

export type ClaimEvent =
  | { type: 'ClaimCreated'; who: Identity; proof: Fingerprint }
  | { type: 'ClaimRevoked'; who: Identity; proof: Fingerprint }
  | { type: 'ClaimTransferred'; who: Identity; proof: Fingerprint; dest: Identity };

export type ClaimEventType = ClaimEvent['type'];

// ── Errors ──

export type ClaimError =
  | { type: 'BadOrigin' }
  | { type: 'ProofTooLong'; length: number; limit: number }
  | { type: 'ProofAlreadyExists' }
  | { type: 'ClaimNotExist' }
  | { type: 'NotProofOwner' };

export type ClaimErrorType = ClaimError['type'];

// ── Collaborators ──

/** Source of logical time */
export interface LogicalClock {
  now(): LogicalTimestamp;
}

/** Receives events for calls that committed */
export interface EventSink {
  deposit(event: ClaimEvent): void;
}

// ── Storage ──

/**
 * Fingerprint → ClaimRecord mapping. Pure storage: no validation.
 * Writes made inside `transaction` are discarded if the callback throws.
 */
export interface ClaimStore {
  get(proof: Fingerprint): ClaimRecord | null;
  contains(proof: Fingerprint): boolean;
  insert(proof: Fingerprint, record: ClaimRecord): void;
  remove(proof: Fingerprint): void;
  transaction<T>(fn: () => T): T;
}
