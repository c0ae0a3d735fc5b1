/**
 * Claim Service: create, revoke and transfer proof-of-existence claims.
 *
 * Per fingerprint the lifecycle is Absent → Claimed(owner) → Claimed(dest)* → Absent.
 * `createClaim` is the only edge out of Absent, `revokeClaim` the only edge back,
 * and `transferClaim` the only way the owner changes.
 *
 * Each call runs inside one store transaction: preconditions are read, the record
 * is written and the event is deposited together. A rejected call writes nothing;
 * a collaborator that throws rolls the write back and the error propagates.
 */

import type {
  ClaimError,
  ClaimEvent,
  ClaimRecord,
  ClaimStore,
  EventSink,
  Fingerprint,
  Identity,
  LogicalClock,
  Origin,
  Result,
} from './types.js';
import { ensureSigned } from './origin.js';
import { toHex } from './crypto.js';
import { createLogger, type Logger } from './logger.js';
import { globalMetrics, type MetricsCollector } from './metrics.js';

export type ClaimCall = 'create_claim' | 'revoke_claim' | 'transfer_claim';

export interface ClaimServiceOptions {
  store: ClaimStore;
  clock: LogicalClock;
  events: EventSink;
  /** Maximum fingerprint length in bytes */
  proofLimit: number;
  logger?: Logger;
  metrics?: MetricsCollector;
}

const OK: Result<void, ClaimError> = Object.freeze({ ok: true, value: undefined });

function fail(error: ClaimError): Result<void, ClaimError> {
  return { ok: false, error };
}

export class ClaimService {
  private store: ClaimStore;
  private clock: LogicalClock;
  private events: EventSink;
  private logger: Logger;
  private metrics: MetricsCollector;
  readonly proofLimit: number;

  constructor(opts: ClaimServiceOptions) {
    if (!Number.isSafeInteger(opts.proofLimit) || opts.proofLimit < 0) {
      throw new RangeError(`proofLimit must be a non-negative integer, got ${opts.proofLimit}`);
    }
    this.store = opts.store;
    this.clock = opts.clock;
    this.events = opts.events;
    this.proofLimit = opts.proofLimit;
    this.logger = opts.logger ?? createLogger('ClaimService');
    this.metrics = opts.metrics ?? globalMetrics;
  }

  /** Claim an unclaimed fingerprint for the caller. */
  createClaim(origin: Origin, proof: Fingerprint): Result<void, ClaimError> {
    return this.run('create_claim', proof, () => {
      const sender = ensureSigned(origin);
      if (!sender.ok) return sender;

      if (proof.length > this.proofLimit) {
        return fail({ type: 'ProofTooLong', length: proof.length, limit: this.proofLimit });
      }
      if (this.store.contains(proof)) {
        return fail({ type: 'ProofAlreadyExists' });
      }

      this.store.insert(proof, { owner: sender.value, registeredAt: this.clock.now() });
      this.deposit({ type: 'ClaimCreated', who: sender.value, proof });
      return OK;
    });
  }

  /** Delete the caller's claim on a fingerprint. */
  revokeClaim(origin: Origin, proof: Fingerprint): Result<void, ClaimError> {
    return this.run('revoke_claim', proof, () => {
      const sender = ensureSigned(origin);
      if (!sender.ok) return sender;

      const owned = this.requireOwner(proof, sender.value);
      if (!owned.ok) return owned;

      this.store.remove(proof);
      this.deposit({ type: 'ClaimRevoked', who: sender.value, proof });
      return OK;
    });
  }

  /** Hand the caller's claim to `dest`, restamping it with the current logical time. */
  transferClaim(origin: Origin, proof: Fingerprint, dest: Identity): Result<void, ClaimError> {
    return this.run('transfer_claim', proof, () => {
      const sender = ensureSigned(origin);
      if (!sender.ok) return sender;

      const owned = this.requireOwner(proof, sender.value);
      if (!owned.ok) return owned;

      this.store.insert(proof, { owner: dest, registeredAt: this.clock.now() });
      this.deposit({ type: 'ClaimTransferred', who: sender.value, proof, dest });
      return OK;
    });
  }

  getClaim(proof: Fingerprint): ClaimRecord | null {
    return this.store.get(proof);
  }

  private requireOwner(proof: Fingerprint, caller: Identity): Result<void, ClaimError> {
    const record = this.store.get(proof);
    if (!record) return fail({ type: 'ClaimNotExist' });
    if (record.owner !== caller) return fail({ type: 'NotProofOwner' });
    return OK;
  }

  private deposit(event: ClaimEvent): void {
    this.events.deposit({ ...event, proof: Uint8Array.from(event.proof) });
  }

  private run(
    call: ClaimCall,
    proof: Fingerprint,
    body: () => Result<void, ClaimError>,
  ): Result<void, ClaimError> {
    const result = this.store.transaction(body);
    if (result.ok) {
      this.metrics.counter('claims.calls', { call, outcome: 'ok' });
      this.logger.info('Call applied', { call, proof: toHex(proof) });
      return OK;
    }
    // Rejected proofs may be arbitrarily long; only their size is logged.
    this.metrics.counter('claims.calls', { call, outcome: result.error.type });
    this.logger.debug('Call rejected', { call, proofLength: proof.length, error: result.error.type });
    return result;
  }
}
