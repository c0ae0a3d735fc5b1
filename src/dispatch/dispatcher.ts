// Signed call dispatcher
// Validates call envelopes, authenticates the signer and routes to the ClaimService

import AjvModule from 'ajv';
import type { Keypair, Origin, Result } from '../core/types.js';
import type { ClaimService } from '../core/claims.js';
import { fromHex, isCanonicalKeyId, signObject, verifyObjectSignature } from '../core/crypto.js';
import { none, signed } from '../core/origin.js';
import { createLogger, type Logger } from '../core/logger.js';
import { globalMetrics, type MetricsCollector } from '../core/metrics.js';
import { AuditLog } from './audit.js';
import type { CallEnvelope, CallPayload, DispatchError } from './types.js';

const Ajv = AjvModule.default;
const ajv = new Ajv({ strict: false, allErrors: false });

const HEX_PATTERN = '^(0x)?([0-9a-fA-F]{2})*$';

function callSchema(method: string, extra: Record<string, unknown> = {}) {
  return {
    type: 'object',
    properties: {
      method: { const: method },
      proof: { type: 'string', pattern: HEX_PATTERN },
      nonce: { type: 'integer', minimum: 0, maximum: Number.MAX_SAFE_INTEGER },
      ...extra,
    },
    required: ['method', 'proof', 'nonce', ...Object.keys(extra)],
    additionalProperties: false,
  };
}

const ENVELOPE_SCHEMA = {
  type: 'object',
  properties: {
    call: {
      oneOf: [
        callSchema('create_claim'),
        callSchema('revoke_claim'),
        callSchema('transfer_claim', { dest: { type: 'string', minLength: 1 } }),
      ],
    },
    signer: { type: 'string', minLength: 1 },
    signature: { type: 'string', minLength: 1 },
  },
  required: ['call'],
  dependencies: {
    signer: ['signature'],
    signature: ['signer'],
  },
  additionalProperties: false,
};

const validateEnvelope = ajv.compile<CallEnvelope>(ENVELOPE_SCHEMA);

/** Build an envelope signed by `keypair`. */
export function signCall(keypair: Keypair, call: CallPayload): CallEnvelope {
  return {
    call,
    signer: keypair.principal.id,
    signature: signObject(keypair.privateKey, call),
  };
}

export interface DispatcherOptions {
  service: ClaimService;
  audit?: AuditLog;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Authenticates and applies signed claim calls.
 *
 * Each signer's calls carry a strictly increasing nonce. Once a signature checks
 * out the nonce is spent, even if the claim call then fails, so an envelope can
 * be applied at most once. Nonces are held in memory for the dispatcher's lifetime.
 */
export class CallDispatcher {
  private service: ClaimService;
  private nonces = new Map<string, number>();
  private logger: Logger;
  private metrics: MetricsCollector;
  readonly audit: AuditLog;

  constructor(opts: DispatcherOptions) {
    this.service = opts.service;
    this.audit = opts.audit ?? new AuditLog();
    this.logger = opts.logger ?? createLogger('CallDispatcher');
    this.metrics = opts.metrics ?? globalMetrics;
  }

  /** Parse a JSON envelope and dispatch it. */
  dispatchJson(text: string): Result<void, DispatchError> {
    let envelope: unknown;
    try {
      envelope = JSON.parse(text);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      return this.reject({ type: 'MalformedCall', detail: `Invalid JSON: ${detail}` });
    }
    return this.dispatch(envelope);
  }

  /** The nonce `signer` must use next: one past the last accepted, or 0 for a new signer. */
  nextNonce(signer: string): number {
    const last = this.nonces.get(signer);
    return last === undefined ? 0 : last + 1;
  }

  dispatch(envelope: unknown): Result<void, DispatchError> {
    if (!validateEnvelope(envelope)) {
      return this.reject({ type: 'MalformedCall', detail: ajv.errorsText(validateEnvelope.errors) });
    }

    const { call, signer, signature } = envelope;
    if (signer !== undefined && !isCanonicalKeyId(signer)) {
      return this.reject({ type: 'MalformedCall', detail: 'signer is not a canonical base64url public key' }, call);
    }
    if (call.method === 'transfer_claim' && !isCanonicalKeyId(call.dest)) {
      return this.reject({ type: 'MalformedCall', detail: 'dest is not a canonical base64url public key' }, call, signer);
    }

    let origin: Origin = none();
    if (signer !== undefined && signature !== undefined) {
      if (!verifyObjectSignature(signer, call, signature)) {
        return this.reject({ type: 'BadSignature' }, call, signer);
      }
      const last = this.nonces.get(signer);
      if (last !== undefined && call.nonce <= last) {
        return this.reject({ type: 'StaleNonce', nonce: call.nonce, lastAccepted: last }, call, signer);
      }
      this.nonces.set(signer, call.nonce);
      origin = signed(signer);
    }

    const result = this.apply(origin, call);
    if (!result.ok) return this.reject(result.error, call, signer);

    this.audit.accepted({ method: call.method, signer, proof: call.proof });
    this.metrics.counter('dispatch.calls', { outcome: 'accepted' });
    return result;
  }

  private apply(origin: Origin, call: CallPayload): Result<void, DispatchError> {
    const proof = fromHex(call.proof);
    switch (call.method) {
      case 'create_claim':
        return this.service.createClaim(origin, proof);
      case 'revoke_claim':
        return this.service.revokeClaim(origin, proof);
      case 'transfer_claim':
        return this.service.transferClaim(origin, proof, call.dest);
    }
  }

  private reject(error: DispatchError, call?: CallPayload, signer?: string): Result<void, DispatchError> {
    this.audit.rejected({ method: call?.method, signer, proof: call?.proof, errorType: error.type });
    this.metrics.counter('dispatch.calls', { outcome: 'rejected' });
    this.logger.warn('Call rejected', { method: call?.method, signer, error: error.type });
    return { ok: false, error };
  }
}
