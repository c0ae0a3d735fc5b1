// Wire types for signed claim calls

import type { ClaimError } from '../core/types.js';

export type CallMethod = 'create_claim' | 'revoke_claim' | 'transfer_claim';

/**
 * A claim call as it travels over the wire; proofs are hex encoded.
 * `nonce` is covered by the signature and must increase with every call a signer makes.
 */
export type CallPayload =
  | { method: 'create_claim'; proof: string; nonce: number }
  | { method: 'revoke_claim'; proof: string; nonce: number }
  | { method: 'transfer_claim'; proof: string; nonce: number; dest: string };

export interface CallEnvelope {
  call: CallPayload;
  /** Base64url Ed25519 public key of the caller */
  signer?: string;
  /** Base64url signature over the canonical JSON of `call` */
  signature?: string;
}

export type DispatchError =
  | ClaimError
  | { type: 'MalformedCall'; detail: string }
  | { type: 'BadSignature' }
  | { type: 'StaleNonce'; nonce: number; lastAccepted: number };
