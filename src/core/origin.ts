import type { ClaimError, Identity, Origin, Result } from './types.js';

export function signed(who: Identity): Origin {
  return { type: 'signed', who };
}

export function root(): Origin {
  return { type: 'root' };
}

export function none(): Origin {
  return { type: 'none' };
}

/** The caller identity of a signed origin; any other origin is a BadOrigin. */
export function ensureSigned(origin: Origin): Result<Identity, ClaimError> {
  if (origin.type !== 'signed') {
    return { ok: false, error: { type: 'BadOrigin' } };
  }
  return { ok: true, value: origin.who };
}
