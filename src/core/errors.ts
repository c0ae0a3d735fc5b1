// Human-readable rendering of claim errors

import type { ClaimError } from './types.js';

export function describeClaimError(error: ClaimError): string {
  switch (error.type) {
    case 'BadOrigin':
      return 'Call must be signed by the caller';
    case 'ProofTooLong':
      return `Proof is ${error.length} bytes, limit is ${error.limit}`;
    case 'ProofAlreadyExists':
      return 'Proof has already been claimed';
    case 'ClaimNotExist':
      return 'Proof has not been claimed';
    case 'NotProofOwner':
      return 'Proof is claimed by another account';
  }
}
