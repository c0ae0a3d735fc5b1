// Audit trail of dispatched calls

import type { CallMethod } from './types.js';

export type AuditDecision = 'accepted' | 'rejected';

export interface AuditEntry {
  timestamp: string;
  decision: AuditDecision;
  method?: CallMethod;
  signer?: string;
  proof?: string;
  errorType?: string;
}

export class AuditLog {
  private readonly entries: AuditEntry[] = [];

  accepted(opts: { method: CallMethod; signer?: string; proof: string }): void {
    this.entries.push({ timestamp: new Date().toISOString(), decision: 'accepted', ...opts });
  }

  rejected(opts: { method?: CallMethod; signer?: string; proof?: string; errorType: string }): void {
    this.entries.push({ timestamp: new Date().toISOString(), decision: 'rejected', ...opts });
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getByDecision(decision: AuditDecision): AuditEntry[] {
    return this.entries.filter(e => e.decision === decision);
  }

  getBySigner(signer: string): AuditEntry[] {
    return this.entries.filter(e => e.signer === signer);
  }
}
