#!/usr/bin/env npx tsx
// Proof Registry Demo Scenario: claim, transfer and revoke a proof
// Usage: npx tsx src/demo/scenario.ts

import { pathToFileURL } from 'node:url';
import { ManualClock } from '../core/clock.js';
import { RecordingEventSink } from '../core/events.js';
import { describeClaimError } from '../core/errors.js';
import { createClaimRegistry } from '../core/factory.js';
import { signed } from '../core/origin.js';
import { toHex } from '../core/crypto.js';
import { MetricsCollector } from '../core/metrics.js';
import type { ClaimError, ClaimEvent, ClaimRecord, Result } from '../core/types.js';

export interface ScenarioStep {
  label: string;
  outcome: 'ok' | ClaimError['type'];
  error: ClaimError | null;
  claim: ClaimRecord | null;
}

export interface ScenarioReport {
  steps: ScenarioStep[];
  events: ClaimEvent[];
}

/**
 * Runs the reference walk-through against an in-memory SQLite registry:
 * Alice claims "abc", Bob fails to claim it, Alice transfers it to Carol,
 * Alice fails to revoke it, Carol revokes it.
 */
export function runScenario(): ScenarioReport {
  const clock = new ManualClock(1);
  const events = new RecordingEventSink();
  const registry = createClaimRegistry(
    { proofLimit: 10, storage: 'sqlite', databasePath: ':memory:', logLevel: 'silent' },
    { clock, events, metrics: new MetricsCollector() },
  );
  const { service } = registry;
  const proof = new TextEncoder().encode('abc');
  const steps: ScenarioStep[] = [];

  const record = (label: string, result: Result<void, ClaimError>) => {
    steps.push({
      label,
      outcome: result.ok ? 'ok' : result.error.type,
      error: result.ok ? null : result.error,
      claim: service.getClaim(proof),
    });
    clock.advance();
  };

  try {
    record('Alice claims "abc"', service.createClaim(signed('alice'), proof));
    record('Bob claims "abc"', service.createClaim(signed('bob'), proof));
    record('Alice transfers "abc" to Carol', service.transferClaim(signed('alice'), proof, 'carol'));
    record('Alice revokes "abc"', service.revokeClaim(signed('alice'), proof));
    record('Carol revokes "abc"', service.revokeClaim(signed('carol'), proof));
  } finally {
    registry.close();
  }

  return { steps, events: events.list() };
}

// ═══════════════════════════════════════════
// Utility
// ═══════════════════════════════════════════

function banner(title: string): void {
  console.log('\n' + '═'.repeat(60));
  console.log(`  ${title}`);
  console.log('═'.repeat(60));
}

function section(title: string): void {
  console.log(`\n── ${title} ${'─'.repeat(Math.max(0, 50 - title.length))}`);
}

function main(): void {
  banner('Proof Registry — Claim Lifecycle Demo');
  const report = runScenario();

  section('Calls');
  for (const step of report.steps) {
    const status = step.error ? `✗ ${describeClaimError(step.error)}` : '✓';
    const owner = step.claim ? `owner=${step.claim.owner} @${step.claim.registeredAt}` : 'unclaimed';
    console.log(`  ${step.label.padEnd(34)} ${status.padEnd(40)} ${owner}`);
  }

  section('Events');
  for (const event of report.events) {
    const dest = event.type === 'ClaimTransferred' ? ` → ${event.dest}` : '';
    console.log(`  ${event.type.padEnd(18)} ${event.who} 0x${toHex(event.proof)}${dest}`);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main();
}
