import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ClaimService } from '../src/core/claims.js';
import { ManualClock } from '../src/core/clock.js';
import { EventBus, RecordingEventSink } from '../src/core/events.js';
import { none, root, signed } from '../src/core/origin.js';
import { createLogger, LogLevel, setLogOutput, resetLogOutput } from '../src/core/logger.js';
import type { LogEntry } from '../src/core/logger.js';
import { MetricsCollector } from '../src/core/metrics.js';
import { MemoryClaimStore } from '../src/storage/memory.js';
import { SqliteClaimStore } from '../src/storage/sqlite.js';
import type { ClaimStore, EventSink } from '../src/core/types.js';

const enc = (s: string) => new TextEncoder().encode(s);

const ALICE = signed('alice');
const BOB = signed('bob');
const CAROL = signed('carol');

function runClaimServiceTests(name: string, createStore: () => ClaimStore) {
  describe(name, () => {
    let store: ClaimStore;
    let clock: ManualClock;
    let events: RecordingEventSink;
    let metrics: MetricsCollector;
    let service: ClaimService;

    function makeService(opts: { proofLimit?: number; events?: EventSink } = {}): ClaimService {
      return new ClaimService({
        store,
        clock,
        events: opts.events ?? events,
        proofLimit: opts.proofLimit ?? 10,
        logger: createLogger('test', LogLevel.SILENT),
        metrics,
      });
    }

    beforeEach(() => {
      store = createStore();
      clock = new ManualClock(1);
      events = new RecordingEventSink();
      metrics = new MetricsCollector();
      service = makeService();
    });

    describe('createClaim', () => {
      it('records the caller and the current logical time', () => {
        expect(service.createClaim(ALICE, enc('abc'))).toEqual({ ok: true, value: undefined });
        expect(service.getClaim(enc('abc'))).toEqual({ owner: 'alice', registeredAt: 1 });
        expect(events.list()).toEqual([{ type: 'ClaimCreated', who: 'alice', proof: enc('abc') }]);
      });

      it('accepts a proof exactly at the limit', () => {
        const proof = new Uint8Array(10).fill(7);
        expect(service.createClaim(ALICE, proof).ok).toBe(true);
        expect(store.contains(proof)).toBe(true);
      });

      it('accepts an empty proof', () => {
        expect(service.createClaim(ALICE, new Uint8Array(0)).ok).toBe(true);
        expect(service.getClaim(new Uint8Array(0))).toEqual({ owner: 'alice', registeredAt: 1 });
      });

      it('rejects a proof over the limit and leaves the store unchanged', () => {
        const proof = new Uint8Array(11).fill(7);
        expect(service.createClaim(ALICE, proof)).toEqual({
          ok: false,
          error: { type: 'ProofTooLong', length: 11, limit: 10 },
        });
        expect(store.contains(proof)).toBe(false);
        expect(events.list()).toEqual([]);
      });

      it('rejects a second claim and keeps the first owner and timestamp', () => {
        service.createClaim(ALICE, enc('abc'));
        clock.advance(4);
        expect(service.createClaim(BOB, enc('abc'))).toEqual({ ok: false, error: { type: 'ProofAlreadyExists' } });
        expect(service.getClaim(enc('abc'))).toEqual({ owner: 'alice', registeredAt: 1 });
        expect(events.list()).toHaveLength(1);
      });

      it('rejects a second claim by the same owner', () => {
        service.createClaim(ALICE, enc('abc'));
        const result = service.createClaim(ALICE, enc('abc'));
        expect(!result.ok && result.error.type).toBe('ProofAlreadyExists');
      });

      it('checks length before existence', () => {
        const long = new Uint8Array(12).fill(1);
        expect(makeService({ proofLimit: 20 }).createClaim(ALICE, long).ok).toBe(true);
        const result = service.createClaim(BOB, long);
        expect(!result.ok && result.error.type).toBe('ProofTooLong');
      });

      it('compares proofs by their exact bytes', () => {
        service.createClaim(ALICE, enc('abc'));
        const same = service.createClaim(BOB, Uint8Array.from([97, 98, 99]));
        expect(!same.ok && same.error.type).toBe('ProofAlreadyExists');
        expect(service.createClaim(BOB, Uint8Array.from([97, 98, 99, 0])).ok).toBe(true);
        expect(service.createClaim(BOB, Uint8Array.from([97, 98])).ok).toBe(true);
      });
    });

    describe('revokeClaim', () => {
      it('removes the claim so anyone can claim it again', () => {
        service.createClaim(ALICE, enc('abc'));
        expect(service.revokeClaim(ALICE, enc('abc'))).toEqual({ ok: true, value: undefined });
        expect(service.getClaim(enc('abc'))).toBeNull();

        clock.advance();
        expect(service.createClaim(BOB, enc('abc')).ok).toBe(true);
        expect(service.getClaim(enc('abc'))).toEqual({ owner: 'bob', registeredAt: 2 });
        expect(events.list().map(e => e.type)).toEqual(['ClaimCreated', 'ClaimRevoked', 'ClaimCreated']);
        expect(events.ofType('ClaimRevoked')).toEqual([{ type: 'ClaimRevoked', who: 'alice', proof: enc('abc') }]);
      });

      it('fails on an unclaimed proof', () => {
        expect(service.revokeClaim(ALICE, enc('abc'))).toEqual({ ok: false, error: { type: 'ClaimNotExist' } });
      });

      it('fails for a non-owner and keeps the record', () => {
        service.createClaim(ALICE, enc('abc'));
        expect(service.revokeClaim(BOB, enc('abc'))).toEqual({ ok: false, error: { type: 'NotProofOwner' } });
        expect(service.getClaim(enc('abc'))).toEqual({ owner: 'alice', registeredAt: 1 });
        expect(events.list()).toHaveLength(1);
      });
    });

    describe('transferClaim', () => {
      it('hands the claim to the destination and restamps it', () => {
        service.createClaim(ALICE, enc('abc'));
        clock.set(5);
        expect(service.transferClaim(ALICE, enc('abc'), 'carol')).toEqual({ ok: true, value: undefined });
        expect(service.getClaim(enc('abc'))).toEqual({ owner: 'carol', registeredAt: 5 });
        expect(events.ofType('ClaimTransferred')).toEqual([
          { type: 'ClaimTransferred', who: 'alice', proof: enc('abc'), dest: 'carol' },
        ]);
      });

      it('stops the previous owner from transferring again', () => {
        service.createClaim(ALICE, enc('abc'));
        service.transferClaim(ALICE, enc('abc'), 'carol');
        expect(service.transferClaim(ALICE, enc('abc'), 'bob')).toEqual({ ok: false, error: { type: 'NotProofOwner' } });
        expect(service.getClaim(enc('abc'))?.owner).toBe('carol');
      });

      it('allows transferring to oneself, refreshing the timestamp', () => {
        service.createClaim(ALICE, enc('abc'));
        clock.advance(2);
        expect(service.transferClaim(ALICE, enc('abc'), 'alice').ok).toBe(true);
        expect(service.getClaim(enc('abc'))).toEqual({ owner: 'alice', registeredAt: 3 });
      });

      it('fails on an unclaimed proof', () => {
        expect(service.transferClaim(ALICE, enc('abc'), 'bob')).toEqual({ ok: false, error: { type: 'ClaimNotExist' } });
        expect(store.contains(enc('abc'))).toBe(false);
      });

      it('fails for a non-owner and keeps the record', () => {
        service.createClaim(ALICE, enc('abc'));
        clock.advance();
        expect(service.transferClaim(BOB, enc('abc'), 'bob')).toEqual({ ok: false, error: { type: 'NotProofOwner' } });
        expect(service.getClaim(enc('abc'))).toEqual({ owner: 'alice', registeredAt: 1 });
      });
    });

    describe('origin', () => {
      it('rejects unsigned and root origins before any other check', () => {
        const long = new Uint8Array(50);
        for (const origin of [none(), root()]) {
          expect(service.createClaim(origin, long)).toEqual({ ok: false, error: { type: 'BadOrigin' } });
          expect(service.revokeClaim(origin, enc('abc'))).toEqual({ ok: false, error: { type: 'BadOrigin' } });
          expect(service.transferClaim(origin, enc('abc'), 'bob')).toEqual({ ok: false, error: { type: 'BadOrigin' } });
        }
        expect(events.list()).toEqual([]);
      });
    });

    describe('atomicity', () => {
      const failing: EventSink = {
        deposit() {
          throw new Error('sink unavailable');
        },
      };

      it('rolls back a create when the event sink throws', () => {
        const svc = makeService({ events: failing });
        expect(() => svc.createClaim(ALICE, enc('abc'))).toThrow('sink unavailable');
        expect(store.contains(enc('abc'))).toBe(false);
      });

      it('rolls back a transfer when the event sink throws', () => {
        service.createClaim(ALICE, enc('abc'));
        clock.advance();
        const svc = makeService({ events: failing });
        expect(() => svc.transferClaim(ALICE, enc('abc'), 'carol')).toThrow('sink unavailable');
        expect(store.get(enc('abc'))).toEqual({ owner: 'alice', registeredAt: 1 });
      });

      it('rolls back a revoke when the event sink throws', () => {
        service.createClaim(ALICE, enc('abc'));
        const svc = makeService({ events: failing });
        expect(() => svc.revokeClaim(ALICE, enc('abc'))).toThrow('sink unavailable');
        expect(store.contains(enc('abc'))).toBe(true);
      });

      it('commits and reaches the other subscribers when one subscriber throws', () => {
        const failures: string[] = [];
        const bus = new EventBus({ onError: (_error, event) => failures.push(event.type) });
        const delivered: string[] = [];
        bus.subscribe(e => delivered.push(e.type));
        bus.subscribe(() => {
          throw new Error('subscriber failed');
        });
        const svc = makeService({ events: bus });

        expect(svc.createClaim(ALICE, enc('abc'))).toEqual({ ok: true, value: undefined });
        expect(delivered).toEqual(['ClaimCreated']);
        expect(failures).toEqual(['ClaimCreated']);
        expect(store.get(enc('abc'))).toEqual({ owner: 'alice', registeredAt: 1 });
      });

      it('deposits a copy of the proof', () => {
        const proof = enc('abc');
        service.createClaim(ALICE, proof);
        proof[0] = 0;
        expect(events.list()[0]).toEqual({ type: 'ClaimCreated', who: 'alice', proof: enc('abc') });
      });
    });

    it('walks through the claim lifecycle', () => {
      expect(service.createClaim(signed('A'), enc('abc')).ok).toBe(true);
      expect(service.getClaim(enc('abc'))?.owner).toBe('A');

      const dup = service.createClaim(signed('B'), enc('abc'));
      expect(!dup.ok && dup.error.type).toBe('ProofAlreadyExists');

      expect(service.transferClaim(signed('A'), enc('abc'), 'C').ok).toBe(true);
      expect(service.getClaim(enc('abc'))?.owner).toBe('C');

      const stale = service.revokeClaim(signed('A'), enc('abc'));
      expect(!stale.ok && stale.error.type).toBe('NotProofOwner');

      expect(service.revokeClaim(signed('C'), enc('abc')).ok).toBe(true);
      expect(service.getClaim(enc('abc'))).toBeNull();
    });

    it('counts calls by outcome', () => {
      service.createClaim(ALICE, enc('abc'));
      service.createClaim(BOB, enc('abc'));
      service.revokeClaim(BOB, enc('abc'));
      service.transferClaim(CAROL, enc('xyz'), 'bob');

      expect(metrics.getCounter('claims.calls', { call: 'create_claim', outcome: 'ok' })).toBe(1);
      expect(metrics.getCounter('claims.calls', { call: 'create_claim', outcome: 'ProofAlreadyExists' })).toBe(1);
      expect(metrics.getCounter('claims.calls', { call: 'revoke_claim', outcome: 'NotProofOwner' })).toBe(1);
      expect(metrics.getCounter('claims.calls', { call: 'transfer_claim', outcome: 'ClaimNotExist' })).toBe(1);
      expect(metrics.getCounter('claims.calls')).toBe(4);
    });
  });
}

runClaimServiceTests('ClaimService over MemoryClaimStore', () => new MemoryClaimStore());
runClaimServiceTests('ClaimService over SqliteClaimStore', () => new SqliteClaimStore(':memory:'));

describe('ClaimService configuration and logging', () => {
  let captured: LogEntry[];

  beforeEach(() => {
    captured = [];
    setLogOutput(entry => captured.push(entry));
  });

  afterEach(() => {
    resetLogOutput();
  });

  function build(level: LogLevel): ClaimService {
    return new ClaimService({
      store: new MemoryClaimStore(),
      clock: new ManualClock(),
      events: new RecordingEventSink(),
      proofLimit: 4,
      logger: createLogger('claims', level),
      metrics: new MetricsCollector(),
    });
  }

  it('rejects a negative or fractional proof limit', () => {
    const base = { store: new MemoryClaimStore(), clock: new ManualClock(), events: new RecordingEventSink() };
    expect(() => new ClaimService({ ...base, proofLimit: -1 })).toThrow(RangeError);
    expect(() => new ClaimService({ ...base, proofLimit: 2.5 })).toThrow(RangeError);
  });

  it('logs applied calls at INFO with the proof in hex', () => {
    build(LogLevel.INFO).createClaim(ALICE, enc('abc'));
    expect(captured).toHaveLength(1);
    expect(captured[0].level).toBe('INFO');
    expect(captured[0].message).toBe('Call applied');
    expect(captured[0].context).toEqual({ call: 'create_claim', proof: '616263' });
  });

  it('logs rejected calls at DEBUG only', () => {
    build(LogLevel.INFO).revokeClaim(ALICE, enc('abc'));
    expect(captured).toHaveLength(0);

    build(LogLevel.DEBUG).revokeClaim(ALICE, enc('abc'));
    expect(captured).toHaveLength(1);
    expect(captured[0].level).toBe('DEBUG');
    expect(captured[0].context).toEqual({ call: 'revoke_claim', proofLength: 3, error: 'ClaimNotExist' });
  });

  it('logs the length, not the bytes, of an oversized proof', () => {
    build(LogLevel.DEBUG).createClaim(ALICE, new Uint8Array(1000));
    expect(captured).toHaveLength(1);
    expect(captured[0].context).toEqual({
      call: 'create_claim',
      proofLength: 1000,
      error: 'ProofTooLong',
    });
  });
});
