import { describe, it, expect, vi } from 'vitest';
import type { JobRecord, LedgerEvent } from '@shared/types';
import { MemoryJobStore, matchesFilter } from '@core/job-store';
import { CompositeAuditSink, MemoryAuditLog, type AuditSink } from '@core/audit-log';
import { makeLedger, postDefault } from '../helpers/ledger';

function job(id: number, overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    id,
    client: 'alice',
    freelancer: null,
    status: 'OPEN',
    title: `Job ${id}`,
    description: '',
    amount: 10,
    deadline: 500,
    proofHash: '',
    createdAt: 1,
    updatedAt: 1,
    ...overrides,
  };
}

describe('MemoryJobStore', () => {
  it('allocates ids from 1 without reuse', async () => {
    const store = new MemoryJobStore();
    expect(await store.allocateId()).toBe(1);
    expect(await store.allocateId()).toBe(2);
    await store.delete(2);
    expect(await store.allocateId()).toBe(3);
  });

  it('returns copies rather than stored objects', async () => {
    const store = new MemoryJobStore();
    const original = job(1);
    await store.put(original);
    original.amount = 999;

    const read = await store.get(1);
    expect(read?.amount).toBe(10);
    if (read) read.status = 'CANCELLED';
    expect((await store.get(1))?.status).toBe('OPEN');
  });

  it('returns undefined for missing records', async () => {
    expect(await new MemoryJobStore().get(1)).toBeUndefined();
  });

  it('lists in id order', async () => {
    const store = new MemoryJobStore();
    await store.put(job(3));
    await store.put(job(1));
    await store.put(job(2, { client: 'dave' }));
    expect((await store.list()).map((j) => j.id)).toEqual([1, 2, 3]);
    expect((await store.list({ client: 'dave' })).map((j) => j.id)).toEqual([2]);
  });
});

describe('matchesFilter', () => {
  it('matches every field that is set', () => {
    const submitted = job(1, { freelancer: 'bob', status: 'SUBMITTED' });
    expect(matchesFilter(submitted)).toBe(true);
    expect(matchesFilter(submitted, { freelancer: 'bob', status: 'SUBMITTED' })).toBe(true);
    expect(matchesFilter(submitted, { freelancer: 'bob', status: 'OPEN' })).toBe(false);
    expect(matchesFilter(submitted, { client: 'dave' })).toBe(false);
  });
});

describe('MemoryAuditLog', () => {
  it('numbers events and filters by job', async () => {
    const log = new MemoryAuditLog();
    await log.append([
      { type: 'JobPosted', jobId: 1, client: 'alice', amount: 5 },
      { type: 'JobPosted', jobId: 2, client: 'dave', amount: 7 },
    ]);
    await log.append([{ type: 'JobUpdated', jobId: 1 }]);

    const records = await log.eventsForJob(1);
    expect(records.map((r) => r.sequence)).toEqual([1, 3]);
    expect(records.map((r) => r.event.type)).toEqual(['JobPosted', 'JobUpdated']);
  });
});

describe('CompositeAuditSink', () => {
  const rejected: LedgerEvent = { type: 'WorkRejected', jobId: 4 };

  function failing(message: string): AuditSink {
    return {
      append: async () => {
        throw new Error(message);
      },
    };
  }

  it('records in the primary log, then notifies subscribers in order', async () => {
    const primary = new MemoryAuditLog();
    const first = new MemoryAuditLog();
    const second = new MemoryAuditLog();
    const sink = new CompositeAuditSink(primary, [first, second]);

    await sink.append([rejected]);

    expect(primary.all()).toEqual([rejected]);
    expect(first.all()).toEqual([rejected]);
    expect(second.all()).toEqual([rejected]);
  });

  it('notifies no subscriber when the primary log fails', async () => {
    const subscriber = new MemoryAuditLog();
    const sink = new CompositeAuditSink(failing('disk full'), [subscriber]);

    await expect(sink.append([rejected])).rejects.toThrow('disk full');
    expect(subscriber.all()).toEqual([]);
  });

  it('logs a failing subscriber and still reaches the rest', async () => {
    const primary = new MemoryAuditLog();
    const later = new MemoryAuditLog();
    const logger = { error: vi.fn() };
    const sink = new CompositeAuditSink(primary, [failing('socket closed'), later], logger);

    await sink.append([rejected]);

    expect(primary.all()).toEqual([rejected]);
    expect(later.all()).toEqual([rejected]);
    expect(logger.error).toHaveBeenCalledWith(
      '[LEDGER] Subscriber missed 1 event(s): Error: socket closed',
    );
  });

  it('leaves the ledger state committed when only a subscriber fails', async () => {
    const primary = new MemoryAuditLog();
    const local = makeLedger({
      audit: new CompositeAuditSink(primary, [failing('socket closed')], { error: vi.fn() }),
    });

    await postDefault(local.ledger);

    expect((await local.ledger.getJob(1))?.status).toBe('OPEN');
    expect(primary.all().map((e) => e.type)).toEqual(['JobPosted']);
    expect(local.logger.error).not.toHaveBeenCalled();
  });
});
