import { asc, eq } from 'drizzle-orm';
import type { LedgerEvent, LedgerEventRecord } from '@shared/types';
import type { AuditReader, AuditSink } from '@core/audit-log';
import type { Database } from './connection';
import { ledgerEvents } from './schema/ledger-events';

export class DrizzleAuditLog implements AuditSink, AuditReader {
  constructor(private readonly db: Database) {}

  // A single multi-row insert, so the batch lands whole or not at all.
  async append(events: readonly LedgerEvent[]): Promise<void> {
    if (events.length === 0) return;
    await this.db.insert(ledgerEvents).values(
      events.map((event) => ({ jobId: event.jobId, type: event.type, payload: event })),
    );
  }

  async eventsForJob(jobId: number): Promise<LedgerEventRecord[]> {
    const rows = await this.db
      .select()
      .from(ledgerEvents)
      .where(eq(ledgerEvents.jobId, jobId))
      .orderBy(asc(ledgerEvents.sequence));
    return rows.map((row) => ({
      sequence: row.sequence,
      event: row.payload,
      recordedAt: row.createdAt.toISOString(),
    }));
  }
}
