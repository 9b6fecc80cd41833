import type { LedgerEvent, LedgerEventRecord } from '@shared/types';
import type { LedgerLogger } from './collaborators';

/**
 * Append-only sink for committed ledger events. One call carries every event
 * of one operation and must record all of them or none.
 */
export interface AuditSink {
  append(events: readonly LedgerEvent[]): Promise<void>;
}

export interface AuditReader {
  eventsForJob(jobId: number): Promise<LedgerEventRecord[]>;
}

export class MemoryAuditLog implements AuditSink, AuditReader {
  private readonly records: LedgerEventRecord[] = [];

  async append(events: readonly LedgerEvent[]): Promise<void> {
    const recordedAt = new Date().toISOString();
    for (const event of events) {
      this.records.push({ sequence: this.records.length + 1, event: { ...event }, recordedAt });
    }
  }

  async eventsForJob(jobId: number): Promise<LedgerEventRecord[]> {
    return this.records.filter((r) => r.event.jobId === jobId);
  }

  all(): LedgerEvent[] {
    return this.records.map((r) => r.event);
  }
}

/**
 * Records events in the primary log, then notifies subscribers. Only the
 * primary can fail an operation; subscribers see events that are already
 * recorded, so their failures are logged and dropped.
 */
export class CompositeAuditSink implements AuditSink {
  constructor(
    private readonly primary: AuditSink,
    private readonly subscribers: AuditSink[] = [],
    private readonly logger: Pick<LedgerLogger, 'error'> = console,
  ) {}

  async append(events: readonly LedgerEvent[]): Promise<void> {
    await this.primary.append(events);
    for (const subscriber of this.subscribers) {
      try {
        await subscriber.append(events);
      } catch (err) {
        this.logger.error(`[LEDGER] Subscriber missed ${events.length} event(s): ${String(err)}`);
      }
    }
  }
}
