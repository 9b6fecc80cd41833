import { RoleRegistry } from '@core/access-control';
import { CompositeAuditSink, MemoryAuditLog, type AuditReader, type AuditSink } from '@core/audit-log';
import type { Clock, LedgerLogger, TransferGateway } from '@core/collaborators';
import { MemoryJobStore, type JobStore } from '@core/job-store';
import { JobLedger } from '@core/ledger';
import { connectDatabase } from '@db/connection';
import { DrizzleJobStore } from '@db/job-store';
import { DrizzleAuditLog } from '@db/audit-log';

export interface EscrowServices {
  ledger: JobLedger;
  roles: RoleRegistry;
  events: AuditReader;
  close(): Promise<void>;
}

export interface ServiceOptions {
  adminId: string;
  transfers: TransferGateway;
  /** PostgreSQL connection string; in-memory storage when absent. */
  databaseUrl?: string;
  /** Notified once the audit log has recorded an operation's events. */
  sinks?: AuditSink[];
  clock?: Clock;
  logger?: LedgerLogger;
}

/**
 * Wires the ledger to its storage. With a database URL, jobs and events are
 * kept in PostgreSQL. Roles are always held in memory for the lifetime of the
 * process: after a restart only `adminId` is an administrator, and clients and
 * freelancers register again before acting on their stored jobs.
 */
export function createServices(options: ServiceOptions): EscrowServices {
  let store: JobStore;
  let log: AuditSink & AuditReader;
  let close = async (): Promise<void> => {};

  if (options.databaseUrl) {
    const handle = connectDatabase(options.databaseUrl);
    store = new DrizzleJobStore(handle.db);
    log = new DrizzleAuditLog(handle.db);
    close = handle.close;
  } else {
    store = new MemoryJobStore();
    log = new MemoryAuditLog();
  }

  const roles = new RoleRegistry(options.adminId);
  const ledger = new JobLedger({
    store,
    authorizer: roles,
    transfers: options.transfers,
    audit: new CompositeAuditSink(log, options.sinks ?? [], options.logger),
    clock: options.clock,
    logger: options.logger,
  });

  return { ledger, roles, events: log, close };
}
