import { expect, vi } from 'vitest';
import {
  JobLedger,
  MemoryAuditLog,
  MemoryJobStore,
  RoleRegistry,
  type AuditSink,
  type Clock,
  type TransferGateway,
} from '@core/index';
import type { EscrowErrorCode } from '@shared/types';

export const T0 = 1_000_000;

export class ManualClock implements Clock {
  constructor(public current = T0) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export interface TransferCall {
  recipient: string;
  amount: number;
}

/**
 * Records every payout. `succeed` decides the outcome; `onTransfer` runs
 * before the outcome is returned, for calls back into the ledger.
 */
export class FakeTransfers implements TransferGateway {
  calls: TransferCall[] = [];
  succeed = true;
  onTransfer?: (call: TransferCall) => Promise<void>;

  async transfer(recipient: string, amount: number): Promise<boolean> {
    const call = { recipient, amount };
    this.calls.push(call);
    if (this.onTransfer) {
      await this.onTransfer(call);
    }
    return this.succeed;
  }
}

export interface LedgerHarness {
  ledger: JobLedger;
  roles: RoleRegistry;
  store: MemoryJobStore;
  audit: MemoryAuditLog;
  transfers: FakeTransfers;
  clock: ManualClock;
  logger: { warn: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };
}

export function makeLedger(options: { audit?: AuditSink } = {}): LedgerHarness {
  const roles = new RoleRegistry('admin');
  roles.grantSelf('alice', 'client');
  roles.grantSelf('dave', 'client');
  roles.grantSelf('bob', 'freelancer');
  roles.grantSelf('erin', 'freelancer');

  const store = new MemoryJobStore();
  const audit = new MemoryAuditLog();
  const transfers = new FakeTransfers();
  const clock = new ManualClock();
  const logger = { warn: vi.fn(), error: vi.fn() };

  const ledger = new JobLedger({
    store,
    authorizer: roles,
    transfers,
    audit: options.audit ?? audit,
    clock,
    logger,
  });

  return { ledger, roles, store, audit, transfers, clock, logger };
}

export function postDefault(ledger: JobLedger, caller = 'alice', value = 100): Promise<number> {
  return ledger.postJob(caller, {
    title: 'Logo design',
    description: 'Vector logo for a bakery',
    deadline: T0 + 10,
    value,
  });
}

export async function expectCode(promise: Promise<unknown>, code: EscrowErrorCode): Promise<void> {
  await expect(promise).rejects.toHaveProperty('code', code);
}
