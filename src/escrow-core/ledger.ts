import { AsyncLocalStorage } from 'async_hooks';
import type { JobRecord, JobStatus, LedgerEvent } from '@shared/types';
import type { Authorizer } from './access-control';
import type { AuditSink } from './audit-log';
import { systemClock, type Clock, type LedgerLogger, type TransferGateway } from './collaborators';
import { EscrowError, TransferFailedError } from './errors';
import type { JobFilter, JobStore } from './job-store';
import {
  ACTION_ROLES,
  INITIAL_STATUS,
  INPUT_GUARDS,
  RECORD_GUARDS,
  VALUE_MOVING_ACTIONS,
  checkGuards,
  firstFailure,
  transition,
  type GuardContext,
  type JobAction,
  type RecordAction,
} from './state-machine';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface PostJobInput {
  title: string;
  description: string;
  deadline: number;
  value: number;
}

export interface UpdateJobInput {
  title: string;
  description: string;
  deadline: number;
  additionalValue?: number;
}

export interface JobLedgerDeps {
  store: JobStore;
  authorizer: Authorizer;
  transfers: TransferGateway;
  audit: AuditSink;
  clock?: Clock;
  logger?: LedgerLogger;
}

// ---------------------------------------------------------------------------
// Operation frames
// ---------------------------------------------------------------------------

interface JournalEntry {
  id: number;
  before: JobRecord | undefined;
}

/**
 * State shared by a top-level operation and every call nested inside it
 * (calls made back into the ledger from the transfer gateway).
 */
interface OperationFrame {
  journal: JournalEntry[];
  events: LedgerEvent[];
  valueLockHeld: boolean;
  /** Set once a transfer succeeds; from then on the operation cannot be undone. */
  valueMoved: boolean;
  active: boolean;
}

interface Savepoint {
  journalLength: number;
  eventCount: number;
}

/**
 * The job registry and its lifecycle operations.
 *
 * Top-level calls are applied one at a time in arrival order. Each call is
 * atomic: writes go to the store as they happen and are journalled, events are
 * buffered, and a failure anywhere restores every journalled pre-image and
 * drops the buffered events. Events reach the audit sink only on commit.
 * A completed payout cannot be taken back, so once one has gone through the
 * operation commits even if the audit sink then refuses its events.
 */
export class JobLedger {
  private readonly store: JobStore;
  private readonly authorizer: Authorizer;
  private readonly transfers: TransferGateway;
  private readonly audit: AuditSink;
  private readonly clock: Clock;
  private readonly logger: LedgerLogger;
  private readonly frames = new AsyncLocalStorage<OperationFrame>();
  private tail: Promise<void> = Promise.resolve();

  constructor(deps: JobLedgerDeps) {
    this.store = deps.store;
    this.authorizer = deps.authorizer;
    this.transfers = deps.transfers;
    this.audit = deps.audit;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? console;
  }

  // --- Lifecycle operations ---

  postJob(caller: string, input: PostJobInput): Promise<number> {
    return this.operate(caller, 'post_job', async (frame) => {
      const now = this.clock.now();
      this.checkInput('post_job', {
        now,
        input: { title: input.title, deadline: input.deadline, value: input.value },
      });

      const id = await this.store.allocateId();
      const job: JobRecord = {
        id,
        client: caller,
        freelancer: null,
        status: INITIAL_STATUS,
        title: input.title,
        description: input.description,
        amount: input.value,
        deadline: input.deadline,
        proofHash: '',
        createdAt: now,
        updatedAt: now,
      };
      await this.write(frame, undefined, job);
      frame.events.push({ type: 'JobPosted', jobId: id, client: caller, amount: input.value });
      return id;
    });
  }

  updateJob(caller: string, jobId: number, input: UpdateJobInput): Promise<void> {
    return this.operate(caller, 'update_job', async (frame) => {
      const now = this.clock.now();
      const additional = input.additionalValue ?? 0;
      this.checkInput('update_job', {
        now,
        input: { title: input.title, deadline: input.deadline, value: additional },
      });

      const job = await this.load(jobId);
      this.requireClient(job, caller);
      this.advance(job, 'update_job', now, { value: additional });

      await this.write(frame, job, {
        ...job,
        title: input.title,
        description: input.description,
        deadline: input.deadline,
        amount: additional > 0 ? job.amount + additional : job.amount,
        updatedAt: now,
      });
      frame.events.push({ type: 'JobUpdated', jobId });
    });
  }

  cancelJob(caller: string, jobId: number): Promise<void> {
    return this.operate(caller, 'cancel_job', async (frame) => {
      const now = this.clock.now();
      const job = await this.load(jobId);
      this.requireClient(job, caller);
      const status = this.advance(job, 'cancel_job', now);

      const refundAmount = job.amount;
      await this.write(frame, job, { ...job, status, amount: 0, updatedAt: now });
      frame.events.push({ type: 'JobCancelled', jobId, refundAmount });

      if (refundAmount > 0) {
        await this.pay(frame, job.client, refundAmount);
      }
    });
  }

  submitWork(caller: string, jobId: number, proofHash: string): Promise<void> {
    return this.operate(caller, 'submit_work', async (frame) => {
      const now = this.clock.now();
      const job = await this.load(jobId);
      const status = this.advance(job, 'submit_work', now, { proofHash });

      await this.write(frame, job, {
        ...job,
        freelancer: caller,
        proofHash,
        status,
        updatedAt: now,
      });
      frame.events.push({ type: 'WorkSubmitted', jobId, freelancer: caller, proofHash });
    });
  }

  approveWork(caller: string, jobId: number): Promise<void> {
    return this.operate(caller, 'approve_work', async (frame) => {
      const now = this.clock.now();
      const job = await this.load(jobId);
      this.requireClient(job, caller);
      const status = this.advance(job, 'approve_work', now);

      const { freelancer, amount } = job;
      if (!freelancer) {
        throw new EscrowError('NoWorkSubmitted', `Job ${jobId} has no freelancer to pay`);
      }

      await this.write(frame, job, {
        ...job,
        status,
        amount: 0,
        freelancer: null,
        updatedAt: now,
      });
      await this.pay(frame, freelancer, amount);
      frame.events.push({ type: 'PaymentReleased', jobId, amount });
    });
  }

  rejectWork(caller: string, jobId: number): Promise<void> {
    return this.operate(caller, 'reject_work', async (frame) => {
      const now = this.clock.now();
      const job = await this.load(jobId);
      this.requireClient(job, caller);
      const status = this.advance(job, 'reject_work', now);

      await this.write(frame, job, {
        ...job,
        freelancer: null,
        proofHash: '',
        status,
        updatedAt: now,
      });
      frame.events.push({ type: 'WorkRejected', jobId });
    });
  }

  // --- Queries ---

  getJob(jobId: number): Promise<JobRecord | undefined> {
    return this.read(() => this.store.get(jobId));
  }

  listJobs(filter?: JobFilter): Promise<JobRecord[]> {
    return this.read(() => this.store.list(filter));
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  private operate<T>(
    caller: string,
    action: JobAction,
    body: (frame: OperationFrame) => Promise<T>,
  ): Promise<T> {
    const outer = this.activeFrame();
    if (outer) {
      return this.runInFrame(outer, caller, action, body);
    }
    return this.enqueue(() => {
      const frame: OperationFrame = {
        journal: [],
        events: [],
        valueLockHeld: false,
        valueMoved: false,
        active: true,
      };
      return this.frames.run(frame, () => this.runTopLevel(frame, caller, action, body));
    });
  }

  private read<T>(query: () => Promise<T>): Promise<T> {
    return this.activeFrame() ? query() : this.enqueue(query);
  }

  // Work scheduled from inside an operation that outlives it starts afresh.
  private activeFrame(): OperationFrame | undefined {
    const frame = this.frames.getStore();
    return frame?.active ? frame : undefined;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async runTopLevel<T>(
    frame: OperationFrame,
    caller: string,
    action: JobAction,
    body: (frame: OperationFrame) => Promise<T>,
  ): Promise<T> {
    try {
      const result = await this.runInFrame(frame, caller, action, body);
      try {
        await this.audit.append(frame.events);
      } catch (err) {
        if (frame.valueMoved) {
          this.logger.error(
            `[LEDGER] '${action}' moved value but could not record its events: ${String(err)}`,
          );
          return result;
        }
        this.logger.error(`[LEDGER] '${action}' could not record its events; rolling back`);
        await this.rollback(frame, { journalLength: 0, eventCount: 0 }, action);
        throw err;
      }
      return result;
    } finally {
      frame.active = false;
    }
  }

  private async runInFrame<T>(
    frame: OperationFrame,
    caller: string,
    action: JobAction,
    body: (frame: OperationFrame) => Promise<T>,
  ): Promise<T> {
    const guarded = VALUE_MOVING_ACTIONS.has(action);
    if (guarded && frame.valueLockHeld) {
      throw new EscrowError('ReentrantCall', `'${action}' re-entered while a payout is in flight`);
    }
    if (!this.authorizer.hasRole(caller, ACTION_ROLES[action])) {
      throw new EscrowError(
        'Unauthorized',
        `'${caller}' lacks the ${ACTION_ROLES[action]} role required for '${action}'`,
      );
    }

    const savepoint: Savepoint = {
      journalLength: frame.journal.length,
      eventCount: frame.events.length,
    };
    if (guarded) frame.valueLockHeld = true;
    try {
      return await body(frame);
    } catch (err) {
      await this.rollback(frame, savepoint, action);
      throw err;
    } finally {
      if (guarded) frame.valueLockHeld = false;
    }
  }

  /**
   * Restores every record written since the savepoint, newest first, and
   * drops the events buffered since then.
   */
  private async rollback(frame: OperationFrame, savepoint: Savepoint, action: JobAction): Promise<void> {
    frame.events.length = savepoint.eventCount;
    if (frame.journal.length === savepoint.journalLength) return;

    const undo = frame.journal.splice(savepoint.journalLength).reverse();
    this.logger.warn(`[LEDGER] Rolling back ${undo.length} write(s) from '${action}'`);
    for (const entry of undo) {
      if (entry.before) {
        await this.store.put(entry.before);
      } else {
        await this.store.delete(entry.id);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Steps
  // -------------------------------------------------------------------------

  private checkInput(action: JobAction, ctx: GuardContext): void {
    const failed = firstFailure(checkGuards(INPUT_GUARDS[action], ctx));
    if (failed?.code) {
      throw new EscrowError(failed.code, failed.reason);
    }
  }

  private async load(jobId: number): Promise<JobRecord> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new EscrowError('JobNotFound', `Job ${jobId} does not exist`);
    }
    return job;
  }

  private requireClient(job: JobRecord, caller: string): void {
    if (job.client !== caller) {
      throw new EscrowError('Unauthorized', `'${caller}' is not the client of job ${job.id}`);
    }
  }

  /**
   * Checks the transition and the record guards for `action`, returning the
   * status the job moves to.
   */
  private advance(
    job: JobRecord,
    action: RecordAction,
    now: number,
    input: GuardContext['input'] = {},
  ): JobStatus {
    const result = transition(job.status, action);
    if (!result.ok) {
      throw new EscrowError(result.code, result.error);
    }
    const failed = firstFailure(checkGuards(RECORD_GUARDS[action], { now, input, job }));
    if (failed?.code) {
      throw new EscrowError(failed.code, failed.reason);
    }
    return result.newState;
  }

  private async write(
    frame: OperationFrame,
    before: JobRecord | undefined,
    after: JobRecord,
  ): Promise<void> {
    frame.journal.push({ id: after.id, before });
    await this.store.put(after);
  }

  private async pay(frame: OperationFrame, recipient: string, amount: number): Promise<void> {
    let ok: boolean;
    try {
      ok = await this.transfers.transfer(recipient, amount);
    } catch (err) {
      this.logger.error(`[TRANSFER] ${amount} to '${recipient}' threw: ${String(err)}`);
      throw new TransferFailedError(recipient, amount, err);
    }
    if (!ok) {
      this.logger.error(`[TRANSFER] ${amount} to '${recipient}' was declined`);
      throw new TransferFailedError(recipient, amount);
    }
    frame.valueMoved = true;
  }
}
