import { JOB_ACTIONS, TERMINAL_STATUSES } from '@shared/constants';
import type { EscrowErrorCode, JobRecord, JobStatus, Role } from '@shared/types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type JobAction = (typeof JOB_ACTIONS)[number];

/** Actions that operate on an existing record. */
export type RecordAction = Exclude<JobAction, 'post_job'>;

export interface JobInput {
  title?: string;
  deadline?: number;
  value?: number;
  proofHash?: string;
}

export interface GuardContext {
  now: number;
  input: JobInput;
  job?: JobRecord;
}

export interface GuardResult {
  guardName: string;
  passed: boolean;
  code?: EscrowErrorCode;
  reason?: string;
}

export interface TransitionSuccess {
  ok: true;
  newState: JobStatus;
}

export interface TransitionFailure {
  ok: false;
  code: EscrowErrorCode;
  error: string;
}

export type TransitionResult = TransitionSuccess | TransitionFailure;

// ---------------------------------------------------------------------------
// Role Requirements
// ---------------------------------------------------------------------------

export const ACTION_ROLES: Record<JobAction, Role> = {
  post_job: 'client',
  update_job: 'client',
  cancel_job: 'client',
  submit_work: 'freelancer',
  approve_work: 'client',
  reject_work: 'client',
};

/** Actions that move escrowed value and therefore run under the reentrancy guard. */
export const VALUE_MOVING_ACTIONS: ReadonlySet<JobAction> = new Set<JobAction>([
  'cancel_job',
  'approve_work',
]);

// ---------------------------------------------------------------------------
// Transition Table
// ---------------------------------------------------------------------------

// IN_REVIEW is reserved: nothing enters or leaves it.
export const TRANSITION_TABLE: Partial<
  Record<JobStatus, Partial<Record<RecordAction, JobStatus>>>
> = {
  OPEN: {
    update_job: 'OPEN',
    cancel_job: 'CANCELLED',
    submit_work: 'SUBMITTED',
  },
  SUBMITTED: {
    approve_work: 'COMPLETED',
    reject_work: 'OPEN',
  },
};

export const INITIAL_STATUS: JobStatus = 'OPEN';

/** Error reported when an action is attempted from a state it is not valid in. */
export const WRONG_STATE_ERRORS: Record<RecordAction, EscrowErrorCode> = {
  update_job: 'JobNotOpen',
  cancel_job: 'JobNotOpen',
  submit_work: 'JobNotOpen',
  approve_work: 'NoWorkSubmitted',
  reject_work: 'NoWorkSubmitted',
};

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.some((terminal) => terminal === status);
}

// ---------------------------------------------------------------------------
// Guard Functions
// ---------------------------------------------------------------------------

type GuardFn = (ctx: GuardContext) => GuardResult;

export function guardTitlePresent(ctx: GuardContext): GuardResult {
  if (ctx.input.title) {
    return { guardName: 'guardTitlePresent', passed: true };
  }
  return {
    guardName: 'guardTitlePresent',
    passed: false,
    code: 'EmptyField',
    reason: 'Title must not be empty',
  };
}

export function guardDeadlineSet(ctx: GuardContext): GuardResult {
  if (ctx.input.deadline) {
    return { guardName: 'guardDeadlineSet', passed: true };
  }
  return {
    guardName: 'guardDeadlineSet',
    passed: false,
    code: 'EmptyField',
    reason: 'Deadline must be set',
  };
}

/**
 * A deadline must lie strictly after the current time when it is written.
 */
export function guardDeadlineInFuture(ctx: GuardContext): GuardResult {
  const deadline = ctx.input.deadline ?? 0;
  if (deadline > ctx.now) {
    return { guardName: 'guardDeadlineInFuture', passed: true };
  }
  return {
    guardName: 'guardDeadlineInFuture',
    passed: false,
    code: 'InvalidDeadline',
    reason: `Deadline ${deadline} is not after ${ctx.now}`,
  };
}

export function guardDepositPositive(ctx: GuardContext): GuardResult {
  const value = ctx.input.value ?? 0;
  if (value > 0) {
    return { guardName: 'guardDepositPositive', passed: true };
  }
  return {
    guardName: 'guardDepositPositive',
    passed: false,
    code: 'NoValueDeposited',
    reason: 'A positive deposit is required',
  };
}

export function guardDepositNonNegative(ctx: GuardContext): GuardResult {
  const value = ctx.input.value ?? 0;
  if (value >= 0) {
    return { guardName: 'guardDepositNonNegative', passed: true };
  }
  return {
    guardName: 'guardDepositNonNegative',
    passed: false,
    code: 'NoValueDeposited',
    reason: 'Escrowed value can only be added while a job is open',
  };
}

/**
 * The escrow held after the deposit (the stored amount plus the new value)
 * must stay an exact integer.
 */
export function guardEscrowWithinRange(ctx: GuardContext): GuardResult {
  const total = (ctx.job?.amount ?? 0) + (ctx.input.value ?? 0);
  if (Number.isSafeInteger(total)) {
    return { guardName: 'guardEscrowWithinRange', passed: true };
  }
  return {
    guardName: 'guardEscrowWithinRange',
    passed: false,
    code: 'NoValueDeposited',
    reason: `Escrow total ${total} exceeds ${Number.MAX_SAFE_INTEGER}`,
  };
}

/**
 * Submission is accepted up to and including the stored deadline.
 */
export function guardBeforeDeadline(ctx: GuardContext): GuardResult {
  if (!ctx.job) {
    return {
      guardName: 'guardBeforeDeadline',
      passed: false,
      code: 'JobNotFound',
      reason: 'No job to check the deadline against',
    };
  }
  if (ctx.now <= ctx.job.deadline) {
    return { guardName: 'guardBeforeDeadline', passed: true };
  }
  return {
    guardName: 'guardBeforeDeadline',
    passed: false,
    code: 'InvalidDeadline',
    reason: `Deadline ${ctx.job.deadline} passed at ${ctx.now}`,
  };
}

export function guardProofPresent(ctx: GuardContext): GuardResult {
  if (ctx.input.proofHash) {
    return { guardName: 'guardProofPresent', passed: true };
  }
  return {
    guardName: 'guardProofPresent',
    passed: false,
    code: 'EmptyField',
    reason: 'Proof reference must not be empty',
  };
}

/**
 * Guards on the request itself, evaluated before the record is looked up.
 * Order matters: the first failing guard decides the error.
 */
export const INPUT_GUARDS: Record<JobAction, GuardFn[]> = {
  post_job: [
    guardTitlePresent,
    guardDeadlineSet,
    guardDeadlineInFuture,
    guardDepositPositive,
    guardEscrowWithinRange,
  ],
  update_job: [
    guardTitlePresent,
    guardDeadlineSet,
    guardDeadlineInFuture,
    guardDepositNonNegative,
  ],
  cancel_job: [],
  submit_work: [],
  approve_work: [],
  reject_work: [],
};

/**
 * Guards evaluated against the stored record once the state check passed.
 */
export const RECORD_GUARDS: Record<JobAction, GuardFn[]> = {
  post_job: [],
  update_job: [guardEscrowWithinRange],
  cancel_job: [],
  submit_work: [guardBeforeDeadline, guardProofPresent],
  approve_work: [],
  reject_work: [],
};

export function checkGuards(guards: GuardFn[], ctx: GuardContext): GuardResult[] {
  return guards.map((fn) => fn(ctx));
}

export function firstFailure(results: GuardResult[]): GuardResult | undefined {
  return results.find((g) => !g.passed);
}

// ---------------------------------------------------------------------------
// Transition Reducer
// ---------------------------------------------------------------------------

/**
 * Pure reducer: given the current status and an action on an existing job,
 * returns the next status or the error code the action fails with.
 */
export function transition(currentState: JobStatus, action: RecordAction): TransitionResult {
  const stateTransitions = TRANSITION_TABLE[currentState];
  const newState = stateTransitions?.[action];

  if (!newState) {
    return {
      ok: false,
      code: WRONG_STATE_ERRORS[action],
      error: `Action '${action}' is not valid in state '${currentState}'`,
    };
  }

  return { ok: true, newState };
}
