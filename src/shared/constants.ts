export const API_PREFIX = '/api';

export const CALLER_HEADER = 'x-caller-id';

export const WS_EVENTS = {
  CONNECTION_ESTABLISHED: 'connection_established',
  HEARTBEAT: 'heartbeat',
  LEDGER_EVENT: 'ledger_event',
} as const;

export const JOB_STATUSES = [
  'OPEN',
  'SUBMITTED',
  'IN_REVIEW',
  'COMPLETED',
  'CANCELLED',
] as const;

export const TERMINAL_STATUSES = ['COMPLETED', 'CANCELLED'] as const;

export const JOB_ACTIONS = [
  'post_job',
  'update_job',
  'cancel_job',
  'submit_work',
  'approve_work',
  'reject_work',
] as const;

export const ROLES = ['administrator', 'client', 'freelancer'] as const;

export const SELF_SERVICE_ROLES = ['client', 'freelancer'] as const;

export const LEDGER_EVENTS = [
  'JobPosted',
  'JobUpdated',
  'JobCancelled',
  'WorkSubmitted',
  'PaymentReleased',
  'WorkRejected',
] as const;

export const ESCROW_ERROR_CODES = [
  'Unauthorized',
  'NoValueDeposited',
  'JobNotOpen',
  'JobNotFound',
  'NoWorkSubmitted',
  'EmptyField',
  'InvalidDeadline',
  'TransferFailed',
  'ReentrantCall',
  'LastAdministrator',
] as const;
