import type {
  ESCROW_ERROR_CODES,
  JOB_STATUSES,
  LEDGER_EVENTS,
  ROLES,
  SELF_SERVICE_ROLES,
  WS_EVENTS,
} from './constants';

export type JobStatus = (typeof JOB_STATUSES)[number];
export type Role = (typeof ROLES)[number];
export type SelfServiceRole = (typeof SELF_SERVICE_ROLES)[number];
export type LedgerEventType = (typeof LEDGER_EVENTS)[number];
export type EscrowErrorCode = (typeof ESCROW_ERROR_CODES)[number];

export interface JobRecord {
  id: number;
  client: string;
  freelancer: string | null;
  status: JobStatus;
  title: string;
  description: string;
  amount: number;
  deadline: number;
  proofHash: string;
  createdAt: number;
  updatedAt: number;
}

export type LedgerEvent =
  | { type: 'JobPosted'; jobId: number; client: string; amount: number }
  | { type: 'JobUpdated'; jobId: number }
  | { type: 'JobCancelled'; jobId: number; refundAmount: number }
  | { type: 'WorkSubmitted'; jobId: number; freelancer: string; proofHash: string }
  | { type: 'PaymentReleased'; jobId: number; amount: number }
  | { type: 'WorkRejected'; jobId: number };

export interface LedgerEventRecord {
  sequence: number;
  event: LedgerEvent;
  recordedAt: string;
}

export interface WsMessage {
  event: (typeof WS_EVENTS)[keyof typeof WS_EVENTS];
  data: unknown;
  timestamp: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: EscrowErrorCode;
}
