import type { EscrowErrorCode } from '@shared/types';

export class EscrowError extends Error {
  readonly code: EscrowErrorCode;

  constructor(code: EscrowErrorCode, message?: string) {
    super(message ?? code);
    this.name = 'EscrowError';
    this.code = code;
  }
}

export function isEscrowError(err: unknown): err is EscrowError {
  return err instanceof EscrowError;
}

/**
 * Raised when the transfer primitive reports failure. Carries the original
 * error, if the gateway threw rather than returning `false`.
 */
export class TransferFailedError extends EscrowError {
  readonly recipient: string;
  readonly amount: number;

  constructor(recipient: string, amount: number, cause?: unknown) {
    super('TransferFailed', `Transfer of ${amount} to '${recipient}' failed`);
    this.name = 'TransferFailedError';
    this.recipient = recipient;
    this.amount = amount;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}
