// Host-provided capabilities the ledger consumes but does not implement.

export interface TransferGateway {
  /** Resolves `false` (or rejects) when the value could not be moved. */
  transfer(recipient: string, amount: number): Promise<boolean>;
}

export interface Clock {
  /** Current logical time in unix seconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

export type LedgerLogger = Pick<Console, 'warn' | 'error'>;
