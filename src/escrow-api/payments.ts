import type { TransferGateway } from '@core/collaborators';

/**
 * Moves value by POSTing `{ recipient, amount }` to a payments endpoint. Any
 * non-2xx answer counts as a failed transfer; network errors propagate.
 */
export class HttpTransferGateway implements TransferGateway {
  constructor(
    private readonly url: string,
    private readonly timeoutMs = 5000,
  ) {}

  async transfer(recipient: string, amount: number): Promise<boolean> {
    const res = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ recipient, amount }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      console.error(`[TRANSFER] ${this.url} answered ${res.status} for ${amount} to '${recipient}'`);
    }
    return res.ok;
  }
}

// Development stand-in when no payments endpoint is configured.
export class LoggingTransferGateway implements TransferGateway {
  async transfer(recipient: string, amount: number): Promise<boolean> {
    console.warn(`[TRANSFER] Simulated payout of ${amount} to '${recipient}'`);
    return true;
  }
}
