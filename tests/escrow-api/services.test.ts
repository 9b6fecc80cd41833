import { describe, it, expect, vi } from 'vitest';
import { createServices } from '@api/services';
import { FakeTransfers, ManualClock, postDefault } from '../helpers/ledger';

function build() {
  return createServices({
    adminId: 'admin',
    transfers: new FakeTransfers(),
    clock: new ManualClock(),
    logger: { warn: vi.fn(), error: vi.fn() },
  });
}

describe('createServices', () => {
  it('starts each instance with only the configured administrator', async () => {
    const first = build();
    first.roles.grantSelf('alice', 'client');
    first.roles.grantAdmin('admin', 'ops');

    const second = build();

    expect(second.roles.admins()).toEqual(['admin']);
    expect(second.roles.rolesOf('alice')).toEqual([]);
    expect(first.roles.rolesOf('alice')).toEqual(['client']);
    await Promise.all([first.close(), second.close()]);
  });

  it('keeps jobs and events in memory without a database URL', async () => {
    const services = build();
    services.roles.grantSelf('alice', 'client');

    await postDefault(services.ledger);

    expect((await services.ledger.getJob(1))?.amount).toBe(100);
    const records = await services.events.eventsForJob(1);
    expect(records.map((r) => r.event.type)).toEqual(['JobPosted']);
    await services.close();
  });
});
