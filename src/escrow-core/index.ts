// escrow-core: the job lifecycle state machine, role registry and ledger.
// No HTTP and no database here; storage, transfers, audit and time are
// injected through the interfaces in job-store, collaborators and audit-log.

export const ESCROW_CORE_VERSION = '0.1.0';

export * from './errors';
export * from './access-control';
export * from './state-machine';
export * from './job-store';
export * from './audit-log';
export * from './collaborators';
export * from './ledger';
