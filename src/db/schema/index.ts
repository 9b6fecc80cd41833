export { jobs, jobIdSequence } from './jobs';
export { ledgerEvents } from './ledger-events';
