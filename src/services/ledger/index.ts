// src/services/ledger/index.ts

export { ContentLedger } from './ContentLedger';
export type { ContentLedgerOptions, VoteOutcome, RemovalOutcome } from './ContentLedger';
export { AccessControl } from './AccessControl';
export { InMemoryActionLog } from './ActionLog';
export type { ActionLog, ActionListener, ActionSource } from './ActionLog';
export { ReputationLedger } from './ReputationLedger';
export type { LedgerTotals } from './QueryFacade';
export { MAX_BATCH } from './validation';
