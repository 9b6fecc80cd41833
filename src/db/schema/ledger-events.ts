import { pgTable, serial, integer, text, jsonb, timestamp } from 'drizzle-orm/pg-core';
import type { LedgerEvent, LedgerEventType } from '../../shared/types';
import { jobs } from './jobs';

export const ledgerEvents = pgTable('ledger_events', {
  sequence: serial('sequence').primaryKey(),
  jobId: integer('job_id').notNull().references(() => jobs.id),
  type: text('type').$type<LedgerEventType>().notNull(),
  payload: jsonb('payload').$type<LedgerEvent>().notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
