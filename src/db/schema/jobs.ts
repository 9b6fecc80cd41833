import { pgTable, pgSequence, integer, text, bigint } from 'drizzle-orm/pg-core';
import { JOB_STATUSES } from '../../shared/constants';

// Ids are drawn from the sequence before the row is written, so a rolled-back
// job leaves a gap instead of a reusable id.
export const jobIdSequence = pgSequence('job_id_seq', { startWith: 1, increment: 1 });

export const jobs = pgTable('jobs', {
  id: integer('id').primaryKey(),
  client: text('client').notNull(),
  freelancer: text('freelancer'),
  status: text('status', { enum: JOB_STATUSES }).notNull().default('OPEN'),
  title: text('title').notNull(),
  description: text('description').notNull().default(''),
  amount: bigint('amount', { mode: 'number' }).notNull(),
  deadline: bigint('deadline', { mode: 'number' }).notNull(),
  proofHash: text('proof_hash').notNull().default(''),
  createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
});
