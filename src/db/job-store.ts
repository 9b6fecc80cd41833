import { and, asc, eq, sql, type SQL } from 'drizzle-orm';
import type { JobRecord } from '@shared/types';
import type { JobFilter, JobStore } from '@core/job-store';
import type { Database } from './connection';
import { jobs } from './schema/jobs';

/**
 * JobStore over the `jobs` table.
 */
export class DrizzleJobStore implements JobStore {
  constructor(private readonly db: Database) {}

  async allocateId(): Promise<number> {
    const result = await this.db.execute<{ id: string }>(
      sql`select nextval('job_id_seq') as id`,
    );
    const [row] = result.rows;
    if (!row) {
      throw new Error('job_id_seq returned no value');
    }
    return Number(row.id);
  }

  async get(id: number): Promise<JobRecord | undefined> {
    const [row] = await this.db.select().from(jobs).where(eq(jobs.id, id));
    return row ? { ...row } : undefined;
  }

  async put(job: JobRecord): Promise<void> {
    await this.db.insert(jobs).values(job).onConflictDoUpdate({ target: jobs.id, set: job });
  }

  async delete(id: number): Promise<void> {
    await this.db.delete(jobs).where(eq(jobs.id, id));
  }

  async list(filter: JobFilter = {}): Promise<JobRecord[]> {
    const conditions: SQL[] = [];
    if (filter.client !== undefined) conditions.push(eq(jobs.client, filter.client));
    if (filter.freelancer !== undefined) conditions.push(eq(jobs.freelancer, filter.freelancer));
    if (filter.status !== undefined) conditions.push(eq(jobs.status, filter.status));

    return this.db
      .select()
      .from(jobs)
      .where(and(...conditions))
      .orderBy(asc(jobs.id));
  }
}
