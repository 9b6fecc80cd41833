import type { JobRecord, JobStatus } from '@shared/types';

export interface JobFilter {
  client?: string;
  freelancer?: string;
  status?: JobStatus;
}

/**
 * Key-value storage for job records. Implementations hand out copies, so a
 * record read from the store is never aliased by a later write.
 */
export interface JobStore {
  allocateId(): Promise<number>;
  get(id: number): Promise<JobRecord | undefined>;
  put(job: JobRecord): Promise<void>;
  /** Only used to undo the creation of a record by a rolled-back operation. */
  delete(id: number): Promise<void>;
  list(filter?: JobFilter): Promise<JobRecord[]>;
}

export function matchesFilter(job: JobRecord, filter: JobFilter = {}): boolean {
  if (filter.client !== undefined && job.client !== filter.client) return false;
  if (filter.freelancer !== undefined && job.freelancer !== filter.freelancer) return false;
  if (filter.status !== undefined && job.status !== filter.status) return false;
  return true;
}

export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<number, JobRecord>();
  private lastId = 0;

  async allocateId(): Promise<number> {
    this.lastId += 1;
    return this.lastId;
  }

  async get(id: number): Promise<JobRecord | undefined> {
    const job = this.jobs.get(id);
    return job ? { ...job } : undefined;
  }

  async put(job: JobRecord): Promise<void> {
    this.jobs.set(job.id, { ...job });
  }

  async delete(id: number): Promise<void> {
    this.jobs.delete(id);
  }

  async list(filter?: JobFilter): Promise<JobRecord[]> {
    return [...this.jobs.values()]
      .filter((job) => matchesFilter(job, filter))
      .sort((a, b) => a.id - b.id)
      .map((job) => ({ ...job }));
  }
}
