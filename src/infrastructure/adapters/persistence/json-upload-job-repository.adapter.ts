import { join } from 'path';
import { z } from 'zod';
import type { UploadJobRepositoryPort } from '../../../application/ports/output/upload-job-repository.port';
import { UploadJobEntity } from '../../../domain/entities/upload-job.entity';
import { UPLOAD_BACKEND_IDS } from '../../../domain/value-objects/upload-backend-id.vo';
import { readJsonFile, writeJsonAtomic } from '../../../shared/fs/json-file';

export const UPLOAD_JOBS_FILE = 'upload-jobs.json';

const snapshotSchema = z.object({
  jobId: z.string(),
  taskId: z.string(),
  backendId: z.enum(UPLOAD_BACKEND_IDS),
  taskName: z.string(),
  baseDir: z.string(),
  files: z.array(z.string()),
  state: z.enum(['pending', 'in_progress', 'succeeded', 'failed_retryable', 'failed_permanent']),
  attempts: z.number().int().nonnegative(),
  maxAttempts: z.number().int().positive(),
  lastError: z.string().optional(),
  remoteLocation: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().optional(),
});

const jobTableSchema = z.object({
  version: z.literal(1),
  jobs: z.array(snapshotSchema),
});

/**
 * JSON Upload Job Repository Adapter
 * Implements UploadJobRepositoryPort with `<STATE_DIR>/upload-jobs.json`.
 *
 * The table is loaded once and rewritten in full on every save. Saves are
 * chained so concurrent writers never interleave their renames.
 */
export class JsonUploadJobRepositoryAdapter implements UploadJobRepositoryPort {
  private readonly filePath: string;
  private jobs: Map<string, UploadJobEntity> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(stateDir: string) {
    this.filePath = join(stateDir, UPLOAD_JOBS_FILE);
  }

  async save(job: UploadJobEntity): Promise<void> {
    const jobs = await this.table();
    jobs.set(job.jobId, job);

    const snapshot = { version: 1, jobs: Array.from(jobs.values(), UploadJobEntity.toJSON) };
    const write = this.writeChain.then(() => writeJsonAtomic(this.filePath, snapshot));
    this.writeChain = write.catch(() => undefined);
    await write;
  }

  async findById(jobId: string): Promise<UploadJobEntity | null> {
    const jobs = await this.table();
    return jobs.get(jobId) ?? null;
  }

  async findByTaskId(taskId: string): Promise<UploadJobEntity[]> {
    const jobs = await this.table();
    return Array.from(jobs.values()).filter((job) => job.taskId === taskId);
  }

  async findAll(): Promise<UploadJobEntity[]> {
    const jobs = await this.table();
    return Array.from(jobs.values());
  }

  private async table(): Promise<Map<string, UploadJobEntity>> {
    if (!this.jobs) {
      const stored = await readJsonFile(this.filePath, jobTableSchema);
      const loaded = new Map<string, UploadJobEntity>();
      for (const snapshot of stored?.jobs ?? []) {
        loaded.set(snapshot.jobId, UploadJobEntity.fromJSON(snapshot));
      }
      // A concurrent first call may have loaded already.
      this.jobs = this.jobs ?? loaded;
    }
    return this.jobs;
  }
}
