import type { UploadJobEntity } from '../../../domain/entities/upload-job.entity';

/**
 * Upload Job Repository Port (Driven Port)
 * Keyed by `jobId` (`<taskId>:<backendId>`).
 */
export interface UploadJobRepositoryPort {
  save(job: UploadJobEntity): Promise<void>;
  findById(jobId: string): Promise<UploadJobEntity | null>;
  findByTaskId(taskId: string): Promise<UploadJobEntity[]>;
  findAll(): Promise<UploadJobEntity[]>;
}
