import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, readdir } from 'fs/promises';
import { join } from 'path';
import {
  JsonSeenTaskStoreAdapter,
  SEEN_TASKS_FILE,
} from '../../../../src/infrastructure/adapters/persistence/json-seen-task-store.adapter';
import {
  JsonUploadJobRepositoryAdapter,
  UPLOAD_JOBS_FILE,
} from '../../../../src/infrastructure/adapters/persistence/json-upload-job-repository.adapter';
import { UploadJobEntity } from '../../../../src/domain/entities/upload-job.entity';
import { createTempDir, removeTempDir, writeTestFile } from '../../helpers/mock-factories';

describe('JSON state adapters', () => {
  let stateDir: string;

  beforeEach(async () => {
    stateDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(stateDir);
  });

  describe('JsonSeenTaskStoreAdapter', () => {
    it('should start empty without a file', async () => {
      const store = new JsonSeenTaskStoreAdapter(join(stateDir, 'nested'));

      await expect(store.load()).resolves.toEqual(new Set());
    });

    it('should persist task ids sorted', async () => {
      await new JsonSeenTaskStoreAdapter(stateDir).save(new Set(['b2', 'a1']));

      const raw = JSON.parse(await readFile(join(stateDir, SEEN_TASKS_FILE), 'utf-8'));
      expect(raw).toEqual({ version: 1, taskIds: ['a1', 'b2'] });
      await expect(new JsonSeenTaskStoreAdapter(stateDir).load()).resolves.toEqual(new Set(['a1', 'b2']));
    });

    it('should leave no temp files behind', async () => {
      const store = new JsonSeenTaskStoreAdapter(stateDir);

      await Promise.all([store.save(new Set(['a'])), store.save(new Set(['a', 'b']))]);

      await expect(readdir(stateDir)).resolves.toEqual([SEEN_TASKS_FILE]);
    });

    it('should reject a corrupt file', async () => {
      await writeTestFile(join(stateDir, SEEN_TASKS_FILE), JSON.stringify({ version: 2, taskIds: [] }));

      await expect(new JsonSeenTaskStoreAdapter(stateDir).load()).rejects.toThrow(/^Invalid state file .*version/);
    });
  });

  describe('JsonUploadJobRepositoryAdapter', () => {
    const job = (taskId: string, backendId: 's3' | 'telegram') =>
      UploadJobEntity.create({
        taskId,
        backendId,
        taskName: `${taskId}.iso`,
        baseDir: '/downloads',
        files: [`/downloads/${taskId}.iso`],
        maxAttempts: 3,
      });

    it('should persist jobs across instances', async () => {
      const first = new JsonUploadJobRepositoryAdapter(stateDir);
      const saved = UploadJobEntity.markSucceeded(UploadJobEntity.startAttempt(job('gid-1', 's3')), 's3://b/k');
      await first.save(saved);

      const second = new JsonUploadJobRepositoryAdapter(stateDir);

      await expect(second.findById('gid-1:s3')).resolves.toEqual(saved);
      await expect(second.findById('gid-1:telegram')).resolves.toBeNull();
    });

    it('should replace a job on save and query by task', async () => {
      const repository = new JsonUploadJobRepositoryAdapter(stateDir);
      await repository.save(job('gid-1', 's3'));
      await repository.save(job('gid-1', 'telegram'));
      await repository.save(job('gid-2', 's3'));
      await repository.save(UploadJobEntity.startAttempt(job('gid-1', 's3')));

      const forTask = await repository.findByTaskId('gid-1');

      expect(forTask.map((entry) => `${entry.jobId}:${entry.state}`)).toEqual([
        'gid-1:s3:in_progress',
        'gid-1:telegram:pending',
      ]);
      await expect(repository.findAll()).resolves.toHaveLength(3);
    });

    it('should keep every job when saves run concurrently', async () => {
      const repository = new JsonUploadJobRepositoryAdapter(stateDir);

      await Promise.all(
        ['a', 'b', 'c', 'd', 'e'].map((taskId) => repository.save(job(taskId, 's3'))),
      );

      const reloaded = await new JsonUploadJobRepositoryAdapter(stateDir).findAll();
      expect(reloaded.map((entry) => entry.taskId).sort()).toEqual(['a', 'b', 'c', 'd', 'e']);
      await expect(readdir(stateDir)).resolves.toEqual([UPLOAD_JOBS_FILE]);
    });
  });
});
