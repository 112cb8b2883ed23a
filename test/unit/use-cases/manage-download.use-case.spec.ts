import { describe, it, expect, beforeEach } from 'vitest';
import { ManageDownloadUseCase } from '../../../src/application/use-cases/manage-download.use-case';
import { Aria2RpcClient } from '../../../src/infrastructure/adapters/rpc/aria2-rpc.client';
import { FakeAria2Daemon, InMemoryLocalFilesAdapter } from '../../in-memory-adapters';
import { createDaemonHandle, createTestLogger } from '../helpers/mock-factories';

describe('ManageDownloadUseCase', () => {
  const handle = createDaemonHandle();
  let daemon: FakeAria2Daemon;
  let localFiles: InMemoryLocalFilesAdapter;
  let useCase: ManageDownloadUseCase;

  beforeEach(() => {
    daemon = new FakeAria2Daemon({ secret: handle.rpc.secret, downloadDir: handle.downloadDir });
    localFiles = new InMemoryLocalFilesAdapter();
    const logger = createTestLogger();
    const rpc = new Aria2RpcClient(daemon, handle, { timeoutMs: 1000 }, logger);
    useCase = new ManageDownloadUseCase(rpc, localFiles, handle, logger);
  });

  describe('pause / resume', () => {
    it('should pause an active task', async () => {
      const gid = daemon.addTask({ status: 'active' });

      const result = await useCase.execute({ taskId: gid, action: 'pause' });

      expect(result).toEqual({ ok: true, value: { taskId: gid, action: 'pause', filesDeleted: false } });
      expect(daemon.getTask(gid)?.status).toBe('paused');
    });

    it('should resume a paused task into the waiting queue', async () => {
      const gid = daemon.addTask({ status: 'paused' });

      await useCase.execute({ taskId: gid, action: 'resume' });

      expect(daemon.getTask(gid)?.status).toBe('waiting');
    });

    it('should report an unknown task id', async () => {
      const result = await useCase.execute({ taskId: 'ffffffffffffffff', action: 'pause' });

      expect(result).toEqual({
        ok: false,
        error: { code: 'REMOTE_ERROR', message: 'GID ffffffffffffffff is not found' },
      });
    });

    it('should reject a blank task id', async () => {
      await expect(useCase.execute({ taskId: ' ', action: 'resume' })).resolves.toEqual({
        ok: false,
        error: { code: 'INVALID_INPUT', message: 'Task id is required' },
      });
      expect(daemon.calls).toEqual([]);
    });
  });

  describe('remove', () => {
    it('should remove an active task and clear its result', async () => {
      const gid = daemon.addTask({ status: 'active' });

      const result = await useCase.execute({ taskId: gid, action: 'remove' });

      expect(result).toEqual({ ok: true, value: { taskId: gid, action: 'remove', filesDeleted: false } });
      expect(daemon.getTask(gid)).toBeUndefined();
      expect(daemon.countCalls('aria2.forceRemove')).toBe(0);
      expect(localFiles.calls).toEqual([]);
    });

    it('should force the removal when the daemon refuses a polite one', async () => {
      const gid = daemon.addTask({ status: 'active' });
      daemon.failingMethods.set('aria2.remove', { code: 1, message: 'busy' });

      const result = await useCase.execute({ taskId: gid, action: 'remove' });

      expect(result.ok).toBe(true);
      expect(daemon.countCalls('aria2.forceRemove')).toBe(1);
      expect(daemon.getTask(gid)).toBeUndefined();
    });

    it('should only clear the result of a finished task and delete its files on request', async () => {
      const gid = daemon.addTask({
        status: 'complete',
        files: [
          { path: `${handle.downloadDir}/show/e01.mkv`, length: 10 },
          { path: `${handle.downloadDir}/show/sample.mkv`, length: 1, selected: false },
        ],
      });

      const result = await useCase.execute({ taskId: gid, action: 'remove', deleteFiles: true });

      expect(result).toEqual({ ok: true, value: { taskId: gid, action: 'remove', filesDeleted: true } });
      expect(daemon.countCalls('aria2.remove')).toBe(0);
      expect(localFiles.calls).toEqual([
        { paths: [`${handle.downloadDir}/show/e01.mkv`], root: handle.downloadDir },
      ]);
    });

    it('should tolerate a result the daemon cannot clear yet', async () => {
      const gid = daemon.addTask({ status: 'active' });
      daemon.failingMethods.set('aria2.removeDownloadResult', { code: 1, message: 'not yet' });

      const result = await useCase.execute({ taskId: gid, action: 'remove' });

      expect(result.ok).toBe(true);
      expect(daemon.getTask(gid)?.status).toBe('removed');
    });

    it('should surface a failed file deletion', async () => {
      const gid = daemon.addTask({ status: 'complete' });
      localFiles.failWith = new Error('EACCES: permission denied');

      const result = await useCase.execute({ taskId: gid, action: 'remove', deleteFiles: true });

      expect(result).toEqual({ ok: false, error: { code: 'INTERNAL_ERROR', message: 'Internal error' } });
    });
  });
});
