import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  CompletionWatcher,
  type WatcherEvent,
} from '../../../src/processing/services/completion-watcher.service';
import { Aria2RpcClient } from '../../../src/infrastructure/adapters/rpc/aria2-rpc.client';
import { DownloadCompletedEvent } from '../../../src/domain/events/download-completed.event';
import { DownloadAbandonedEvent } from '../../../src/domain/events/download-abandoned.event';
import {
  FakeAria2Daemon,
  InMemoryEventPublisherAdapter,
  InMemorySeenTaskStoreAdapter,
} from '../../in-memory-adapters';
import { createDaemonHandle, createTestLogger } from '../helpers/mock-factories';

describe('CompletionWatcher', () => {
  const handle = createDaemonHandle();
  let daemon: FakeAria2Daemon;
  let seenStore: InMemorySeenTaskStoreAdapter;
  let events: InMemoryEventPublisherAdapter;
  let watcher: CompletionWatcher;

  const createWatcher = (pageSize = 100) => {
    const logger = createTestLogger();
    const rpc = new Aria2RpcClient(daemon, handle, { timeoutMs: 1000 }, logger);
    return new CompletionWatcher(rpc, seenStore, events, { pollIntervalMs: 10, pageSize }, logger);
  };

  beforeEach(() => {
    daemon = new FakeAria2Daemon({ secret: handle.rpc.secret, downloadDir: handle.downloadDir });
    seenStore = new InMemorySeenTaskStoreAdapter();
    events = new InMemoryEventPublisherAdapter();
    watcher = createWatcher();
  });

  afterEach(() => {
    watcher.stop();
  });

  describe('Completion detection', () => {
    it('should emit exactly one completion per task across cycles', async () => {
      const gid = daemon.addTask({ status: 'active' });

      await expect(watcher.pollOnce()).resolves.toEqual([]);

      daemon.setStatus(gid, 'complete');
      const emitted = await watcher.pollOnce();

      expect(emitted).toHaveLength(1);
      expect(emitted[0]).toBeInstanceOf(DownloadCompletedEvent);
      expect(emitted[0]?.payload).toEqual({
        taskId: gid,
        outcome: 'complete',
        name: `${gid}.bin`,
        dir: handle.downloadDir,
        files: [`${handle.downloadDir}/${gid}.bin`],
        totalLength: 100,
        errorCode: undefined,
        errorMessage: undefined,
      });

      await expect(watcher.pollOnce()).resolves.toEqual([]);
      await expect(watcher.pollOnce()).resolves.toEqual([]);
      expect(seenStore.getStored()).toEqual([gid]);
      expect(seenStore.saveCount).toBe(1);
    });

    it('should report a task first seen already complete', async () => {
      const gid = daemon.addTask({ status: 'complete' });

      const emitted = await watcher.pollOnce();

      expect(emitted.map((event) => event.taskId)).toEqual([gid]);
    });

    it('should report failed downloads with their error', async () => {
      const gid = daemon.addTask({
        status: 'error',
        errorCode: '3',
        errorMessage: 'Resource not found',
      });

      const [event] = await watcher.pollOnce();

      expect(event).toBeInstanceOf(DownloadCompletedEvent);
      expect(event?.payload).toMatchObject({
        taskId: gid,
        outcome: 'error',
        errorCode: '3',
        errorMessage: 'Resource not found',
      });
    });

    it('should skip unselected torrent files', async () => {
      daemon.addTask({
        gid: 'aaaa000000000001',
        status: 'complete',
        dir: handle.downloadDir,
        bittorrentName: 'Show',
        files: [
          { path: `${handle.downloadDir}/Show/e01.mkv`, length: 10 },
          { path: `${handle.downloadDir}/Show/sample.mkv`, length: 1, selected: false },
        ],
      });

      const [event] = await watcher.pollOnce();

      expect(event?.payload).toMatchObject({
        name: 'Show',
        files: [`${handle.downloadDir}/Show/e01.mkv`],
      });
    });

    it('should not report tasks remembered from a previous run', async () => {
      seenStore = new InMemorySeenTaskStoreAdapter(['aaaa000000000001']);
      watcher = createWatcher();
      daemon.addTask({ gid: 'aaaa000000000001', status: 'complete' });

      await expect(watcher.pollOnce()).resolves.toEqual([]);
      expect(watcher.hasSeen('aaaa000000000001')).toBe(true);
    });
  });

  describe('Abandoned downloads', () => {
    it('should report a removed task with its last observed status', async () => {
      const gid = daemon.addTask({ status: 'paused' });
      await watcher.pollOnce();

      daemon.setStatus(gid, 'removed');
      const [event] = await watcher.pollOnce();

      expect(event).toBeInstanceOf(DownloadAbandonedEvent);
      expect(event?.payload).toEqual({
        taskId: gid,
        name: `${gid}.bin`,
        lastStatus: 'paused',
        reason: 'removed',
      });
    });

    it('should report a task that vanished between cycles', async () => {
      const gid = daemon.addTask({ status: 'active' });
      await watcher.pollOnce();

      daemon.purge(gid);
      const [event] = await watcher.pollOnce();

      expect(event?.payload).toEqual({
        taskId: gid,
        name: `${gid}.bin`,
        lastStatus: 'active',
        reason: 'vanished',
      });
      await expect(watcher.pollOnce()).resolves.toEqual([]);
    });

    it('should order completions before removals', async () => {
      const done = daemon.addTask({ status: 'active' });
      const dropped = daemon.addTask({ status: 'active' });
      await watcher.pollOnce();

      daemon.setStatus(dropped, 'removed');
      daemon.setStatus(done, 'complete');
      const emitted = await watcher.pollOnce();

      expect(emitted.map((event) => `${event.eventName}:${event.taskId}`)).toEqual([
        `download.completed:${done}`,
        `download.abandoned:${dropped}`,
      ]);
    });
  });

  describe('Histories longer than a page', () => {
    beforeEach(() => {
      watcher = createWatcher(2);
    });

    it('should read the newest stopped results', async () => {
      daemon.addTask({ status: 'complete' });
      daemon.addTask({ status: 'complete' });
      const gid = daemon.addTask({ status: 'active' });
      await watcher.pollOnce();

      daemon.setStatus(gid, 'complete');
      const emitted = await watcher.pollOnce();

      expect(emitted.map((event) => `${event.eventName}:${event.taskId}`)).toEqual([
        `download.completed:${gid}`,
      ]);
    });

    it('should report a completion that fell outside the stopped page', async () => {
      watcher = createWatcher(1);
      const first = daemon.addTask({ status: 'active' });
      const second = daemon.addTask({ status: 'active' });
      await watcher.pollOnce();

      daemon.setStatus(first, 'complete');
      daemon.setStatus(second, 'complete');
      const emitted = await watcher.pollOnce();

      expect(emitted.map((event) => `${event.eventName}:${event.taskId}`)).toEqual([
        `download.completed:${second}`,
        `download.completed:${first}`,
      ]);
      expect(daemon.countCalls('aria2.tellStatus')).toBe(1);
      await expect(watcher.pollOnce()).resolves.toEqual([]);
    });

    it('should keep tracking a waiting task pushed past the page', async () => {
      watcher = createWatcher(1);
      const running = daemon.addTask({ status: 'active' });
      const queued = daemon.addTask({ status: 'waiting' });
      await watcher.pollOnce();

      daemon.setStatus(running, 'paused');
      await expect(watcher.pollOnce()).resolves.toEqual([]);
      expect(watcher.hasSeen(queued)).toBe(false);

      daemon.setStatus(queued, 'complete');
      const emitted = await watcher.pollOnce();
      expect(emitted.map((event) => event.taskId)).toEqual([queued]);
    });
  });

  describe('Failed and overlapping cycles', () => {
    it('should change nothing when the daemon is unreachable', async () => {
      const gid = daemon.addTask({ status: 'active' });
      await watcher.pollOnce();

      daemon.online = false;
      await expect(watcher.pollOnce()).resolves.toEqual([]);

      expect(watcher.getStats()).toMatchObject({ cyclesRun: 1, cyclesFailed: 1, trackedTasks: 1 });
      expect(seenStore.saveCount).toBe(0);

      daemon.online = true;
      daemon.purge(gid);
      const [event] = await watcher.pollOnce();
      expect(event?.payload).toMatchObject({ taskId: gid, reason: 'vanished' });
    });

    it('should skip a cycle while the previous one is still running', async () => {
      daemon.silentMethods.add('aria2.tellActive');
      daemon.addTask({ status: 'complete' });

      const first = watcher.pollOnce();
      await expect(watcher.pollOnce()).resolves.toEqual([]);
      expect(watcher.getStats().cyclesSkipped).toBe(1);

      watcher.stop();
      await expect(first).resolves.toEqual([]);
      expect(watcher.getStats().cyclesRun).toBe(0);
      expect(seenStore.saveCount).toBe(0);
    });

    it('should still emit when the seen-set cannot be saved', async () => {
      seenStore.failSaves = true;
      const gid = daemon.addTask({ status: 'complete' });

      const emitted = await watcher.pollOnce();

      expect(emitted.map((event) => event.taskId)).toEqual([gid]);
    });
  });

  describe('Listeners', () => {
    it('should deliver events to listeners and the event publisher', async () => {
      const received: WatcherEvent[] = [];
      watcher.onEvent((event) => {
        received.push(event);
      });
      const gid = daemon.addTask({ status: 'complete' });

      await watcher.pollOnce();

      expect(received.map((event) => event.taskId)).toEqual([gid]);
      expect(events.getEventNames()).toEqual(['download.completed']);
    });

    it('should keep delivering after a listener throws', async () => {
      const received: string[] = [];
      watcher.onEvent(() => {
        throw new Error('listener broke');
      });
      watcher.onEvent((event) => {
        received.push(event.taskId);
      });
      const first = daemon.addTask({ status: 'complete' });
      const second = daemon.addTask({ status: 'error' });

      await watcher.pollOnce();

      expect(received).toEqual([first, second]);
    });

    it('should stop delivering after unsubscribe', async () => {
      const received: string[] = [];
      const unsubscribe = watcher.onEvent((event) => {
        received.push(event.taskId);
      });
      unsubscribe();
      daemon.addTask({ status: 'complete' });

      await watcher.pollOnce();

      expect(received).toEqual([]);
    });
  });

  describe('Polling loop', () => {
    it('should poll on its interval until stopped', async () => {
      const received: string[] = [];
      watcher.onEvent((event) => {
        received.push(event.taskId);
      });

      await watcher.start();
      expect(watcher.isRunning()).toBe(true);

      const gid = daemon.addTask({ status: 'complete' });
      await vi.waitFor(() => expect(received).toEqual([gid]));

      watcher.stop();
      expect(watcher.isRunning()).toBe(false);
      expect(watcher.getStats().running).toBe(false);
    });

    it('should run a single loop when started twice at once', async () => {
      await Promise.all([watcher.start(), watcher.start()]);
      watcher.stop();
      const polls = daemon.countCalls('aria2.tellActive');

      await new Promise((resolve) => setTimeout(resolve, 50));

      expect(daemon.countCalls('aria2.tellActive')).toBe(polls);
      expect(watcher.isRunning()).toBe(false);
    });
  });

  describe('prune', () => {
    it('should forget task ids so they can be reported again', async () => {
      const gid = daemon.addTask({ status: 'complete' });
      await watcher.pollOnce();

      await expect(watcher.prune([gid, 'unknown'])).resolves.toBe(1);

      expect(watcher.hasSeen(gid)).toBe(false);
      expect(seenStore.getStored()).toEqual([]);
      const emitted = await watcher.pollOnce();
      expect(emitted.map((event) => event.taskId)).toEqual([gid]);
    });
  });
});
