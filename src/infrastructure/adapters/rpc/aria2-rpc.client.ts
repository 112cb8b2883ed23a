import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type {
  DaemonRpcPort,
  DaemonVersion,
  DownloadOptions,
  GlobalStat,
  RpcCallOptions,
} from '../../../application/ports/output/daemon-rpc.port';
import type {
  RpcRequestEnvelope,
  RpcTransportPort,
} from '../../../application/ports/output/rpc-transport.port';
import { DAEMON_HANDLE, RPC_TRANSPORT_PORT } from '../../../application/ports/injection-tokens';
import { DownloadTask } from '../../../domain/entities/download-task.entity';
import type { DaemonHandle } from '../../../domain/value-objects/daemon-handle.vo';
import {
  AuthError,
  RelayError,
  RemoteError,
  TransportError,
  describeError,
} from '../../../domain/errors/relay.errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import {
  TASK_STATUS_KEYS,
  type TaskStatusPayload,
  gidSchema,
  globalStatSchema,
  okSchema,
  rpcResponseSchema,
  taskListSchema,
  taskStatusSchema,
  versionSchema,
} from './aria2-rpc.schemas';

export const RPC_CLIENT_OPTIONS = 'RpcClientOptions';

export interface RpcClientOptions {
  /** Bounded wait for every call, in milliseconds. */
  timeoutMs: number;
}

interface PendingCall {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
  controller: AbortController;
  detachCallerSignal: () => void;
}

/**
 * JSON-RPC 2.0 client for the aria2 daemon.
 *
 * Calls are written to the transport and parked in a pending map keyed by
 * request id; responses are matched by id only, so concurrent calls may be
 * answered in any order. No retries.
 */
@Injectable()
export class Aria2RpcClient implements DaemonRpcPort, OnModuleDestroy {
  private readonly pending: Map<string, PendingCall> = new Map();
  private readonly unsubscribe: () => void;
  private readonly logger: PinoLoggerService;
  private secret: string;

  constructor(
    @Inject(RPC_TRANSPORT_PORT) private readonly transport: RpcTransportPort,
    @Inject(DAEMON_HANDLE) handle: DaemonHandle,
    @Inject(RPC_CLIENT_OPTIONS) private readonly options: RpcClientOptions,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(Aria2RpcClient.name);
    this.secret = handle.rpc.secret;
    this.unsubscribe = this.transport.onResponse((response) => this.handleResponse(response));
  }

  setSecret(secret: string): void {
    this.secret = secret;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  call(method: string, params: unknown[] = [], options: RpcCallOptions = {}): Promise<unknown> {
    const id = uuidv4();
    const request: RpcRequestEnvelope = {
      jsonrpc: '2.0',
      id,
      method,
      params: this.secret ? [`token:${this.secret}`, ...params] : [...params],
    };
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;

    return new Promise<unknown>((resolve, reject) => {
      const callerSignal = options.signal;
      if (callerSignal?.aborted) {
        reject(new RelayError(`RPC call ${method} cancelled`, 'CANCELLED'));
        return;
      }

      const controller = new AbortController();
      const onCallerAbort = () => {
        this.fail(id, new RelayError(`RPC call ${method} cancelled`, 'CANCELLED'));
      };
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

      const timer = setTimeout(() => {
        this.fail(
          id,
          new TransportError('timeout', `RPC call ${method} timed out after ${timeoutMs}ms`, {
            method,
            timeoutMs,
          }),
        );
      }, timeoutMs);

      this.pending.set(id, {
        method,
        resolve,
        reject,
        timer,
        controller,
        detachCallerSignal: () => callerSignal?.removeEventListener('abort', onCallerAbort),
      });

      this.transport.send(request, controller.signal).catch((error: unknown) => {
        // Once settled (timeout, cancel, or a response), a late send failure is moot.
        if (!this.pending.has(id)) {
          return;
        }
        this.fail(id, this.toTransportFailure(method, error));
      });
    });
  }

  // ===== Adding tasks =====

  async addUri(
    uris: string[],
    downloadOptions?: DownloadOptions,
    options?: RpcCallOptions,
  ): Promise<string> {
    const params: unknown[] = [uris];
    if (downloadOptions && Object.keys(downloadOptions).length > 0) {
      params.push(downloadOptions);
    }
    const gid = await this.callParsed('aria2.addUri', params, gidSchema, options);
    this.logger.info({ gid, uri: uris[0]?.slice(0, 80) }, 'Download added');
    return gid;
  }

  async addTorrent(
    torrent: Buffer,
    downloadOptions?: DownloadOptions,
    options?: RpcCallOptions,
  ): Promise<string> {
    const params: unknown[] = [torrent.toString('base64'), []];
    if (downloadOptions && Object.keys(downloadOptions).length > 0) {
      params.push(downloadOptions);
    }
    const gid = await this.callParsed('aria2.addTorrent', params, gidSchema, options);
    this.logger.info({ gid, size: torrent.length }, 'Torrent added');
    return gid;
  }

  // ===== Queries =====

  async tellStatus(gid: string, options?: RpcCallOptions): Promise<DownloadTask> {
    const payload = await this.callParsed(
      'aria2.tellStatus',
      [gid, [...TASK_STATUS_KEYS]],
      taskStatusSchema,
      options,
    );
    return toDownloadTask(payload);
  }

  async tellActive(options?: RpcCallOptions): Promise<DownloadTask[]> {
    const payload = await this.callParsed(
      'aria2.tellActive',
      [[...TASK_STATUS_KEYS]],
      taskListSchema,
      options,
    );
    return payload.map(toDownloadTask);
  }

  async tellWaiting(offset: number, num: number, options?: RpcCallOptions): Promise<DownloadTask[]> {
    const payload = await this.callParsed(
      'aria2.tellWaiting',
      [offset, num, [...TASK_STATUS_KEYS]],
      taskListSchema,
      options,
    );
    return payload.map(toDownloadTask);
  }

  async tellStopped(offset: number, num: number, options?: RpcCallOptions): Promise<DownloadTask[]> {
    const payload = await this.callParsed(
      'aria2.tellStopped',
      [offset, num, [...TASK_STATUS_KEYS]],
      taskListSchema,
      options,
    );
    return payload.map(toDownloadTask);
  }

  async getGlobalStat(options?: RpcCallOptions): Promise<GlobalStat> {
    return this.callParsed('aria2.getGlobalStat', [], globalStatSchema, options);
  }

  async getVersion(options?: RpcCallOptions): Promise<DaemonVersion> {
    return this.callParsed('aria2.getVersion', [], versionSchema, options);
  }

  // ===== Task control =====

  pause(gid: string, options?: RpcCallOptions): Promise<string> {
    return this.callParsed('aria2.pause', [gid], gidSchema, options);
  }

  unpause(gid: string, options?: RpcCallOptions): Promise<string> {
    return this.callParsed('aria2.unpause', [gid], gidSchema, options);
  }

  remove(gid: string, options?: RpcCallOptions): Promise<string> {
    return this.callParsed('aria2.remove', [gid], gidSchema, options);
  }

  forceRemove(gid: string, options?: RpcCallOptions): Promise<string> {
    return this.callParsed('aria2.forceRemove', [gid], gidSchema, options);
  }

  async removeDownloadResult(gid: string, options?: RpcCallOptions): Promise<void> {
    await this.callParsed('aria2.removeDownloadResult', [gid], okSchema, options);
  }

  // ===== Daemon control =====

  async shutdown(options?: RpcCallOptions): Promise<void> {
    await this.callParsed('aria2.shutdown', [], okSchema, options);
  }

  async forceShutdown(options?: RpcCallOptions): Promise<void> {
    await this.callParsed('aria2.forceShutdown', [], okSchema, options);
  }

  onModuleDestroy(): void {
    this.unsubscribe();
    for (const id of Array.from(this.pending.keys())) {
      this.fail(id, new TransportError('unreachable', 'RPC client closed'));
    }
  }

  // ===== Internals =====

  private async callParsed<S extends z.ZodTypeAny>(
    method: string,
    params: unknown[],
    schema: S,
    options?: RpcCallOptions,
  ): Promise<z.output<S>> {
    const result = await this.call(method, params, options);
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new RemoteError(`Unexpected result for ${method}`, {
        code: 'INVALID_RESPONSE',
        context: {
          method,
          issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
        },
      });
    }
    return parsed.data;
  }

  private handleResponse(raw: unknown): void {
    if (Array.isArray(raw)) {
      raw.forEach((entry) => this.handleResponse(entry));
      return;
    }

    const parsed = rpcResponseSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.errors.length }, 'Dropping malformed RPC response');
      return;
    }

    const { id, result, error } = parsed.data;
    const call = typeof id === 'string' ? this.pending.get(id) : undefined;
    if (typeof id !== 'string' || !call) {
      this.logger.warn({ id }, 'Dropping RPC response with unknown id');
      return;
    }

    if (error) {
      this.fail(
        id,
        error.message === 'Unauthorized'
          ? new AuthError()
          : new RemoteError(error.message, { rpcCode: error.code, context: { method: call.method } }),
      );
      return;
    }

    this.settle(id);
    call.resolve(result);
  }

  private fail(id: string, error: Error): void {
    const call = this.pending.get(id);
    if (!call) {
      return;
    }
    this.settle(id);
    call.controller.abort();
    call.reject(error);
  }

  private settle(id: string): void {
    const call = this.pending.get(id);
    if (!call) {
      return;
    }
    clearTimeout(call.timer);
    call.detachCallerSignal();
    this.pending.delete(id);
  }

  private toTransportFailure(method: string, error: unknown): Error {
    if (error instanceof RelayError) {
      return error;
    }
    return new TransportError('unreachable', `Daemon unreachable: ${describeError(error)}`, {
      method,
    });
  }
}

function toDownloadTask(payload: TaskStatusPayload): DownloadTask {
  return DownloadTask.create({
    gid: payload.gid,
    status: payload.status,
    totalLength: payload.totalLength,
    completedLength: payload.completedLength,
    downloadSpeed: payload.downloadSpeed,
    uploadSpeed: payload.uploadSpeed,
    dir: payload.dir,
    files: payload.files,
    bittorrentName: payload.bittorrent?.info?.name,
    errorCode: payload.errorCode,
    errorMessage: payload.errorMessage,
  });
}
