import { z } from 'zod';

/**
 * Wire shapes of the daemon's JSON-RPC answers. Numbers arrive as decimal
 * strings; absent fields default to zero/empty.
 */
const numeric = z.coerce.number().int().nonnegative().default(0);

export const rpcResponseSchema = z.object({
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
    })
    .optional(),
});

export type RpcResponse = z.infer<typeof rpcResponseSchema>;

export const taskFileSchema = z.object({
  index: z.coerce.number().int(),
  path: z.string().default(''),
  length: numeric,
  completedLength: numeric,
  selected: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  uris: z
    .array(z.object({ uri: z.string() }))
    .default([])
    .transform((uris) => uris.map((entry) => entry.uri)),
});

export const taskStatusSchema = z.object({
  gid: z.string().min(1),
  status: z.enum(['active', 'waiting', 'paused', 'error', 'complete', 'removed']),
  totalLength: numeric,
  completedLength: numeric,
  downloadSpeed: numeric,
  uploadSpeed: numeric,
  dir: z.string().default(''),
  files: z.array(taskFileSchema).default([]),
  bittorrent: z
    .object({
      info: z.object({ name: z.string() }).optional(),
    })
    .optional(),
  errorCode: z.string().optional(),
  errorMessage: z.string().optional(),
});

export type TaskStatusPayload = z.infer<typeof taskStatusSchema>;

export const taskListSchema = z.array(taskStatusSchema);

export const gidSchema = z.string().min(1);

export const okSchema = z.literal('OK');

export const globalStatSchema = z.object({
  downloadSpeed: numeric,
  uploadSpeed: numeric,
  numActive: numeric,
  numWaiting: numeric,
  numStopped: numeric,
  numStoppedTotal: numeric,
});

export const versionSchema = z.object({
  version: z.string(),
  enabledFeatures: z.array(z.string()).default([]),
});

/** Fields requested for every task listing and status call. */
export const TASK_STATUS_KEYS = [
  'gid',
  'status',
  'totalLength',
  'completedLength',
  'downloadSpeed',
  'uploadSpeed',
  'dir',
  'files',
  'bittorrent',
  'errorCode',
  'errorMessage',
] as const;
