import { join } from 'path';
import { z } from 'zod';
import type { SeenTaskStorePort } from '../../../application/ports/output/seen-task-store.port';
import { readJsonFile, writeJsonAtomic } from '../../../shared/fs/json-file';

export const SEEN_TASKS_FILE = 'seen-tasks.json';

const seenTasksSchema = z.object({
  version: z.literal(1),
  taskIds: z.array(z.string()),
});

/**
 * JSON Seen Task Store Adapter
 * Implements SeenTaskStorePort with `<STATE_DIR>/seen-tasks.json`.
 */
export class JsonSeenTaskStoreAdapter implements SeenTaskStorePort {
  private readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = join(stateDir, SEEN_TASKS_FILE);
  }

  async load(): Promise<Set<string>> {
    const stored = await readJsonFile(this.filePath, seenTasksSchema);
    return new Set(stored?.taskIds ?? []);
  }

  async save(taskIds: ReadonlySet<string>): Promise<void> {
    await writeJsonAtomic(this.filePath, { version: 1, taskIds: Array.from(taskIds).sort() });
  }
}
