/**
 * Seen Task Store Port (Driven Port)
 * Task ids for which a completion or abandonment event was already emitted.
 */
export interface SeenTaskStorePort {
  load(): Promise<Set<string>>;
  save(taskIds: ReadonlySet<string>): Promise<void>;
}
