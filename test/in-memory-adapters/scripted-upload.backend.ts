import type {
  UploadBackendPort,
  UploadMetadata,
  UploadOutcome,
} from '../../src/application/ports/output/upload-backend.port';
import type { UploadBackendId } from '../../src/domain/value-objects/upload-backend-id.vo';

export interface RecordedUpload {
  files: string[];
  metadata: UploadMetadata;
  signal: AbortSignal;
}

/** `hang` never settles on its own; the coordinator's timeout or shutdown ends it. */
export type ScriptedStep = UploadOutcome | { status: 'hang' } | { status: 'throw'; error: Error };

/**
 * Scripted Upload Backend
 * Plays back queued outcomes, then succeeds. A gate holds every call until
 * released.
 */
export class ScriptedUploadBackend implements UploadBackendPort {
  readonly calls: RecordedUpload[] = [];
  private readonly script: ScriptedStep[];
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;

  constructor(
    readonly id: UploadBackendId,
    script: ScriptedStep[] = [],
  ) {
    this.script = [...script];
  }

  async upload(
    files: readonly string[],
    metadata: UploadMetadata,
    signal: AbortSignal,
  ): Promise<UploadOutcome> {
    this.calls.push({ files: [...files], metadata, signal });
    if (this.gate) {
      await this.gate;
    }

    const step = this.script.shift() ?? { status: 'succeeded', remoteLocation: `${this.id}://done` };
    switch (step.status) {
      case 'hang':
        return new Promise<UploadOutcome>(() => undefined);
      case 'throw':
        throw step.error;
      default:
        return step;
    }
  }

  // Test helper methods

  hold(): void {
    this.gate = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = null;
    this.openGate = null;
  }

  get callCount(): number {
    return this.calls.length;
  }
}
