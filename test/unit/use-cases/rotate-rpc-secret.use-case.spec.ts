import { describe, it, expect, beforeEach } from 'vitest';
import {
  RotateRpcSecretUseCase,
  generateRpcSecret,
} from '../../../src/application/use-cases/rotate-rpc-secret.use-case';
import type {
  DaemonConfigPort,
  DaemonConfigSettings,
} from '../../../src/application/ports/output/daemon-config.port';
import { RelayError } from '../../../src/domain/errors/relay.errors';
import { ServiceState } from '../../../src/domain/value-objects/service-state.vo';
import type { FakeAria2Daemon } from '../../in-memory-adapters';
import { createTestLogger } from '../helpers/mock-factories';
import { createRelayHarness, type RelayHarness } from '../helpers/relay-harness';

/** Records written secrets; the fake daemon picks the new one up as a real one does on launch. */
class RecordingDaemonConfig implements DaemonConfigPort {
  readonly writes: Array<{ configPath: string; secret: string }> = [];
  failWith: Error | null = null;

  constructor(private readonly daemon: FakeAria2Daemon) {}

  async read(): Promise<DaemonConfigSettings> {
    return {};
  }

  async writeSecret(configPath: string, secret: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.writes.push({ configPath, secret });
    this.daemon.secret = secret;
  }
}

describe('RotateRpcSecretUseCase', () => {
  let harness: RelayHarness;
  let daemonConfig: RecordingDaemonConfig;
  let useCase: RotateRpcSecretUseCase;

  beforeEach(async () => {
    harness = createRelayHarness();
    daemonConfig = new RecordingDaemonConfig(harness.daemon);
    useCase = new RotateRpcSecretUseCase(
      daemonConfig,
      harness.rpc,
      harness.serviceManager,
      createTestLogger(),
    );
    harness.host.installed = true;
    await harness.serviceManager.initialize();
  });

  it('should stop with the old secret, write the new one and start again', async () => {
    await harness.serviceManager.start();

    const result = await useCase.execute({ secret: 'rotated-secret-1' });

    expect(result).toEqual({ ok: true, value: { secret: 'rotated-secret-1', restarted: true } });
    expect(daemonConfig.writes).toEqual([
      { configPath: harness.handle.configPath, secret: 'rotated-secret-1' },
    ]);
    expect(harness.daemon.countCalls('aria2.shutdown')).toBe(1);
    expect(harness.host.launchCount).toBe(2);
    expect(harness.serviceManager.getState()).toBe(ServiceState.RUNNING);
  });

  it('should only write the secret when the daemon is stopped', async () => {
    const result = await useCase.execute({ secret: 'rotated-secret-2' });

    expect(result).toEqual({ ok: true, value: { secret: 'rotated-secret-2', restarted: false } });
    expect(harness.host.launchCount).toBe(0);
  });

  it('should generate a secret when none is given', async () => {
    const result = await useCase.execute();

    expect(result.ok).toBe(true);
    expect(daemonConfig.writes[0]?.secret).toMatch(/^[A-Za-z0-9]{20}$/);
  });

  it('should reject a weak secret before touching the daemon', async () => {
    await harness.serviceManager.start();

    const result = await useCase.execute({ secret: 'short' });

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'INVALID_INPUT',
        message: 'RPC secret must be at least 8 letters, digits, dashes or underscores',
      },
    });
    expect(daemonConfig.writes).toEqual([]);
    expect(harness.serviceManager.getState()).toBe(ServiceState.RUNNING);
  });

  it('should report a failed write', async () => {
    daemonConfig.failWith = new RelayError('Daemon config /tmp/x does not exist', 'CONFIG_MISSING');

    await expect(useCase.execute({ secret: 'rotated-secret-3' })).resolves.toEqual({
      ok: false,
      error: { code: 'CONFIG_MISSING', message: 'Daemon config /tmp/x does not exist' },
    });
  });

  describe('generateRpcSecret', () => {
    it('should produce alphanumeric secrets of the requested length', () => {
      expect(generateRpcSecret(8)).toMatch(/^[A-Za-z0-9]{8}$/);
      expect(generateRpcSecret()).not.toBe(generateRpcSecret());
    });
  });
});
