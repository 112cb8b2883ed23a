/**
 * Service State Value Object
 * Lifecycle of the supervised daemon.
 *
 * not_installed → stopped → starting → running → stopping → stopped
 * starting/stopping may fall into failed; failed can be started again.
 */
export enum ServiceState {
  NOT_INSTALLED = 'not_installed',
  STOPPED = 'stopped',
  STARTING = 'starting',
  RUNNING = 'running',
  STOPPING = 'stopping',
  FAILED = 'failed',
}

/** Reported only by status(): the process is up but does not answer RPC. */
export const RUNNING_DEGRADED = 'running_degraded';

export type ReportedServiceState = ServiceState | typeof RUNNING_DEGRADED;

export class ServiceStateVO {
  private static readonly transitions: Record<ServiceState, ServiceState[]> = {
    [ServiceState.NOT_INSTALLED]: [ServiceState.STOPPED],
    [ServiceState.STOPPED]: [ServiceState.STARTING, ServiceState.NOT_INSTALLED],
    [ServiceState.STARTING]: [
      ServiceState.RUNNING,
      ServiceState.FAILED,
      ServiceState.STOPPING,
    ],
    [ServiceState.RUNNING]: [ServiceState.STOPPING, ServiceState.FAILED],
    [ServiceState.STOPPING]: [ServiceState.STOPPED, ServiceState.FAILED],
    [ServiceState.FAILED]: [ServiceState.STARTING, ServiceState.STOPPING],
  };

  private constructor(private readonly _value: ServiceState) {}

  static of(value: ServiceState): ServiceStateVO {
    return new ServiceStateVO(value);
  }

  static notInstalled(): ServiceStateVO {
    return new ServiceStateVO(ServiceState.NOT_INSTALLED);
  }

  get value(): ServiceState {
    return this._value;
  }

  isBusy(): boolean {
    return this._value === ServiceState.STARTING || this._value === ServiceState.STOPPING;
  }

  isInstalled(): boolean {
    return this._value !== ServiceState.NOT_INSTALLED;
  }

  canStart(): boolean {
    return this._value === ServiceState.STOPPED || this._value === ServiceState.FAILED;
  }

  canTransitionTo(next: ServiceStateVO): boolean {
    return ServiceStateVO.transitions[this._value].includes(next._value);
  }
}
