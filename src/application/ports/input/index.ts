/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 * These are the interfaces the chat front end calls
 */
export { type CommandResult, succeeded, failed } from './command-result.port';
export type { AddDownloadPort, AddDownloadCommand, AddDownloadResult } from './add-download.port';
export type {
  ListDownloadsPort,
  ListDownloadsCommand,
  ListDownloadsResult,
} from './list-downloads.port';
export type { GetGlobalStatsPort } from './get-global-stats.port';
export type {
  ManageDownloadPort,
  ManageDownloadCommand,
  ManageDownloadResult,
  DownloadAction,
} from './manage-download.port';
export type {
  ControlServicePort,
  ControlServiceCommand,
  ControlServiceResult,
} from './control-service.port';
export type {
  RotateRpcSecretPort,
  RotateRpcSecretCommand,
  RotateRpcSecretResult,
} from './rotate-rpc-secret.port';
