/**
 * Use Cases Barrel Export
 */
export { AddDownloadUseCase } from './add-download.use-case';
export { ListDownloadsUseCase } from './list-downloads.use-case';
export { GetGlobalStatsUseCase } from './get-global-stats.use-case';
export { ManageDownloadUseCase } from './manage-download.use-case';
export { ControlServiceUseCase } from './control-service.use-case';
export { RotateRpcSecretUseCase } from './rotate-rpc-secret.use-case';
