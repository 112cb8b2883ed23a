/**
 * Identifiers of the upload backends a completed download can be archived to.
 * `none` selects the no-op backend.
 */
export const UPLOAD_BACKEND_IDS = ['s3', 'onedrive', 'telegram', 'none'] as const;

export type UploadBackendId = (typeof UPLOAD_BACKEND_IDS)[number];

export function isUploadBackendId(value: string): value is UploadBackendId {
  return UPLOAD_BACKEND_IDS.some((id) => id === value);
}
