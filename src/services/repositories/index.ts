export type {
  PutItemsResult,
  ScannedTherapyItem,
  TherapyIndexRepository,
  TherapyItemScanRequest,
  TherapyItemUpdate,
} from './therapyIndex/TherapyIndexRepository';
export {
  FirestoreTherapyIndexRepository,
  buildItemDocumentId,
} from './therapyIndex/FirestoreTherapyIndexRepository';
export type { SourceMetadataRepository } from './sourceMetadata/SourceMetadataRepository';
export { FirestoreSourceMetadataRepository } from './sourceMetadata/FirestoreSourceMetadataRepository';
export type {
  MaintenanceStateRepository,
  MaintenanceStateSetOptions,
} from './maintenanceState/MaintenanceStateRepository';
export {
  FirestoreMaintenanceStateRepository,
  MAINTENANCE_STATE_COLLECTION,
} from './maintenanceState/FirestoreMaintenanceStateRepository';
export { RepositoryValidationError, SinkWriteError } from './common/errors';
export type { CursorPageRequest, CursorPageResult } from './common/pagination';
