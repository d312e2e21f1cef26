import type { SourceMetadata, SourceName } from '../../../types/therapy';

export interface SourceMetadataRepository {
  putSourceMetadata(metadata: SourceMetadata): Promise<void>;
  getSourceMetadata(sourceName: SourceName): Promise<SourceMetadata | null>;
}
