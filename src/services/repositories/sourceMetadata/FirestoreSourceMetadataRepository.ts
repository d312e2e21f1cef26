import { z } from 'zod';
import { SOURCE_NAMES, type SourceMetadata, type SourceName } from '../../../types/therapy';
import { RepositoryValidationError } from '../common/errors';
import type { SourceMetadataRepository } from './SourceMetadataRepository';

export const SOURCE_METADATA_COLLECTION = 'therapyMetadata';

const sourceMetadataSchema = z.object({
  src_name: z.enum(SOURCE_NAMES),
  data_license: z.string(),
  data_license_url: z.string(),
  version: z.string(),
  data_url: z.string().nullable(),
  data_license_attributes: z.object({
    non_commercial: z.boolean(),
    share_alike: z.boolean(),
    attribution: z.boolean(),
  }),
});

/** One document per source, keyed by its source name. */
export class FirestoreSourceMetadataRepository implements SourceMetadataRepository {
  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    private readonly collectionName: string = SOURCE_METADATA_COLLECTION,
  ) {}

  async putSourceMetadata(metadata: SourceMetadata): Promise<void> {
    await this.db.collection(this.collectionName).doc(metadata.src_name).set(metadata);
  }

  async getSourceMetadata(sourceName: SourceName): Promise<SourceMetadata | null> {
    const snapshot = await this.db.collection(this.collectionName).doc(sourceName).get();
    if (!snapshot.exists) {
      return null;
    }

    const parsed = sourceMetadataSchema.safeParse(snapshot.data());
    if (!parsed.success) {
      throw new RepositoryValidationError(
        `Stored metadata for ${sourceName} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
      );
    }
    return parsed.data;
  }
}
