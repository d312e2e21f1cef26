/**
 * Configuration for the therapy concept loaders and maintenance jobs
 * Reads from environment variables (process.env)
 *
 * Optional:
 * - THERAPY_DATA_DIR: Root directory holding one subdirectory per source
 * - THERAPY_CONCEPTS_COLLECTION: Firestore collection for concept items
 * - THERAPY_METADATA_COLLECTION: Firestore collection for source metadata
 * - THERAPY_WRITE_BATCH_SIZE: Items per Firestore batch (max 500)
 * - CONCEPT_XREF_BACKFILL_PAGE_SIZE: Identity items scanned per backfill page
 * - CONCEPT_XREF_BACKFILL_MAX_PAGES: Pages processed per scheduled backfill run
 */

const FIRESTORE_MAX_BATCH_WRITES = 500;

function readPositiveInt(value: string | undefined, fallback: number, max?: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return max === undefined ? parsed : Math.min(parsed, max);
}

export const dataConfig = {
  dataDir: process.env.THERAPY_DATA_DIR || './data',
};

export const therapyIndexConfig = {
  conceptsCollection: process.env.THERAPY_CONCEPTS_COLLECTION || 'therapyConcepts',
  metadataCollection: process.env.THERAPY_METADATA_COLLECTION || 'therapyMetadata',
  writeBatchSize: readPositiveInt(
    process.env.THERAPY_WRITE_BATCH_SIZE,
    400,
    FIRESTORE_MAX_BATCH_WRITES,
  ),
};

export const conceptXrefBackfillConfig = {
  pageSize: readPositiveInt(process.env.CONCEPT_XREF_BACKFILL_PAGE_SIZE, 250, 1000),
  maxPagesPerRun: readPositiveInt(process.env.CONCEPT_XREF_BACKFILL_MAX_PAGES, 20),
};
