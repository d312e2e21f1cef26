import type { ConceptRecord, SourceMetadata, SourceName } from '../../types/therapy';
import type { NormalizerRegistry } from '../conceptClassifier';
import type { MalformedRecordError } from './errors';
import type { SourceFetcher } from './sourceFiles';

export type VersionedArtifact = {
  version: string;
};

export type TransformContext = {
  /** Records a skipped entity or field. Never stops the transform. */
  reportMalformed(error: MalformedRecordError): void;
};

export type SourceAdapterOptions = {
  dataDir?: string;
  fetcher?: SourceFetcher;
  registry?: NormalizerRegistry;
};

/**
 * One variant per upstream source. `extract` acquires the raw artifact,
 * `transform` turns it into concept records and `metadata` describes its
 * provenance. `dispose` releases whatever `extract` opened.
 */
export interface SourceAdapter<TArtifact extends VersionedArtifact> {
  readonly sourceName: SourceName;
  extract(): Promise<TArtifact>;
  transform(artifact: TArtifact, context: TransformContext): AsyncIterable<ConceptRecord>;
  metadata(artifact: TArtifact): SourceMetadata;
  dispose?(artifact: TArtifact): void | Promise<void>;
}
