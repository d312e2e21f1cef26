/**
 * Therapy Source Loader
 *
 * Runs each source adapter through extract, transform and write, then stores
 * the release metadata. Sources load in parallel and a failing source never
 * stops the others; every run ends in one summary per source.
 */

import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { therapyIndexConfig } from '../config';
import type { SourceName } from '../types/therapy';
import { buildNormalizerRegistry } from './conceptClassifier';
import {
  FirestoreSourceMetadataRepository,
  FirestoreTherapyIndexRepository,
  SourceMetadataRepository,
  TherapyIndexRepository,
} from './repositories';
import { describeError } from './repositories/common/errors';
import { ChemblSource } from './sources/chemblSource';
import { DrugBankSource } from './sources/drugbankSource';
import { RxNormSource } from './sources/rxnormSource';
import type {
  SourceAdapter,
  SourceAdapterOptions,
  TransformContext,
  VersionedArtifact,
} from './sources/sourceAdapter';
import { WikidataSource } from './sources/wikidataSource';
import { TherapyIndexWriter } from './therapyIndexWriter';

const getDb = () => admin.firestore();

export const LOADABLE_SOURCES = ['ChEMBL', 'DrugBank', 'RxNorm', 'Wikidata'] as const;

export type LoadableSource = (typeof LOADABLE_SOURCES)[number];

export type SourceLoadStatus = 'succeeded' | 'failed';

export type SourceLoadSummary = {
  source: SourceName;
  status: SourceLoadStatus;
  version: string | null;
  conceptsWritten: number;
  recordsSkipped: number;
  itemsWritten: number;
  itemsFailed: number;
  error: string | null;
};

type TherapySourceLoaderDependencies = {
  therapyIndexRepository?: Pick<TherapyIndexRepository, 'putItems'>;
  sourceMetadataRepository?: Pick<SourceMetadataRepository, 'putSourceMetadata'>;
};

function resolveDependencies(
  overrides: TherapySourceLoaderDependencies = {},
): Required<TherapySourceLoaderDependencies> {
  return {
    therapyIndexRepository:
      overrides.therapyIndexRepository ??
      new FirestoreTherapyIndexRepository(getDb(), {
        collectionName: therapyIndexConfig.conceptsCollection,
      }),
    sourceMetadataRepository:
      overrides.sourceMetadataRepository ??
      new FirestoreSourceMetadataRepository(getDb(), therapyIndexConfig.metadataCollection),
  };
}

export type TherapySourceAdapterOptions = SourceAdapterOptions & {
  sources?: readonly LoadableSource[];
};

export function createTherapySourceAdapters(
  options: TherapySourceAdapterOptions = {},
): SourceAdapter<VersionedArtifact>[] {
  const { sources = LOADABLE_SOURCES, ...adapterOptions } = options;
  const registry = adapterOptions.registry ?? buildNormalizerRegistry();
  const shared: SourceAdapterOptions = { ...adapterOptions, registry };

  const factories: Record<LoadableSource, () => SourceAdapter<VersionedArtifact>> = {
    ChEMBL: () => new ChemblSource(shared),
    DrugBank: () => new DrugBankSource(shared),
    RxNorm: () => new RxNormSource(shared),
    Wikidata: () => new WikidataSource(shared),
  };

  return sources.map((source) => factories[source]());
}

export type LoadTherapySourceOptions = {
  batchSize?: number;
};

export async function loadTherapySource<TArtifact extends VersionedArtifact>(
  adapter: SourceAdapter<TArtifact>,
  options: LoadTherapySourceOptions = {},
  dependencyOverrides: TherapySourceLoaderDependencies = {},
): Promise<SourceLoadSummary> {
  const dependencies = resolveDependencies(dependencyOverrides);
  const tag = `[${adapter.sourceName}]`;
  const summary: SourceLoadSummary = {
    source: adapter.sourceName,
    status: 'failed',
    version: null,
    conceptsWritten: 0,
    recordsSkipped: 0,
    itemsWritten: 0,
    itemsFailed: 0,
    error: null,
  };

  const context: TransformContext = {
    reportMalformed: (error) => {
      summary.recordsSkipped += 1;
      functions.logger.warn(`${tag} Skipping malformed record`, {
        recordRef: error.recordRef,
        reason: error.message,
      });
    },
  };

  let artifact: TArtifact | null = null;
  let writer: TherapyIndexWriter | null = null;
  let flushed = false;
  try {
    artifact = await adapter.extract();
    summary.version = artifact.version;
    functions.logger.info(`${tag} Loading release`, { version: artifact.version });

    writer = new TherapyIndexWriter(dependencies.therapyIndexRepository, {
      batchSize: options.batchSize,
      logTag: adapter.sourceName,
    });
    for await (const record of adapter.transform(artifact, context)) {
      await writer.writeConcept(record);
      summary.conceptsWritten += 1;
    }

    const totals = await writer.flush();
    flushed = true;
    summary.itemsWritten = totals.itemsWritten;
    summary.itemsFailed = totals.failures.length;

    await dependencies.sourceMetadataRepository.putSourceMetadata(adapter.metadata(artifact));
    summary.status = 'succeeded';

    functions.logger.info(`${tag} Load complete`, {
      version: summary.version,
      conceptsWritten: summary.conceptsWritten,
      recordsSkipped: summary.recordsSkipped,
      itemsWritten: summary.itemsWritten,
      itemsFailed: summary.itemsFailed,
    });
  } catch (error) {
    summary.error = describeError(error);

    // Concepts already handed to the writer are still committed and counted.
    if (writer !== null && !flushed) {
      try {
        const totals = await writer.flush();
        summary.itemsWritten = totals.itemsWritten;
        summary.itemsFailed = totals.failures.length;
      } catch (flushError) {
        functions.logger.warn(`${tag} Failed to flush buffered items after load error`, {
          error: describeError(flushError),
        });
      }
    }

    functions.logger.error(`${tag} Load failed`, {
      version: summary.version,
      error: summary.error,
      conceptsWritten: summary.conceptsWritten,
      itemsWritten: summary.itemsWritten,
      itemsFailed: summary.itemsFailed,
    });
  } finally {
    if (artifact !== null && adapter.dispose) {
      try {
        await adapter.dispose(artifact);
      } catch (disposeError) {
        functions.logger.warn(`${tag} Failed to release source artifact`, {
          error: describeError(disposeError),
        });
      }
    }
  }

  return summary;
}

/** Loads every adapter concurrently, each through its own writer. */
export async function loadTherapySources(
  adapters: readonly SourceAdapter<VersionedArtifact>[],
  options: LoadTherapySourceOptions = {},
  dependencyOverrides: TherapySourceLoaderDependencies = {},
): Promise<SourceLoadSummary[]> {
  const dependencies = resolveDependencies(dependencyOverrides);
  const summaries = await Promise.all(
    adapters.map((adapter) => loadTherapySource(adapter, options, dependencies)),
  );

  functions.logger.info('[TherapySourceLoader] Load run complete', {
    succeeded: summaries.filter((summary) => summary.status === 'succeeded').length,
    failed: summaries.filter((summary) => summary.status === 'failed').length,
  });

  return summaries;
}
