/**
 * Concept Xref Backfill
 *
 * Re-partitions the stored identifiers of identity items with the current
 * classifier, so items written before a namespace moved between
 * other_identifiers and xrefs end up in the shape a fresh load would give.
 * Progress is kept in systemMaintenance and a later run resumes from it.
 */

import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { conceptXrefBackfillConfig, therapyIndexConfig } from '../config';
import { SOURCE_NAMES } from '../types/therapy';
import {
  buildNormalizerRegistry,
  partitionIdentifiers,
  type NormalizerRegistry,
} from './conceptClassifier';
import {
  FirestoreMaintenanceStateRepository,
  FirestoreTherapyIndexRepository,
  MaintenanceStateRepository,
  TherapyIndexRepository,
} from './repositories';
import { describeError } from './repositories/common/errors';
import { normalizeCursor } from './repositories/common/pagination';

const getDb = () => admin.firestore();

export const CONCEPT_XREF_BACKFILL_STATE_DOC_ID = 'conceptXrefBackfill';

const MAX_BACKFILL_PAGE_SIZE = 1000;
const BACKFILL_ERROR_MESSAGE_MAX_LENGTH = 500;

const BACKFILL_RUN_STATUS_RUNNING = 'running';
const BACKFILL_RUN_STATUS_SUCCESS = 'success';
const BACKFILL_RUN_STATUS_ERROR = 'error';

const IDENTIFIER_FIELDS = ['other_identifiers', 'xrefs'] as const;

type IdentifierField = (typeof IDENTIFIER_FIELDS)[number];

const storedIdentitySchema = z.object({
  label_and_type: z.string().min(1),
  concept_id: z.string().min(1),
  src_name: z.enum(SOURCE_NAMES),
  other_identifiers: z.array(z.string()).nullish(),
  xrefs: z.array(z.string()).nullish(),
});

export type StoredIdentityItem = z.infer<typeof storedIdentitySchema>;

const backfillStateSchema = z.object({
  cursorDocId: z.string().nullish(),
});

export type ConceptXrefUpdatePlan = {
  set: Partial<Record<IdentifierField, string[]>> | null;
  remove: IdentifierField[];
};

function sameList(next: readonly string[], stored: readonly string[] | null | undefined): boolean {
  return (
    Array.isArray(stored) &&
    stored.length === next.length &&
    stored.every((value, index) => value === next[index])
  );
}

/**
 * Decides the writes that bring one stored identity item into shape. `set`
 * carries both non-empty lists whenever either differs from what is stored;
 * `remove` names lists that are stored (even as null) but end up empty.
 */
export function planConceptXrefUpdate(
  stored: Pick<StoredIdentityItem, IdentifierField>,
  registry: NormalizerRegistry,
): ConceptXrefUpdatePlan {
  const partitioned = partitionIdentifiers(
    [...(stored.other_identifiers ?? []), ...(stored.xrefs ?? [])],
    registry,
  );
  const next: Record<IdentifierField, string[]> = {
    other_identifiers: partitioned.otherIdentifiers,
    xrefs: partitioned.xrefs,
  };

  const changed = IDENTIFIER_FIELDS.some(
    (field) => next[field].length > 0 && !sameList(next[field], stored[field]),
  );

  let set: ConceptXrefUpdatePlan['set'] = null;
  if (changed) {
    set = {};
    for (const field of IDENTIFIER_FIELDS) {
      if (next[field].length > 0) {
        set[field] = next[field];
      }
    }
  }

  const remove = IDENTIFIER_FIELDS.filter(
    (field) => next[field].length === 0 && stored[field] !== undefined,
  );

  return { set, remove };
}

type ConceptXrefBackfillDependencies = {
  therapyIndexRepository?: Pick<TherapyIndexRepository, 'scanItems' | 'updateItem'>;
  maintenanceStateRepository?: Pick<MaintenanceStateRepository, 'readState' | 'setState'>;
  registry?: NormalizerRegistry;
};

function resolveDependencies(
  overrides: ConceptXrefBackfillDependencies = {},
): Required<ConceptXrefBackfillDependencies> {
  return {
    therapyIndexRepository:
      overrides.therapyIndexRepository ??
      new FirestoreTherapyIndexRepository(getDb(), {
        collectionName: therapyIndexConfig.conceptsCollection,
      }),
    maintenanceStateRepository:
      overrides.maintenanceStateRepository ?? new FirestoreMaintenanceStateRepository(getDb()),
    registry: overrides.registry ?? buildNormalizerRegistry(),
  };
}

export type ConceptXrefBackfillOptions = {
  pageSize?: number;
  maxPages?: number;
  dryRun?: boolean;
};

export type ConceptXrefBackfillResult = {
  scanned: number;
  updated: number;
  skipped: number;
  invalid: number;
  pagesProcessed: number;
  hasMore: boolean;
  nextCursor: string | null;
  dryRun: boolean;
  pageSize: number;
};

export async function backfillConceptXrefs(
  options: ConceptXrefBackfillOptions = {},
  dependencyOverrides: ConceptXrefBackfillDependencies = {},
): Promise<ConceptXrefBackfillResult> {
  const dependencies = resolveDependencies(dependencyOverrides);
  const stateRepository = dependencies.maintenanceStateRepository;
  const repository = dependencies.therapyIndexRepository;
  const dryRun = options.dryRun === true;
  const pageSize = Math.max(
    1,
    Math.min(
      MAX_BACKFILL_PAGE_SIZE,
      Math.floor(options.pageSize ?? conceptXrefBackfillConfig.pageSize),
    ),
  );
  const maxPages = Math.max(
    1,
    Math.floor(options.maxPages ?? conceptXrefBackfillConfig.maxPagesPerRun),
  );

  if (!dryRun) {
    await stateRepository.setState(CONCEPT_XREF_BACKFILL_STATE_DOC_ID, {
      lastRunStartedAt: admin.firestore.Timestamp.now(),
      lastRunStatus: BACKFILL_RUN_STATUS_RUNNING,
    });
  }

  const result: ConceptXrefBackfillResult = {
    scanned: 0,
    updated: 0,
    skipped: 0,
    invalid: 0,
    pagesProcessed: 0,
    hasMore: false,
    nextCursor: null,
    dryRun,
    pageSize,
  };

  try {
    const state = await stateRepository.readState(
      CONCEPT_XREF_BACKFILL_STATE_DOC_ID,
      backfillStateSchema,
    );
    let cursor = normalizeCursor(state?.cursorDocId);

    do {
      const page = await repository.scanItems({ itemType: 'identity', cursor, limit: pageSize });

      for (const item of page.items) {
        const parsed = storedIdentitySchema.safeParse(item.data);
        if (!parsed.success) {
          result.invalid += 1;
          functions.logger.warn('[ConceptXrefBackfill] Skipping identity item with unexpected shape', {
            docId: item.docId,
            issues: parsed.error.issues.map((issue) => issue.message),
          });
          continue;
        }

        const stored = parsed.data;
        if (stored.src_name === 'ChEMBL') {
          result.skipped += 1;
          continue;
        }

        const plan = planConceptXrefUpdate(stored, dependencies.registry);
        if (plan.set === null && plan.remove.length === 0) {
          continue;
        }

        result.updated += 1;
        if (dryRun) {
          continue;
        }

        const key = { label_and_type: stored.label_and_type, concept_id: stored.concept_id };
        if (plan.set) {
          await repository.updateItem(key, { set: plan.set });
        }
        if (plan.remove.length > 0) {
          await repository.updateItem(key, { remove: plan.remove });
        }
      }

      result.scanned += page.items.length;
      result.pagesProcessed += 1;
      result.hasMore = page.hasMore;
      result.nextCursor = page.nextCursor;
      cursor = page.nextCursor;

      if (!dryRun) {
        const now = admin.firestore.Timestamp.now();
        await stateRepository.setState(CONCEPT_XREF_BACKFILL_STATE_DOC_ID, {
          cursorDocId: page.hasMore ? page.nextCursor : null,
          lastProcessedAt: now,
          completedAt: page.hasMore ? null : now,
        });
      }
    } while (result.hasMore && result.pagesProcessed < maxPages);

    if (!dryRun) {
      await stateRepository.setState(CONCEPT_XREF_BACKFILL_STATE_DOC_ID, {
        lastRunFinishedAt: admin.firestore.Timestamp.now(),
        lastRunStatus: BACKFILL_RUN_STATUS_SUCCESS,
        lastRunErrorAt: null,
        lastRunErrorMessage: null,
        lastRun: {
          scanned: result.scanned,
          updated: result.updated,
          skipped: result.skipped,
          invalid: result.invalid,
          pagesProcessed: result.pagesProcessed,
        },
      });
    }

    functions.logger.info('[ConceptXrefBackfill] Run complete', { ...result });
    return result;
  } catch (error) {
    const errorMessage = describeError(error);
    functions.logger.error('[ConceptXrefBackfill] Run failed', {
      error: errorMessage,
      pagesProcessed: result.pagesProcessed,
    });

    if (!dryRun) {
      const failedAt = admin.firestore.Timestamp.now();
      try {
        await stateRepository.setState(CONCEPT_XREF_BACKFILL_STATE_DOC_ID, {
          lastRunFinishedAt: failedAt,
          lastRunStatus: BACKFILL_RUN_STATUS_ERROR,
          lastRunErrorAt: failedAt,
          lastRunErrorMessage: errorMessage.slice(0, BACKFILL_ERROR_MESSAGE_MAX_LENGTH),
        });
      } catch (stateError) {
        functions.logger.warn('[ConceptXrefBackfill] Failed to persist error state', {
          error: describeError(stateError),
        });
      }
    }

    throw error;
  }
}
