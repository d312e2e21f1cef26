/**
 * Concept Xref Backfill
 *
 * Scheduled function that moves stored identity items onto the current
 * other_identifiers/xrefs split, a bounded number of pages per run.
 */

import { onSchedule } from 'firebase-functions/v2/scheduler';
import * as functions from 'firebase-functions';
import { conceptXrefBackfillConfig } from '../config';
import { backfillConceptXrefs } from '../services/conceptXrefBackfill';

export async function runConceptXrefBackfill(): Promise<void> {
  functions.logger.info('[ConceptXrefBackfill] Starting scheduled run');

  const result = await backfillConceptXrefs({
    pageSize: conceptXrefBackfillConfig.pageSize,
    maxPages: conceptXrefBackfillConfig.maxPagesPerRun,
  });

  if (result.hasMore) {
    functions.logger.info('[ConceptXrefBackfill] More identity items remain for the next run', {
      nextCursor: result.nextCursor,
    });
  }
}

export const conceptXrefBackfill = onSchedule(
  {
    region: 'us-central1',
    schedule: 'every 6 hours',
    timeZone: 'America/Chicago',
    memory: '512MiB',
    timeoutSeconds: 540,
    maxInstances: 1,
  },
  runConceptXrefBackfill,
);
