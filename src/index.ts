import * as admin from 'firebase-admin';

export { conceptXrefBackfill } from './triggers/conceptXrefBackfill';

// Initialize Firebase Admin
admin.initializeApp();

export { backfillConceptXrefs, planConceptXrefUpdate } from './services/conceptXrefBackfill';
export {
  createTherapySourceAdapters,
  loadTherapySource,
  loadTherapySources,
  type SourceLoadSummary,
} from './services/therapySourceLoader';
export { TherapyIndexWriter } from './services/therapyIndexWriter';
export {
  buildNormalizerRegistry,
  classifyIdentifier,
  classifyNamespace,
  partitionIdentifiers,
} from './services/conceptClassifier';
export { buildIdentityItem, buildLookupItems, createConceptRecord } from './services/conceptRecord';
export * from './types/therapy';
