import type { z } from 'zod';
import { buildNormalizerRegistry } from '../conceptClassifier';
import {
  CONCEPT_XREF_BACKFILL_STATE_DOC_ID,
  backfillConceptXrefs,
  planConceptXrefUpdate,
} from '../conceptXrefBackfill';
import type {
  MaintenanceStateRepository,
  ScannedTherapyItem,
  TherapyIndexRepository,
  TherapyItemScanRequest,
  TherapyItemUpdate,
} from '../repositories';
import type { CursorPageResult } from '../repositories/common/pagination';
import type { TherapyItemKey } from '../../types/therapy';

type RecordMap = Record<string, unknown>;

class FakeTherapyIndexRepository implements Pick<TherapyIndexRepository, 'scanItems' | 'updateItem'> {
  readonly scannedCursors: Array<string | null> = [];
  readonly updates: Array<{ key: TherapyItemKey; update: TherapyItemUpdate }> = [];
  failScans = false;

  constructor(readonly docs: Record<string, RecordMap>) {}

  async scanItems(request: TherapyItemScanRequest): Promise<CursorPageResult<ScannedTherapyItem>> {
    if (this.failScans) {
      throw new Error('scan failed');
    }
    const cursor = request.cursor ?? null;
    this.scannedCursors.push(cursor);

    const matching = Object.keys(this.docs)
      .sort()
      .filter((docId) => this.docs[docId].item_type === request.itemType)
      .filter((docId) => cursor === null || docId > cursor);
    const pageIds = matching.slice(0, request.limit);
    const hasMore = matching.length > request.limit;

    return {
      items: pageIds.map((docId) => ({ docId, data: { ...this.docs[docId] } })),
      hasMore,
      nextCursor: hasMore ? pageIds[pageIds.length - 1] : null,
    };
  }

  async updateItem(key: TherapyItemKey, update: TherapyItemUpdate): Promise<void> {
    this.updates.push({ key, update });
    const docId = Object.keys(this.docs).find(
      (id) =>
        this.docs[id].label_and_type === key.label_and_type &&
        this.docs[id].concept_id === key.concept_id,
    );
    if (docId === undefined) {
      throw new Error(`No item for ${key.label_and_type}`);
    }

    const next: RecordMap = { ...this.docs[docId], ...(update.set ?? {}) };
    for (const field of update.remove ?? []) {
      delete next[field];
    }
    this.docs[docId] = next;
  }
}

class FakeMaintenanceStateRepository
  implements Pick<MaintenanceStateRepository, 'readState' | 'setState'>
{
  readonly documents: Record<string, RecordMap> = {};
  setStateCalls = 0;

  async readState<TState>(
    documentId: string,
    schema: z.ZodType<TState, z.ZodTypeDef, unknown>,
  ): Promise<TState | null> {
    const document = this.documents[documentId];
    if (!document) {
      return null;
    }
    const parsed = schema.safeParse(document);
    return parsed.success ? parsed.data : null;
  }

  async setState(documentId: string, data: RecordMap): Promise<void> {
    this.setStateCalls += 1;
    this.documents[documentId] = { ...(this.documents[documentId] ?? {}), ...data };
  }

  get backfillState(): RecordMap {
    return this.documents[CONCEPT_XREF_BACKFILL_STATE_DOC_ID] ?? {};
  }
}

function identity(conceptId: string, srcName: string, lists: RecordMap): RecordMap {
  return {
    label_and_type: `${conceptId.toLowerCase()}##identity`,
    concept_id: conceptId,
    src_name: srcName,
    item_type: 'identity',
    ...lists,
  };
}

function buildDocs(): Record<string, RecordMap> {
  return {
    a: identity('drugbank:DB00945', 'DrugBank', {
      other_identifiers: ['chembl:CHEMBL25', 'pubchem.compound:2244'],
      xrefs: null,
    }),
    b: identity('rxcui:1191', 'RxNorm', {
      other_identifiers: ['drugbank:DB00945'],
      xrefs: ['mesh:D001241'],
    }),
    c: identity('wikidata:Q18216', 'Wikidata', {
      other_identifiers: [],
      xrefs: ['chembl:CHEMBL25'],
    }),
    d: identity('chembl:CHEMBL25', 'ChEMBL', {
      xrefs: ['drugbank:DB00945'],
    }),
    e: { label_and_type: 'broken##identity', src_name: 'DrugBank', item_type: 'identity' },
    f: identity('wikidata:Q192423', 'Wikidata', { xrefs: null }),
    g: {
      label_and_type: 'aspirin##label',
      concept_id: 'drugbank:db00945',
      src_name: 'DrugBank',
      item_type: 'label',
    },
  };
}

function buildHarness() {
  const therapyIndexRepository = new FakeTherapyIndexRepository(buildDocs());
  const maintenanceStateRepository = new FakeMaintenanceStateRepository();
  return {
    therapyIndexRepository,
    maintenanceStateRepository,
    dependencies: { therapyIndexRepository, maintenanceStateRepository },
  };
}

describe('planConceptXrefUpdate', () => {
  const registry = buildNormalizerRegistry();

  it('plans nothing for lists already in shape', () => {
    expect(
      planConceptXrefUpdate(
        { other_identifiers: ['drugbank:DB00945'], xrefs: ['mesh:D001241'] },
        registry,
      ),
    ).toEqual({ set: null, remove: [] });
  });

  it('sets both lists when one of them changes', () => {
    expect(
      planConceptXrefUpdate(
        { other_identifiers: ['chembl:CHEMBL25', 'pubchem.compound:2244'], xrefs: ['atc:B01AC06'] },
        registry,
      ),
    ).toEqual({
      set: {
        other_identifiers: ['chembl:CHEMBL25'],
        xrefs: ['pubchem.compound:2244', 'atc:B01AC06'],
      },
      remove: [],
    });
  });

  it('removes stored lists that end up empty, null included', () => {
    expect(planConceptXrefUpdate({ other_identifiers: null, xrefs: [] }, registry)).toEqual({
      set: null,
      remove: ['other_identifiers', 'xrefs'],
    });
    expect(planConceptXrefUpdate({}, registry)).toEqual({ set: null, remove: [] });
  });
});

describe('backfillConceptXrefs', () => {
  it('reclassifies identity items and records completion', async () => {
    const harness = buildHarness();

    const result = await backfillConceptXrefs({ pageSize: 10 }, harness.dependencies);

    expect(result).toEqual({
      scanned: 6,
      updated: 3,
      skipped: 1,
      invalid: 1,
      pagesProcessed: 1,
      hasMore: false,
      nextCursor: null,
      dryRun: false,
      pageSize: 10,
    });
    expect(harness.therapyIndexRepository.updates).toEqual([
      {
        key: { label_and_type: 'drugbank:db00945##identity', concept_id: 'drugbank:DB00945' },
        update: { set: { other_identifiers: ['chembl:CHEMBL25'], xrefs: ['pubchem.compound:2244'] } },
      },
      {
        key: { label_and_type: 'wikidata:q18216##identity', concept_id: 'wikidata:Q18216' },
        update: { set: { other_identifiers: ['chembl:CHEMBL25'] } },
      },
      {
        key: { label_and_type: 'wikidata:q18216##identity', concept_id: 'wikidata:Q18216' },
        update: { remove: ['xrefs'] },
      },
      {
        key: { label_and_type: 'wikidata:q192423##identity', concept_id: 'wikidata:Q192423' },
        update: { remove: ['xrefs'] },
      },
    ]);
    expect(harness.therapyIndexRepository.docs.c).toEqual(
      identity('wikidata:Q18216', 'Wikidata', { other_identifiers: ['chembl:CHEMBL25'] }),
    );
    expect(harness.therapyIndexRepository.docs.d).toEqual(buildDocs().d);

    const state = harness.maintenanceStateRepository.backfillState;
    expect(state.cursorDocId).toBeNull();
    expect(state.completedAt).toBeTruthy();
    expect(state.lastRunStatus).toBe('success');
  });

  it('writes nothing on a second run', async () => {
    const harness = buildHarness();
    await backfillConceptXrefs({ pageSize: 10 }, harness.dependencies);
    const writesAfterFirstRun = harness.therapyIndexRepository.updates.length;

    const result = await backfillConceptXrefs({ pageSize: 10 }, harness.dependencies);

    expect(result.updated).toBe(0);
    expect(harness.therapyIndexRepository.updates).toHaveLength(writesAfterFirstRun);
  });

  it('resumes from the stored cursor across runs', async () => {
    const harness = buildHarness();

    const first = await backfillConceptXrefs({ pageSize: 2, maxPages: 1 }, harness.dependencies);
    expect(first.hasMore).toBe(true);
    expect(harness.maintenanceStateRepository.backfillState.cursorDocId).toBe('b');
    expect(harness.maintenanceStateRepository.backfillState.completedAt).toBeNull();

    await backfillConceptXrefs({ pageSize: 2, maxPages: 1 }, harness.dependencies);
    const last = await backfillConceptXrefs({ pageSize: 2, maxPages: 1 }, harness.dependencies);

    expect(harness.therapyIndexRepository.scannedCursors).toEqual([null, 'b', 'd']);
    expect(last.hasMore).toBe(false);
    expect(harness.maintenanceStateRepository.backfillState.cursorDocId).toBeNull();
    expect(harness.maintenanceStateRepository.backfillState.completedAt).toBeTruthy();
  });

  it('continues through several pages within one run', async () => {
    const harness = buildHarness();

    const result = await backfillConceptXrefs({ pageSize: 2, maxPages: 5 }, harness.dependencies);

    expect(result.pagesProcessed).toBe(3);
    expect(result.scanned).toBe(6);
    expect(harness.therapyIndexRepository.scannedCursors).toEqual([null, 'b', 'd']);
  });

  it('counts without writing on a dry run', async () => {
    const harness = buildHarness();

    const result = await backfillConceptXrefs({ pageSize: 10, dryRun: true }, harness.dependencies);

    expect(result.updated).toBe(3);
    expect(result.dryRun).toBe(true);
    expect(harness.therapyIndexRepository.updates).toHaveLength(0);
    expect(harness.maintenanceStateRepository.setStateCalls).toBe(0);
  });

  it('records the error state and rethrows', async () => {
    const harness = buildHarness();
    harness.therapyIndexRepository.failScans = true;

    await expect(backfillConceptXrefs({ pageSize: 10 }, harness.dependencies)).rejects.toThrow(
      'scan failed',
    );

    const state = harness.maintenanceStateRepository.backfillState;
    expect(state.lastRunStatus).toBe('error');
    expect(state.lastRunErrorMessage).toBe('scan failed');
  });
});
