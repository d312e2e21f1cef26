import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import crypto from 'crypto';
import { itemKeyOf } from '../../conceptRecord';
import type { TherapyItem, TherapyItemKey } from '../../../types/therapy';
import { withRetry, type RetryOptions } from '../../../utils/retryUtils';
import { describeError, SinkWriteError } from '../common/errors';
import { normalizeCursor, type CursorPageResult } from '../common/pagination';
import type {
  PutItemsResult,
  ScannedTherapyItem,
  TherapyIndexRepository,
  TherapyItemScanRequest,
  TherapyItemUpdate,
} from './TherapyIndexRepository';

export const THERAPY_CONCEPTS_COLLECTION = 'therapyConcepts';

const DEFAULT_SCAN_LIMIT = 250;
const MAX_SCAN_LIMIT = 1000;

export type FirestoreTherapyIndexRepositoryOptions = {
  collectionName?: string;
  retry?: RetryOptions;
};

export function buildItemDocumentId(key: TherapyItemKey): string {
  return crypto
    .createHash('sha256')
    .update(`${key.label_and_type}\u0000${key.concept_id}`)
    .digest('hex');
}

function documentIdField(): FirebaseFirestore.FieldPath | string {
  const fieldPathFactory = admin.firestore.FieldPath?.documentId;
  if (typeof fieldPathFactory === 'function') {
    return fieldPathFactory();
  }
  return '__name__';
}

function normalizeScanLimit(limit: number): number {
  if (!Number.isFinite(limit) || limit <= 0) {
    return DEFAULT_SCAN_LIMIT;
  }
  return Math.min(MAX_SCAN_LIMIT, Math.floor(limit));
}

export class FirestoreTherapyIndexRepository implements TherapyIndexRepository {
  private readonly collectionName: string;
  private readonly retryOptions: RetryOptions;

  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    options: FirestoreTherapyIndexRepositoryOptions = {},
  ) {
    this.collectionName = options.collectionName ?? THERAPY_CONCEPTS_COLLECTION;
    this.retryOptions = options.retry ?? {};
  }

  private collection() {
    return this.db.collection(this.collectionName);
  }

  private itemDoc(key: TherapyItemKey) {
    return this.collection().doc(buildItemDocumentId(key));
  }

  async putItems(items: readonly TherapyItem[]): Promise<PutItemsResult> {
    if (items.length === 0) {
      return { written: 0, failures: [] };
    }

    try {
      await withRetry(async () => {
        const batch = this.db.batch();
        items.forEach((item) => batch.set(this.itemDoc(itemKeyOf(item)), item));
        await batch.commit();
      }, {
        ...this.retryOptions,
        onRetry: (error, attempt) => {
          functions.logger.warn('[TherapyIndex] Retrying batch commit', {
            attempt,
            itemCount: items.length,
            error: describeError(error),
          });
          this.retryOptions.onRetry?.(error, attempt);
        },
      });
      return { written: items.length, failures: [] };
    } catch (error) {
      functions.logger.warn('[TherapyIndex] Batch commit failed, writing items individually', {
        itemCount: items.length,
        error: describeError(error),
      });
      return this.putItemsIndividually(items);
    }
  }

  private async putItemsIndividually(items: readonly TherapyItem[]): Promise<PutItemsResult> {
    const failedConcepts = new Set<string>();
    const failures: SinkWriteError[] = [];
    let written = 0;

    for (const item of items) {
      const key = itemKeyOf(item);
      const conceptKey = item.concept_id.toLowerCase();

      if (item.item_type !== 'identity' && failedConcepts.has(conceptKey)) {
        failures.push(
          new SinkWriteError(`Skipped ${key.label_and_type}: identity ${item.concept_id} was not written`, key),
        );
        continue;
      }

      try {
        await this.itemDoc(key).set(item);
        written += 1;
      } catch (error) {
        if (item.item_type === 'identity') {
          failedConcepts.add(conceptKey);
        }
        failures.push(
          new SinkWriteError(`Failed to write ${key.label_and_type}: ${describeError(error)}`, key, error),
        );
      }
    }

    return { written, failures };
  }

  async getItem(key: TherapyItemKey): Promise<FirebaseFirestore.DocumentData | null> {
    const snapshot = await this.itemDoc(key).get();
    return snapshot.exists ? snapshot.data() ?? null : null;
  }

  async findConceptIds(labelAndType: string): Promise<string[]> {
    const snapshot = await this.collection()
      .where('label_and_type', '==', labelAndType.toLowerCase())
      .get();

    return snapshot.docs
      .map((doc) => doc.data().concept_id)
      .filter((conceptId): conceptId is string => typeof conceptId === 'string');
  }

  async scanItems(request: TherapyItemScanRequest): Promise<CursorPageResult<ScannedTherapyItem>> {
    const limit = normalizeScanLimit(request.limit);
    let query: FirebaseFirestore.Query<FirebaseFirestore.DocumentData> = this.collection()
      .where('item_type', '==', request.itemType)
      .orderBy(documentIdField())
      .limit(limit + 1);

    const cursor = normalizeCursor(request.cursor);
    if (cursor) {
      query = query.startAfter(cursor);
    }

    const snapshot = await query.get();
    const hasMore = snapshot.docs.length > limit;
    const pageDocs = hasMore ? snapshot.docs.slice(0, limit) : snapshot.docs;
    const nextCursor = hasMore && pageDocs.length > 0 ? pageDocs[pageDocs.length - 1].id : null;

    return {
      items: pageDocs.map((doc) => ({ docId: doc.id, data: doc.data() })),
      hasMore,
      nextCursor,
    };
  }

  async updateItem(key: TherapyItemKey, update: TherapyItemUpdate): Promise<void> {
    const updates: FirebaseFirestore.UpdateData<FirebaseFirestore.DocumentData> = {
      ...(update.set ?? {}),
    };
    for (const field of update.remove ?? []) {
      updates[field] = admin.firestore.FieldValue.delete();
    }

    if (Object.keys(updates).length === 0) {
      return;
    }

    await this.itemDoc(key).update(updates);
  }
}
