import type { ItemType, TherapyItem, TherapyItemKey } from '../../../types/therapy';
import type { SinkWriteError } from '../common/errors';
import type { CursorPageRequest, CursorPageResult } from '../common/pagination';

export type ScannedTherapyItem = {
  docId: string;
  data: FirebaseFirestore.DocumentData;
};

export type TherapyItemScanRequest = CursorPageRequest & {
  itemType: ItemType;
};

export type PutItemsResult = {
  written: number;
  failures: SinkWriteError[];
};

export type TherapyItemUpdate = {
  set?: FirebaseFirestore.DocumentData;
  remove?: string[];
};

export interface TherapyIndexRepository {
  /**
   * Writes items in one batch. When the batch cannot be committed the items are
   * written one at a time, in order, and every failure is reported per item.
   */
  putItems(items: readonly TherapyItem[]): Promise<PutItemsResult>;
  getItem(key: TherapyItemKey): Promise<FirebaseFirestore.DocumentData | null>;
  /** Concept ids stored under an exact `<value>##<item type>` key. */
  findConceptIds(labelAndType: string): Promise<string[]>;
  scanItems(request: TherapyItemScanRequest): Promise<CursorPageResult<ScannedTherapyItem>>;
  updateItem(key: TherapyItemKey, update: TherapyItemUpdate): Promise<void>;
}
