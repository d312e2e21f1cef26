/**
 * Therapy Index Writer
 *
 * Buffers identity and lookup items and hands them to the repository in
 * batches. A concept's identity and its lookups are queued as one group so a
 * batch never holds lookups whose identity is still waiting in the buffer.
 */

import * as functions from 'firebase-functions';
import { therapyIndexConfig } from '../config';
import type { ConceptRecord, LookupItemType, SourceName, TherapyItem } from '../types/therapy';
import {
  buildIdentityItem,
  buildLookupItem,
  buildLookupItems,
  itemKeyOf,
} from './conceptRecord';
import { SinkWriteError } from './repositories/common/errors';
import type { TherapyIndexRepository } from './repositories/therapyIndex/TherapyIndexRepository';

export type TherapyIndexWriterOptions = {
  batchSize?: number;
  logTag?: string;
};

export type WriterFlushResult = {
  itemsWritten: number;
  failures: SinkWriteError[];
};

const IDENTITY_KEY_SUFFIX = '##identity';

export class TherapyIndexWriter {
  private readonly batchSize: number;
  private readonly logTag: string;
  private pending: TherapyItem[][] = [];
  private pendingCount = 0;
  private itemsWritten = 0;
  private failures: SinkWriteError[] = [];

  constructor(
    private readonly repository: Pick<TherapyIndexRepository, 'putItems'>,
    options: TherapyIndexWriterOptions = {},
  ) {
    this.batchSize = Math.max(
      1,
      Math.floor(options.batchSize ?? therapyIndexConfig.writeBatchSize),
    );
    this.logTag = options.logTag ?? 'TherapyIndexWriter';
  }

  get pendingItemCount(): number {
    return this.pendingCount;
  }

  async upsertIdentity(record: ConceptRecord): Promise<void> {
    await this.enqueue([buildIdentityItem(record)]);
  }

  async upsertLookup(
    value: string,
    conceptId: string,
    sourceName: SourceName,
    itemType: LookupItemType,
  ): Promise<void> {
    await this.enqueue([buildLookupItem(value, conceptId, sourceName, itemType)]);
  }

  /** Queues the identity item followed by every lookup derived from it. */
  async writeConcept(record: ConceptRecord): Promise<void> {
    await this.enqueue([buildIdentityItem(record), ...buildLookupItems(record)]);
  }

  /**
   * Writes everything still buffered and returns the totals accumulated since
   * the previous flush.
   */
  async flush(): Promise<WriterFlushResult> {
    await this.flushPending();

    const result: WriterFlushResult = {
      itemsWritten: this.itemsWritten,
      failures: this.failures,
    };
    this.itemsWritten = 0;
    this.failures = [];
    return result;
  }

  private async enqueue(group: TherapyItem[]): Promise<void> {
    if (this.pendingCount > 0 && this.pendingCount + group.length > this.batchSize) {
      await this.flushPending();
    }

    this.pending.push(group);
    this.pendingCount += group.length;

    if (this.pendingCount >= this.batchSize) {
      await this.flushPending();
    }
  }

  private async flushPending(): Promise<void> {
    const items = this.pending.flat();
    this.pending = [];
    this.pendingCount = 0;

    // Only a single group larger than the batch size spans several chunks.
    const blockedConcepts = new Set<string>();
    for (let start = 0; start < items.length; start += this.batchSize) {
      const writable: TherapyItem[] = [];
      for (const item of items.slice(start, start + this.batchSize)) {
        if (item.item_type !== 'identity' && blockedConcepts.has(item.concept_id.toLowerCase())) {
          const key = itemKeyOf(item);
          this.failures.push(
            new SinkWriteError(
              `Skipped ${key.label_and_type}: identity ${item.concept_id} was not written`,
              key,
            ),
          );
          continue;
        }
        writable.push(item);
      }

      if (writable.length === 0) {
        continue;
      }

      const result = await this.repository.putItems(writable);
      this.itemsWritten += result.written;

      for (const failure of result.failures) {
        this.failures.push(failure);
        if (failure.key.label_and_type.endsWith(IDENTITY_KEY_SUFFIX)) {
          blockedConcepts.add(failure.key.concept_id.toLowerCase());
        }
      }

      if (result.failures.length > 0) {
        functions.logger.warn(`[${this.logTag}] Batch completed with failed items`, {
          written: result.written,
          failed: result.failures.length,
          firstFailure: result.failures[0].message,
        });
      }
    }
  }
}
