import type {
  ApprovalRating,
  ConceptDraft,
  ConceptRecord,
  IdentityItem,
  ItemType,
  LookupItem,
  LookupItemType,
  SourceName,
  TherapyItem,
  TherapyItemKey,
} from '../types/therapy';
import { partitionIdentifiers, type NormalizerRegistry } from './conceptClassifier';

export const MAX_FANOUT_VALUES = 20;

const ITEM_TYPE_SEPARATOR = '##';

/**
 * Locale-independent full case folding. Upper-casing first folds characters
 * such as "ß" that have no single-character lowercase counterpart.
 */
export function casefold(value: string): string {
  return value.toUpperCase().toLowerCase();
}

export function createConceptDraft(conceptId: string, sourceName: SourceName): ConceptDraft {
  return {
    conceptId,
    sourceName,
    aliases: [],
    tradeNames: [],
    identifiers: [],
    approvalRatings: [],
    rxBrandIds: [],
  };
}

/** Appends `value` unless the exact string is already present. */
export function appendUnique<T>(list: T[], value: T): void {
  if (!list.includes(value)) {
    list.push(value);
  }
}

/** Keeps the first spelling of each casefolded value, in order. */
export function uniqueByCasefold(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const raw of values) {
    const value = raw.trim();
    if (!value) {
      continue;
    }
    const folded = casefold(value);
    if (seen.has(folded)) {
      continue;
    }
    seen.add(folded);
    unique.push(value);
  }
  return unique;
}

/**
 * Dedupes by casefold and drops the whole list when it is empty or holds more
 * than MAX_FANOUT_VALUES distinct values.
 */
export function applyFanoutCap(values: Iterable<string>): string[] | undefined {
  const unique = uniqueByCasefold(values);
  if (unique.length === 0 || unique.length > MAX_FANOUT_VALUES) {
    return undefined;
  }
  return unique;
}

type MutableConceptRecord = { -readonly [K in keyof ConceptRecord]: ConceptRecord[K] };

export function createConceptRecord(
  draft: ConceptDraft,
  registry: NormalizerRegistry,
): ConceptRecord {
  const record: MutableConceptRecord = {
    conceptId: draft.conceptId,
    sourceName: draft.sourceName,
  };

  const label = draft.label?.trim();
  if (label) {
    record.label = label;
  }

  const aliases = applyFanoutCap(draft.aliases);
  if (aliases) {
    record.aliases = aliases;
  }

  const tradeNames = applyFanoutCap(draft.tradeNames);
  if (tradeNames) {
    record.tradeNames = tradeNames;
  }

  const { otherIdentifiers, xrefs } = partitionIdentifiers(draft.identifiers, registry);
  if (otherIdentifiers.length > 0) {
    record.otherIdentifiers = otherIdentifiers;
  }
  if (xrefs.length > 0) {
    record.xrefs = xrefs;
  }

  if (draft.approvalStatus) {
    record.approvalStatus = draft.approvalStatus;
  }

  const ratings: ApprovalRating[] = [];
  draft.approvalRatings.forEach((rating) => appendUnique(ratings, rating));
  if (ratings.length > 0) {
    record.approvalRatings = ratings;
  }

  const brandIds: string[] = [];
  draft.rxBrandIds.forEach((brandId) => appendUnique(brandIds, brandId));
  if (brandIds.length > 0) {
    record.rxBrandIds = brandIds;
  }

  return Object.freeze(record);
}

export function buildItemKey(value: string, itemType: ItemType): string {
  return `${value.toLowerCase()}${ITEM_TYPE_SEPARATOR}${itemType}`;
}

export function buildIdentityItem(record: ConceptRecord): IdentityItem {
  const item: IdentityItem = {
    label_and_type: buildItemKey(record.conceptId, 'identity'),
    concept_id: record.conceptId,
    src_name: record.sourceName,
    item_type: 'identity',
  };

  if (record.label) item.label = record.label;
  if (record.aliases) item.aliases = [...record.aliases];
  if (record.tradeNames) item.trade_names = [...record.tradeNames];
  if (record.otherIdentifiers) item.other_identifiers = [...record.otherIdentifiers];
  if (record.xrefs) item.xrefs = [...record.xrefs];
  if (record.approvalStatus) item.approval_status = record.approvalStatus;
  if (record.approvalRatings) item.approval_ratings = [...record.approvalRatings];
  if (record.rxBrandIds) item.rx_brand_ids = [...record.rxBrandIds];

  return item;
}

export function buildLookupItem(
  value: string,
  conceptId: string,
  sourceName: SourceName,
  itemType: LookupItemType,
): LookupItem {
  return {
    label_and_type: buildItemKey(value, itemType),
    concept_id: conceptId.toLowerCase(),
    src_name: sourceName,
    item_type: itemType,
  };
}

/** Every label, alias, trade name and brand lookup derived from one record. */
export function buildLookupItems(record: ConceptRecord): LookupItem[] {
  const items = new Map<string, LookupItem>();
  const add = (value: string, itemType: LookupItemType) => {
    const item = buildLookupItem(value, record.conceptId, record.sourceName, itemType);
    items.set(item.label_and_type, item);
  };

  if (record.label) add(record.label, 'label');
  record.aliases?.forEach((alias) => add(alias, 'alias'));
  record.tradeNames?.forEach((tradeName) => add(tradeName, 'trade_name'));
  record.rxBrandIds?.forEach((brandId) => add(brandId, 'rx_brand'));

  return [...items.values()];
}

export function conceptRecordFromIdentityItem(item: IdentityItem): ConceptRecord {
  return {
    conceptId: item.concept_id,
    sourceName: item.src_name,
    label: item.label,
    aliases: item.aliases,
    tradeNames: item.trade_names,
    otherIdentifiers: item.other_identifiers,
    xrefs: item.xrefs,
    approvalStatus: item.approval_status,
    approvalRatings: item.approval_ratings,
    rxBrandIds: item.rx_brand_ids,
  };
}

export function itemKeyOf(item: TherapyItem): TherapyItemKey {
  return { label_and_type: item.label_and_type, concept_id: item.concept_id };
}
