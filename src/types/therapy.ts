/**
 * Canonical therapy concept model shared by every source loader, the index
 * writer and the cross-reference backfill.
 */

export const SOURCE_NAMES = [
  'Wikidata',
  'ChEMBL',
  'NCIt',
  'DrugBank',
  'ChemIDplus',
  'RxNorm',
] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export const APPROVAL_STATUSES = [
  'withdrawn',
  'approved',
  'investigational',
  'unknown',
] as const;

export type ApprovalStatus = (typeof APPROVAL_STATUSES)[number];

export type ApprovalRating = 'rxnorm_prescribable';

export const ITEM_TYPES = ['identity', 'label', 'alias', 'trade_name', 'rx_brand'] as const;

export type ItemType = (typeof ITEM_TYPES)[number];

export type LookupItemType = Exclude<ItemType, 'identity'>;

export type ConceptRecord = {
  readonly conceptId: string;
  readonly sourceName: SourceName;
  readonly label?: string;
  readonly aliases?: readonly string[];
  readonly tradeNames?: readonly string[];
  readonly otherIdentifiers?: readonly string[];
  readonly xrefs?: readonly string[];
  readonly approvalStatus?: ApprovalStatus;
  readonly approvalRatings?: readonly ApprovalRating[];
  readonly rxBrandIds?: readonly string[];
};

/**
 * Mutable accumulator a source loader fills while reading raw data. Turned into
 * a ConceptRecord by createConceptRecord, which applies dedup, the fan-out cap
 * and identifier classification.
 */
export type ConceptDraft = {
  conceptId: string;
  sourceName: SourceName;
  label?: string;
  aliases: string[];
  tradeNames: string[];
  identifiers: string[];
  approvalStatus?: ApprovalStatus;
  approvalRatings: ApprovalRating[];
  rxBrandIds: string[];
};

export type TherapyItemKey = {
  label_and_type: string;
  concept_id: string;
};

export type IdentityItem = TherapyItemKey & {
  src_name: SourceName;
  item_type: 'identity';
  label?: string;
  aliases?: string[];
  trade_names?: string[];
  other_identifiers?: string[];
  xrefs?: string[];
  approval_status?: ApprovalStatus;
  approval_ratings?: ApprovalRating[];
  rx_brand_ids?: string[];
};

export type LookupItem = TherapyItemKey & {
  src_name: SourceName;
  item_type: LookupItemType;
};

export type TherapyItem = IdentityItem | LookupItem;

export type DataLicenseAttributes = {
  non_commercial: boolean;
  share_alike: boolean;
  attribution: boolean;
};

export type SourceMetadata = {
  src_name: SourceName;
  data_license: string;
  data_license_url: string;
  version: string;
  data_url: string | null;
  data_license_attributes: DataLicenseAttributes;
};
