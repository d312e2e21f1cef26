/**
 * DrugBank Source
 *
 * Walks the `<drug>` elements of the DrugBank full database XML. Each field,
 * and each entry of a list field, is validated on its own so one bad element
 * drops only itself.
 */

import { promises as fs } from 'fs';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { dataConfig } from '../../config';
import { DRUGBANK_RESOURCE_PREFIXES, SOURCE_NAMESPACES } from '../../data/therapySources';
import type { ApprovalStatus, ConceptRecord, SourceMetadata } from '../../types/therapy';
import { buildNormalizerRegistry, type NormalizerRegistry } from '../conceptClassifier';
import { appendUnique, createConceptDraft, createConceptRecord } from '../conceptRecord';
import { MalformedRecordError } from './errors';
import type {
  SourceAdapter,
  SourceAdapterOptions,
  TransformContext,
  VersionedArtifact,
} from './sourceAdapter';
import { resolveSourceFile } from './sourceFiles';

export type DrugBankArtifact = VersionedArtifact & {
  document: unknown;
};

const ARRAY_PATHS = new Set([
  'drugbank.drug',
  'drugbank.drug.drugbank-id',
  'drugbank.drug.synonyms.synonym',
  'drugbank.drug.international-brands.international-brand',
  'drugbank.drug.products.product',
  'drugbank.drug.groups.group',
  'drugbank.drug.external-identifiers.external-identifier',
]);

export function createDrugBankParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (_name, jpath) => ARRAY_PATHS.has(jpath),
  });
}

const textNodeSchema = z.union([
  z.string(),
  z.object({ '#text': z.string() }).passthrough(),
]);

const drugbankIdSchema = z.union([
  z.string(),
  z.object({ '#text': z.string(), '@_primary': z.string().optional() }),
]);

const synonymSchema = z.union([
  z.string(),
  z.object({ '#text': z.string(), '@_language': z.string().optional() }),
]);

const drugFieldSchemas = {
  drugbankIds: z.array(drugbankIdSchema).min(1),
  name: textNodeSchema,
  synonyms: z.object({ synonym: z.array(z.unknown()).default([]) }),
  internationalBrands: z.object({ 'international-brand': z.array(z.unknown()).default([]) }),
  products: z.object({ product: z.array(z.unknown()).default([]) }),
  groups: z.object({ group: z.array(z.unknown()).default([]) }),
  externalIdentifiers: z.object({ 'external-identifier': z.array(z.unknown()).default([]) }),
  casNumber: z.string(),
};

// List containers are checked as lists only; each entry is validated on its own.
const drugItemSchemas = {
  synonym: synonymSchema,
  internationalBrand: z.object({ name: z.string() }).passthrough(),
  product: z
    .object({
      name: z.string(),
      generic: z.string().optional(),
      approved: z.string().optional(),
      'over-the-counter': z.string().optional(),
    })
    .passthrough(),
  group: z.string(),
  externalIdentifier: z.object({ resource: z.string(), identifier: z.string() }).passthrough(),
};

const documentSchema = z.object({
  drugbank: z.object({
    drug: z.array(z.record(z.unknown())).default([]),
  }),
});

type DrugRecord = Record<string, unknown>;

const textOf = (node: string | { '#text': string }) =>
  (typeof node === 'string' ? node : node['#text']).trim();

export function drugBankApprovalStatus(groups: readonly string[]): ApprovalStatus | undefined {
  if (groups.includes('withdrawn')) {
    return 'withdrawn';
  }
  if (groups.includes('approved')) {
    return 'approved';
  }
  if (groups.includes('investigational')) {
    return 'investigational';
  }
  return undefined;
}

export class DrugBankSource implements SourceAdapter<DrugBankArtifact> {
  readonly sourceName = 'DrugBank' as const;
  private readonly registry: NormalizerRegistry;

  constructor(private readonly options: SourceAdapterOptions = {}) {
    this.registry = options.registry ?? buildNormalizerRegistry();
  }

  async extract(): Promise<DrugBankArtifact> {
    const file = await resolveSourceFile({
      sourceName: this.sourceName,
      dataDir: this.options.dataDir ?? dataConfig.dataDir,
      filePrefix: 'drugbank',
      extension: 'xml',
      fetcher: this.options.fetcher,
    });

    const xml = await fs.readFile(file.path, 'utf8');
    return { version: file.version, document: createDrugBankParser().parse(xml) };
  }

  async *transform(
    artifact: DrugBankArtifact,
    context: TransformContext,
  ): AsyncGenerator<ConceptRecord> {
    const parsed = documentSchema.safeParse(artifact.document);
    if (!parsed.success) {
      throw new MalformedRecordError(this.sourceName, 'Document has no <drugbank> root element');
    }

    for (const [index, drug] of parsed.data.drugbank.drug.entries()) {
      const record = this.buildRecord(drug, `drug ${index + 1}`, context);
      if (record) {
        yield record;
      }
    }
  }

  private readField<T extends z.ZodTypeAny>(
    schema: T,
    value: unknown,
    field: string,
    recordRef: string,
    context: TransformContext,
  ): z.output<T> | undefined {
    if (value === undefined || value === '') {
      return undefined;
    }

    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      context.reportMalformed(
        new MalformedRecordError(
          this.sourceName,
          `Invalid <${field}>: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
          recordRef,
        ),
      );
      return undefined;
    }
    return parsed.data;
  }

  private readItems<T extends z.ZodTypeAny>(
    schema: T,
    items: readonly unknown[] | undefined,
    field: string,
    recordRef: string,
    context: TransformContext,
  ): z.output<T>[] {
    const valid: z.output<T>[] = [];
    for (const item of items ?? []) {
      const parsed = this.readField(schema, item, field, recordRef, context);
      if (parsed !== undefined) {
        valid.push(parsed);
      }
    }
    return valid;
  }

  private buildRecord(
    drug: DrugRecord,
    recordRef: string,
    context: TransformContext,
  ): ConceptRecord | null {
    const ids = this.readField(
      drugFieldSchemas.drugbankIds,
      drug['drugbank-id'],
      'drugbank-id',
      recordRef,
      context,
    );
    if (!ids) {
      context.reportMalformed(
        new MalformedRecordError(this.sourceName, 'Drug has no <drugbank-id>', recordRef),
      );
      return null;
    }

    const primary = ids.find((id) => typeof id !== 'string' && id['@_primary'] === 'true') ?? ids[0];
    const primaryId = textOf(primary);
    const draft = createConceptDraft(
      `${SOURCE_NAMESPACES.DrugBank.prefix}:${primaryId}`,
      this.sourceName,
    );
    const ref = `${recordRef} (${primaryId})`;

    for (const id of ids) {
      if (id !== primary) {
        appendUnique(draft.aliases, textOf(id));
      }
    }

    const name = this.readField(drugFieldSchemas.name, drug.name, 'name', ref, context);
    if (name !== undefined) {
      draft.label = textOf(name);
    }

    const synonyms = this.readField(drugFieldSchemas.synonyms, drug.synonyms, 'synonyms', ref, context);
    const synonymItems = this.readItems(
      drugItemSchemas.synonym,
      synonyms?.synonym,
      'synonym',
      ref,
      context,
    );
    for (const synonym of synonymItems) {
      if (typeof synonym !== 'string' && synonym['@_language'] === 'english') {
        appendUnique(draft.aliases, synonym['#text']);
      }
    }

    const brands = this.readField(
      drugFieldSchemas.internationalBrands,
      drug['international-brands'],
      'international-brands',
      ref,
      context,
    );
    const brandItems = this.readItems(
      drugItemSchemas.internationalBrand,
      brands?.['international-brand'],
      'international-brand',
      ref,
      context,
    );
    for (const brand of brandItems) {
      appendUnique(draft.aliases, brand.name);
    }

    const products = this.readField(drugFieldSchemas.products, drug.products, 'products', ref, context);
    const productItems = this.readItems(
      drugItemSchemas.product,
      products?.product,
      'product',
      ref,
      context,
    );
    for (const product of productItems) {
      if (
        product.generic === 'true' ||
        product.approved === 'true' ||
        product['over-the-counter'] === 'true'
      ) {
        appendUnique(draft.tradeNames, product.name);
      }
    }

    const externalIdentifiers = this.readField(
      drugFieldSchemas.externalIdentifiers,
      drug['external-identifiers'],
      'external-identifiers',
      ref,
      context,
    );
    const externalItems = this.readItems(
      drugItemSchemas.externalIdentifier,
      externalIdentifiers?.['external-identifier'],
      'external-identifier',
      ref,
      context,
    );
    for (const external of externalItems) {
      if (Object.prototype.hasOwnProperty.call(DRUGBANK_RESOURCE_PREFIXES, external.resource)) {
        appendUnique(
          draft.identifiers,
          `${DRUGBANK_RESOURCE_PREFIXES[external.resource]}:${external.identifier}`,
        );
      }
    }

    const casNumber = this.readField(
      drugFieldSchemas.casNumber,
      drug['cas-number'],
      'cas-number',
      ref,
      context,
    );
    if (casNumber) {
      appendUnique(draft.identifiers, `${SOURCE_NAMESPACES.ChemIDplus.prefix}:${casNumber}`);
    }

    const groups = this.readField(drugFieldSchemas.groups, drug.groups, 'groups', ref, context);
    draft.approvalStatus = drugBankApprovalStatus(
      this.readItems(drugItemSchemas.group, groups?.group, 'group', ref, context),
    );

    return createConceptRecord(draft, this.registry);
  }

  metadata(artifact: DrugBankArtifact): SourceMetadata {
    return {
      src_name: this.sourceName,
      data_license: 'CC BY-NC 4.0',
      data_license_url: 'https://creativecommons.org/licenses/by-nc/4.0/legalcode',
      version: artifact.version,
      data_url: 'https://go.drugbank.com/releases/latest',
      data_license_attributes: {
        non_commercial: true,
        share_alike: false,
        attribution: true,
      },
    };
  }
}
