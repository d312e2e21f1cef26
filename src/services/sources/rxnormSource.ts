/**
 * RxNorm Source
 *
 * Reads RXNCONSO rows in one sweep, building concepts together with link
 * tables between ingredients, brand names and MeSH precise ingredients. A
 * second pass over labeled concepts turns those links into trade names and
 * rx_brand lookups.
 */

import csv from 'csv-parser';
import { createReadStream, promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import * as functions from 'firebase-functions';
import { dataConfig } from '../../config';
import {
  RXNORM_ALLOWED_SOURCES,
  RXNORM_SOURCE_NAMESPACES,
  SOURCE_NAMESPACES,
  type RxNormAllowedSource,
} from '../../data/therapySources';
import type { ConceptDraft, ConceptRecord, SourceMetadata } from '../../types/therapy';
import { buildNormalizerRegistry, type NormalizerRegistry } from '../conceptClassifier';
import { appendUnique, casefold, createConceptDraft, createConceptRecord } from '../conceptRecord';
import { MalformedRecordError } from './errors';
import { parseBrandedDrugComponent, parseBrandedDrugForm } from './rxnormTermParsing';
import type {
  SourceAdapter,
  SourceAdapterOptions,
  TransformContext,
  VersionedArtifact,
} from './sourceAdapter';
import { fileExists, resolveSourceFile } from './sourceFiles';

export type RxNormArtifact = VersionedArtifact & {
  rows: () => AsyncIterable<string[]>;
  // Null when no drug-form list ships with the release.
  drugForms: readonly string[] | null;
};

// RXNCONSO column positions.
const RXCUI = 0;
const SAB = 11;
const TTY = 12;
const CODE = 13;
const STR = 14;
const CVF = 17;
const MIN_COLUMNS = 18;

const PRESCRIBABLE_CVF = '4096';
const NO_CODE = 'NOCODE';

const ALIAS_TERM_TYPES = ['SYN', 'SY', 'TMSY', 'PM', 'GN', 'PT', 'PEP', 'CD', 'ET', 'RXN_PT'];
const TRADE_NAME_TERM_TYPES = ['BD', 'BN', 'SBD'];

const rrfRowSchema = z.record(z.string());
const drugFormsSchema = z.array(z.string());

type ConsoRow = {
  rxcui: string;
  sab: string;
  tty: string;
  code: string;
  str: string;
  cvf: string;
};

type RxNormConcept = {
  draft: ConceptDraft;
  meshSynonymId?: string;
};

type LinkTables = {
  brandToConceptId: Map<string, string>;
  ingredientToBrands: Map<string, string[]>;
  ingredientToSbdfBrands: Map<string, string[]>;
  preciseIngredients: Map<string, string[]>;
};

function createLinkTables(): LinkTables {
  return {
    brandToConceptId: new Map(),
    ingredientToBrands: new Map(),
    ingredientToSbdfBrands: new Map(),
    preciseIngredients: new Map(),
  };
}

function addLink(table: Map<string, string[]>, key: string, value: string): void {
  const values = table.get(key);
  if (values) {
    appendUnique(values, value);
  } else {
    table.set(key, [value]);
  }
}

function allowedSource(sab: string): RxNormAllowedSource | undefined {
  return RXNORM_ALLOWED_SOURCES.find((source) => source === sab);
}

export function rxnormConceptId(rxcui: string): string {
  return `${SOURCE_NAMESPACES.RxNorm.prefix}:${rxcui}`;
}

/** Streams a pipe-delimited RRF file as column arrays. */
export async function* readRrfRows(filePath: string): AsyncGenerator<string[]> {
  const parser = createReadStream(filePath).pipe(
    csv({ separator: '|', headers: false, quote: '\u0000' }),
  );
  for await (const raw of parser) {
    // Integer keys enumerate in column order.
    yield Object.values(rrfRowSchema.parse(raw));
  }
}

export class RxNormSource implements SourceAdapter<RxNormArtifact> {
  readonly sourceName = 'RxNorm' as const;
  private readonly registry: NormalizerRegistry;

  constructor(private readonly options: SourceAdapterOptions = {}) {
    this.registry = options.registry ?? buildNormalizerRegistry();
  }

  async extract(): Promise<RxNormArtifact> {
    const file = await resolveSourceFile({
      sourceName: this.sourceName,
      dataDir: this.options.dataDir ?? dataConfig.dataDir,
      filePrefix: 'rxnorm',
      extension: 'RRF',
      fetcher: this.options.fetcher,
    });

    const drugFormsPath = path.join(
      path.dirname(file.path),
      `rxnorm_drug_forms_${file.version}.json`,
    );
    let drugForms: string[] | null = null;
    if (await fileExists(drugFormsPath)) {
      drugForms = drugFormsSchema.parse(JSON.parse(await fs.readFile(drugFormsPath, 'utf8')));
    }

    return {
      version: file.version,
      rows: () => readRrfRows(file.path),
      drugForms,
    };
  }

  async *transform(
    artifact: RxNormArtifact,
    context: TransformContext,
  ): AsyncGenerator<ConceptRecord> {
    const drugForms = artifact.drugForms ?? (await this.collectDrugForms(artifact));
    const links = createLinkTables();
    const concepts = new Map<string, RxNormConcept>();

    let rowNumber = 0;
    for await (const columns of artifact.rows()) {
      rowNumber += 1;
      if (columns.length < MIN_COLUMNS) {
        context.reportMalformed(
          new MalformedRecordError(
            this.sourceName,
            `Expected at least ${MIN_COLUMNS} columns, found ${columns.length}`,
            `row ${rowNumber}`,
          ),
        );
        continue;
      }
      this.applyRow(toConsoRow(columns), concepts, links, drugForms);
    }

    for (const concept of concepts.values()) {
      if (!concept.draft.label) {
        continue;
      }
      linkTradeNames(concept, links);
      yield createConceptRecord(concept.draft, this.registry);
    }
  }

  private async collectDrugForms(artifact: RxNormArtifact): Promise<string[]> {
    const drugForms: string[] = [];
    for await (const columns of artifact.rows()) {
      if (columns.length >= MIN_COLUMNS && columns[SAB] === 'RXNORM' && columns[TTY] === 'DF') {
        appendUnique(drugForms, columns[STR]);
      }
    }
    functions.logger.info('[RxNorm] Derived drug forms from DF rows', {
      version: artifact.version,
      drugFormCount: drugForms.length,
    });
    return drugForms;
  }

  private applyRow(
    row: ConsoRow,
    concepts: Map<string, RxNormConcept>,
    links: LinkTables,
    drugForms: readonly string[],
  ): void {
    const sab = allowedSource(row.sab);
    if (sab === undefined) {
      return;
    }

    const conceptId = rxnormConceptId(row.rxcui);
    const isRxNorm = sab === 'RXNORM';

    if (isRxNorm && row.tty === 'BN') {
      links.brandToConceptId.set(row.str, conceptId);
    }
    if (isRxNorm && row.tty === 'SBDC') {
      const component = parseBrandedDrugComponent(row.str);
      if (component) {
        for (const ingredient of component.ingredients) {
          addLink(links.ingredientToBrands, casefold(ingredient), component.brand);
        }
      }
      return;
    }

    let concept = concepts.get(conceptId);
    if (!concept) {
      concept = { draft: createConceptDraft(conceptId, this.sourceName) };
      concepts.set(conceptId, concept);
    }
    const { draft } = concept;

    if (isRxNorm && (row.tty === 'IN' || row.tty === 'PIN')) {
      draft.label = row.str;
      if (row.cvf === PRESCRIBABLE_CVF) {
        appendUnique(draft.approvalRatings, 'rxnorm_prescribable');
      }
    } else if (ALIAS_TERM_TYPES.includes(row.tty)) {
      appendUnique(draft.aliases, row.str);
    } else if (TRADE_NAME_TERM_TYPES.includes(row.tty)) {
      appendUnique(draft.tradeNames, row.str);
    }

    if (sab === 'RXNORM') {
      if (row.tty === 'SBDF') {
        const form = parseBrandedDrugForm(row.str, drugForms);
        if (form) {
          addLink(links.ingredientToSbdfBrands, casefold(form.ingredient), form.brand);
        }
      }
      return;
    }

    if (sab === 'MSH') {
      if (row.tty === 'MH') {
        concept.meshSynonymId = row.code;
      } else if (row.tty === 'PEP') {
        addLink(links.preciseIngredients, row.code, row.str);
      }
    }

    if (row.code && row.code !== NO_CODE) {
      const identifier = `${RXNORM_SOURCE_NAMESPACES[sab]}:${row.code}`;
      if (identifier !== conceptId) {
        appendUnique(draft.identifiers, identifier);
      }
    }
  }

  metadata(artifact: RxNormArtifact): SourceMetadata {
    return {
      src_name: this.sourceName,
      data_license: 'UMLS Metathesaurus',
      data_license_url: 'https://www.nlm.nih.gov/research/umls/rxnorm/docs/termsofservice.html',
      version: artifact.version,
      data_url: 'https://www.nlm.nih.gov/research/umls/rxnorm/docs/rxnormfiles.html',
      data_license_attributes: {
        non_commercial: false,
        share_alike: false,
        attribution: true,
      },
    };
  }
}

function toConsoRow(columns: string[]): ConsoRow {
  return {
    rxcui: columns[RXCUI],
    sab: columns[SAB],
    tty: columns[TTY],
    code: columns[CODE],
    str: columns[STR],
    cvf: columns[CVF],
  };
}

/**
 * Trade names come from SBDC links of the label and of every MeSH precise
 * ingredient filed under the concept's MeSH id, then from SBDF links of the
 * label. Trade names that are RxNorm brand concepts become rx_brand ids.
 */
function linkTradeNames(concept: RxNormConcept, links: LinkTables): void {
  const { draft, meshSynonymId } = concept;
  if (!draft.label) {
    return;
  }

  const label = casefold(draft.label);
  const preciseIngredients =
    meshSynonymId === undefined ? [] : (links.preciseIngredients.get(meshSynonymId) ?? []);
  const candidates = [label, ...preciseIngredients.map(casefold)];

  for (const candidate of candidates) {
    links.ingredientToBrands
      .get(candidate)
      ?.forEach((brand) => appendUnique(draft.tradeNames, brand));
  }
  links.ingredientToSbdfBrands.get(label)?.forEach((brand) => appendUnique(draft.tradeNames, brand));

  for (const tradeName of draft.tradeNames) {
    const brandConceptId = links.brandToConceptId.get(tradeName);
    if (brandConceptId) {
      appendUnique(draft.rxBrandIds, brandConceptId);
    }
  }
}
