/**
 * Wikidata Source
 *
 * Consumes the JSON result of the drug SPARQL query: one flat row per
 * combination of item, alias and identifier values. Rows are grouped back
 * into one concept per Wikidata item.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { dataConfig } from '../../config';
import {
  SOURCE_NAMESPACES,
  WIKIDATA_IDENTIFIER_FIELD_NAMES,
  WIKIDATA_IDENTIFIER_FIELDS,
  type WikidataIdentifierField,
} from '../../data/therapySources';
import type { ConceptDraft, ConceptRecord, SourceMetadata } from '../../types/therapy';
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

export type WikidataArtifact = VersionedArtifact & {
  rows: unknown;
};

const rowSchema = z.object({ item: z.string().trim().min(1) }).passthrough();

const columnValueSchema = z.string().trim().min(1);

const TEXT_COLUMNS = ['itemLabel', 'alias'] as const;

type WikidataRow = Partial<
  Record<(typeof TEXT_COLUMNS)[number] | WikidataIdentifierField, string>
> & { item: string };

export function wikidataConceptId(itemUri: string): string {
  const segments = itemUri.split('/');
  return `${SOURCE_NAMESPACES.Wikidata.prefix}:${segments[segments.length - 1]}`;
}

/**
 * Identifiers of normalizer sources carry the source's local-id infix
 * (DrugBank "00945" becomes "drugbank:DB00945"). ChEMBL values already
 * include theirs.
 */
export function formatWikidataIdentifier(field: WikidataIdentifierField, value: string): string {
  const mapping = WIKIDATA_IDENTIFIER_FIELDS[field];
  if (mapping.source === null || field === 'chembl') {
    return `${mapping.prefix}:${value}`;
  }
  return `${mapping.prefix}:${SOURCE_NAMESPACES[mapping.source].localIdInfix}${value}`;
}

export class WikidataSource implements SourceAdapter<WikidataArtifact> {
  readonly sourceName = 'Wikidata' as const;
  private readonly registry: NormalizerRegistry;

  constructor(private readonly options: SourceAdapterOptions = {}) {
    this.registry = options.registry ?? buildNormalizerRegistry();
  }

  async extract(): Promise<WikidataArtifact> {
    const file = await resolveSourceFile({
      sourceName: this.sourceName,
      dataDir: this.options.dataDir ?? dataConfig.dataDir,
      filePrefix: 'wikidata',
      extension: 'json',
      fetcher: this.options.fetcher,
    });

    const contents = await fs.readFile(file.path, 'utf8');
    return { version: file.version, rows: JSON.parse(contents) };
  }

  async *transform(
    artifact: WikidataArtifact,
    context: TransformContext,
  ): AsyncGenerator<ConceptRecord> {
    if (!Array.isArray(artifact.rows)) {
      throw new MalformedRecordError(this.sourceName, 'Query result is not a list of rows');
    }

    const drafts = new Map<string, ConceptDraft>();
    artifact.rows.forEach((rawRow: unknown, index) => {
      const recordRef = `row ${index + 1}`;
      const parsed = rowSchema.safeParse(rawRow);
      if (!parsed.success) {
        context.reportMalformed(
          new MalformedRecordError(
            this.sourceName,
            `Invalid row: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
            recordRef,
          ),
        );
        return;
      }
      this.applyRow(this.readColumns(parsed.data, recordRef, context), drafts);
    });

    for (const draft of drafts.values()) {
      yield createConceptRecord(draft, this.registry);
    }
  }

  private readColumns(
    raw: Record<string, unknown> & { item: string },
    recordRef: string,
    context: TransformContext,
  ): WikidataRow {
    const row: WikidataRow = { item: raw.item };
    for (const column of [...TEXT_COLUMNS, ...WIKIDATA_IDENTIFIER_FIELD_NAMES]) {
      const value = raw[column];
      if (value === undefined || value === null) {
        continue;
      }

      const parsed = columnValueSchema.safeParse(value);
      if (!parsed.success) {
        context.reportMalformed(
          new MalformedRecordError(
            this.sourceName,
            `Invalid ${column}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
            recordRef,
          ),
        );
        continue;
      }
      row[column] = parsed.data;
    }
    return row;
  }

  private applyRow(row: WikidataRow, drafts: Map<string, ConceptDraft>): void {
    const conceptId = wikidataConceptId(row.item);
    let draft = drafts.get(conceptId);
    if (!draft) {
      draft = createConceptDraft(conceptId, this.sourceName);
      drafts.set(conceptId, draft);
    }

    if (draft.label === undefined && row.itemLabel) {
      draft.label = row.itemLabel;
    }
    if (row.alias) {
      appendUnique(draft.aliases, row.alias);
    }

    for (const field of WIKIDATA_IDENTIFIER_FIELD_NAMES) {
      const value = row[field];
      if (value) {
        appendUnique(draft.identifiers, formatWikidataIdentifier(field, value));
      }
    }
  }

  metadata(artifact: WikidataArtifact): SourceMetadata {
    return {
      src_name: this.sourceName,
      data_license: 'CC0 1.0',
      data_license_url: 'https://creativecommons.org/publicdomain/zero/1.0/',
      version: artifact.version,
      data_url: null,
      data_license_attributes: {
        non_commercial: false,
        share_alike: false,
        attribution: false,
      },
    };
  }
}
