/**
 * ChEMBL Source
 *
 * Reads molecules from the ChEMBL SQLite release. Synonyms and product trade
 * names are aggregated per molecule in SQL and split back into lists here.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { dataConfig } from '../../config';
import { SOURCE_NAMESPACES } from '../../data/therapySources';
import type { ApprovalStatus, ConceptRecord, SourceMetadata } from '../../types/therapy';
import { buildNormalizerRegistry, type NormalizerRegistry } from '../conceptClassifier';
import { createConceptDraft, createConceptRecord } from '../conceptRecord';
import { MalformedRecordError } from './errors';
import type {
  SourceAdapter,
  SourceAdapterOptions,
  TransformContext,
  VersionedArtifact,
} from './sourceAdapter';
import { resolveSourceFile } from './sourceFiles';

export type ChemblArtifact = VersionedArtifact & {
  path: string;
  db: Database.Database;
};

const LIST_SEPARATOR = '||';

export const CHEMBL_CONCEPTS_QUERY = `
  WITH synonyms AS (
    SELECT molregno, group_concat(synonyms, '${LIST_SEPARATOR}') AS aliases
    FROM molecule_synonyms
    GROUP BY molregno
  ),
  trade_names AS (
    SELECT f.molregno, group_concat(p.trade_name, '${LIST_SEPARATOR}') AS trade_names
    FROM formulations f
    LEFT JOIN products p ON f.product_id = p.product_id
    GROUP BY f.molregno
  )
  SELECT
    md.molregno,
    md.chembl_id,
    md.pref_name,
    md.max_phase,
    md.withdrawn_flag,
    s.aliases,
    t.trade_names
  FROM molecule_dictionary md
  LEFT JOIN synonyms s ON s.molregno = md.molregno
  LEFT JOIN trade_names t ON t.molregno = md.molregno
  ORDER BY md.molregno
`;

const chemblRowSchema = z.object({
  molregno: z.number(),
  chembl_id: z.string().min(1),
  pref_name: z.string().nullable(),
  max_phase: z.number().nullable(),
  withdrawn_flag: z.number().nullable(),
  aliases: z.string().nullable(),
  trade_names: z.string().nullable(),
});

type ChemblRow = z.infer<typeof chemblRowSchema>;

export function chemblApprovalStatus(
  row: Pick<ChemblRow, 'max_phase' | 'withdrawn_flag'>,
): ApprovalStatus | undefined {
  if (row.withdrawn_flag) {
    return 'withdrawn';
  }
  if (row.max_phase === 4) {
    return 'approved';
  }
  if (row.max_phase === 0) {
    return undefined;
  }
  return 'investigational';
}

const splitList = (value: string | null) => (value ? value.split(LIST_SEPARATOR) : []);

function describeRow(row: unknown): string | null {
  if (row && typeof row === 'object' && 'molregno' in row) {
    return `molregno ${String(row.molregno)}`;
  }
  return null;
}

export class ChemblSource implements SourceAdapter<ChemblArtifact> {
  readonly sourceName = 'ChEMBL' as const;
  private readonly registry: NormalizerRegistry;

  constructor(private readonly options: SourceAdapterOptions = {}) {
    this.registry = options.registry ?? buildNormalizerRegistry();
  }

  async extract(): Promise<ChemblArtifact> {
    const file = await resolveSourceFile({
      sourceName: this.sourceName,
      dataDir: this.options.dataDir ?? dataConfig.dataDir,
      filePrefix: 'chembl',
      extension: 'db',
      fetcher: this.options.fetcher,
    });

    return {
      ...file,
      db: new Database(file.path, { readonly: true, fileMustExist: true }),
    };
  }

  async *transform(
    artifact: ChemblArtifact,
    context: TransformContext,
  ): AsyncGenerator<ConceptRecord> {
    const statement = artifact.db.prepare(CHEMBL_CONCEPTS_QUERY);

    for (const rawRow of statement.iterate()) {
      const parsed = chemblRowSchema.safeParse(rawRow);
      if (!parsed.success) {
        context.reportMalformed(
          new MalformedRecordError(
            this.sourceName,
            `Invalid molecule row: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
            describeRow(rawRow),
          ),
        );
        continue;
      }

      yield this.buildRecord(parsed.data);
    }
  }

  private buildRecord(row: ChemblRow): ConceptRecord {
    const draft = createConceptDraft(
      `${SOURCE_NAMESPACES.ChEMBL.prefix}:${row.chembl_id}`,
      this.sourceName,
    );
    draft.label = row.pref_name ?? undefined;
    draft.aliases = splitList(row.aliases);
    draft.tradeNames = splitList(row.trade_names);
    draft.approvalStatus = chemblApprovalStatus(row);

    return createConceptRecord(draft, this.registry);
  }

  metadata(artifact: ChemblArtifact): SourceMetadata {
    return {
      src_name: this.sourceName,
      data_license: 'CC BY-SA 3.0',
      data_license_url: 'https://creativecommons.org/licenses/by-sa/3.0/',
      version: artifact.version,
      data_url: 'https://www.ebi.ac.uk/chembl/',
      data_license_attributes: {
        non_commercial: false,
        share_alike: true,
        attribution: true,
      },
    };
  }

  dispose(artifact: ChemblArtifact): void {
    artifact.db.close();
  }
}
