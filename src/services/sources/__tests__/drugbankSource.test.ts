import path from 'path';
import { DrugBankSource, drugBankApprovalStatus } from '../drugbankSource';
import { buildTransformContext, collectRecords } from './collectRecords';

const fixturesDir = path.join(__dirname, 'fixtures');

describe('DrugBankSource', () => {
  it('extracts the newest versioned XML file', async () => {
    const artifact = await new DrugBankSource({ dataDir: fixturesDir }).extract();

    expect(artifact.version).toBe('5.1.10');
  });

  it('maps a drug element onto a concept record', async () => {
    const source = new DrugBankSource({ dataDir: fixturesDir });
    const { context } = buildTransformContext();
    const records = await collectRecords(source.transform(await source.extract(), context));

    expect(records[0]).toEqual({
      conceptId: 'drugbank:DB00945',
      sourceName: 'DrugBank',
      label: 'Acetylsalicylic acid',
      aliases: ['APRD00264', 'EXPT00475', '2-Acetoxybenzoic acid', 'Aspirin', 'Aspro'],
      tradeNames: ['Bayer Aspirin'],
      otherIdentifiers: ['chembl:CHEMBL25', 'rxcui:1191', 'chemidplus:50-78-2'],
      xrefs: ['chebi:15365'],
      approvalStatus: 'approved',
    });
  });

  it('uses the first id when none is flagged primary and prefers withdrawn', async () => {
    const source = new DrugBankSource({ dataDir: fixturesDir });
    const { context } = buildTransformContext();
    const records = await collectRecords(source.transform(await source.extract(), context));

    expect(records[1]).toEqual({
      conceptId: 'drugbank:DB00001',
      sourceName: 'DrugBank',
      label: 'Lepirudin',
      approvalStatus: 'withdrawn',
    });
  });

  it('skips drugs without an id and reports them', async () => {
    const source = new DrugBankSource({ dataDir: fixturesDir });
    const { context, malformed } = buildTransformContext();
    const records = await collectRecords(source.transform(await source.extract(), context));

    expect(records).toHaveLength(2);
    expect(malformed.map((error) => error.recordRef)).toEqual(['drug 3']);
  });

  it('drops an invalid field and keeps the rest of the drug', async () => {
    const source = new DrugBankSource();
    const { context, malformed } = buildTransformContext();
    const document = {
      drugbank: {
        drug: [
          {
            'drugbank-id': [{ '#text': 'DB00316', '@_primary': 'true' }],
            name: 'Acetaminophen',
            'cas-number': { value: '103-90-2' },
            groups: { group: ['approved'] },
          },
        ],
      },
    };

    const records = await collectRecords(source.transform({ version: 'test', document }, context));

    expect(records).toEqual([
      {
        conceptId: 'drugbank:DB00316',
        sourceName: 'DrugBank',
        label: 'Acetaminophen',
        approvalStatus: 'approved',
      },
    ]);
    expect(malformed).toHaveLength(1);
    expect(malformed[0].recordRef).toBe('drug 1 (DB00316)');
    expect(malformed[0].message).toBe('Invalid <cas-number>: Expected string, received object');
  });

  it('drops only the invalid entries of a list field', async () => {
    const source = new DrugBankSource();
    const { context, malformed } = buildTransformContext();
    const document = {
      drugbank: {
        drug: [
          {
            'drugbank-id': [{ '#text': 'DB00316', '@_primary': 'true' }],
            name: 'Acetaminophen',
            synonyms: {
              synonym: [{ '#text': 'Paracetamol', '@_language': 'english' }, { '@_language': 'english' }],
            },
            'international-brands': {
              'international-brand': [{ company: 'Acme' }, { name: 'Panadol' }],
            },
            products: {
              product: [
                { name: 'Tylenol', approved: 'true' },
                { generic: 'true' },
              ],
            },
            'external-identifiers': {
              'external-identifier': [
                { resource: 'ChEBI' },
                { resource: 'ChEMBL', identifier: 'CHEMBL112' },
              ],
            },
            groups: { group: [{ kind: 'approved' }, 'investigational'] },
          },
        ],
      },
    };

    const records = await collectRecords(source.transform({ version: 'test', document }, context));

    expect(records).toEqual([
      {
        conceptId: 'drugbank:DB00316',
        sourceName: 'DrugBank',
        label: 'Acetaminophen',
        aliases: ['Paracetamol', 'Panadol'],
        tradeNames: ['Tylenol'],
        otherIdentifiers: ['chembl:CHEMBL112'],
        approvalStatus: 'investigational',
      },
    ]);
    expect(malformed.map((error) => error.message)).toEqual([
      'Invalid <synonym>: Invalid input',
      'Invalid <international-brand>: Required',
      'Invalid <product>: Required',
      'Invalid <external-identifier>: Required',
      'Invalid <group>: Expected string, received object',
    ]);
    expect(new Set(malformed.map((error) => error.recordRef))).toEqual(
      new Set(['drug 1 (DB00316)']),
    );
  });

  it('fails the transform when the document has no drugbank root', async () => {
    const source = new DrugBankSource();
    const { context } = buildTransformContext();

    await expect(
      collectRecords(source.transform({ version: 'test', document: { other: {} } }, context)),
    ).rejects.toThrow('Document has no <drugbank> root element');
  });

  it('ranks approval groups withdrawn, approved, investigational', () => {
    expect(drugBankApprovalStatus(['investigational', 'approved'])).toBe('approved');
    expect(drugBankApprovalStatus(['experimental', 'investigational'])).toBe('investigational');
    expect(drugBankApprovalStatus(['experimental'])).toBeUndefined();
  });
});
